export type KnownConfigKey =
  | 'target_chat_id'
  | 'include_sender_info'
  | 'sender_format'
  | 'discovery_mode'
  | 'debug_mode';

export interface BotConfigEntry {
  id: number;
  key: string;
  value: string;
  description: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface DefaultConfigEntry {
  key: KnownConfigKey;
  value: string;
  description: string;
}

/** Typed view of the bot_config rows the forwarder reads. */
export interface ForwardingSettings {
  targetChatId: string;
  includeSenderInfo: boolean;
  senderFormat: string;
}

/** Operator switches read on every update. */
export interface RuntimeFlags {
  /** Answer `/whereami` in any chat with its chat and thread ids */
  discoveryMode: boolean;
  /** Log every incoming update */
  debugMode: boolean;
}
