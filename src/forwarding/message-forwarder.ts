import type { Topic } from '../common/types/topic.js';
import { parseForwardCommand } from './command-parser.js';
import { formatDiscoveryReply, formatForwardedText, formatUnknownPrefixReply } from './message-formatter.js';
import type { SenderInfo } from './message-formatter.js';
import { resolveForwardingSettings, resolveRuntimeFlags } from './forwarding-settings.js';

/**
 * Store access for the forwarder. Injected so the forwarder stays testable
 * without a database; every call is expected to hit the store.
 */
export interface ForwardingStorePort {
  loadActiveSourceChatIds(): Promise<string[]>;
  loadTopics(): Promise<Topic[]>;
  loadConfig(): Promise<Record<string, string>>;
}

export interface SendOptions {
  threadId?: number;
  replyToMessageId?: number;
}

/** Outbound side of the messaging API. */
export interface MessageSenderPort {
  sendMessage(chatId: string, text: string, options: SendOptions): Promise<void>;
}

export interface IncomingMessage {
  chatId: string;
  chatType: string;
  /** Forum thread the message was posted in, if any */
  threadId: number | null;
  messageId: number;
  text: string | null;
  sender: SenderInfo | null;
}

export type IgnoreReason = 'no_text' | 'not_a_command' | 'inactive_source' | 'unparseable';

export type ForwardOutcome =
  | { kind: 'ignored'; reason: IgnoreReason }
  | { kind: 'discovery'; reply: string }
  | { kind: 'unknown_prefix'; prefix: string; reply: string }
  | { kind: 'forwarded'; prefix: string; targetChatId: string; threadId: number; text: string };

const NO_SENDER: SenderInfo = { name: null, username: null, id: null };
const DISCOVERY_COMMAND = 'whereami';

/**
 * Relays "/prefix text" commands from active source chats into the thread
 * mapped to the prefix in the target chat. Unknown prefixes get a reply in
 * the source chat listing the prefixes that exist.
 *
 * Two bot_config switches are read for every update: `debug_mode` logs the
 * update, and `discovery_mode` makes `/whereami` answer in any chat with
 * the ids needed to register it.
 */
export class MessageForwarder {
  constructor(
    private readonly store: ForwardingStorePort,
    private readonly sender: MessageSenderPort,
  ) {}

  async handle(message: IncomingMessage): Promise<ForwardOutcome> {
    const config = await this.store.loadConfig();
    const flags = resolveRuntimeFlags(config);
    if (flags.debugMode) {
      console.log(`[debug] Incoming update: ${JSON.stringify(message)}`);
    }

    if (!message.text) {
      return { kind: 'ignored', reason: 'no_text' };
    }
    if (!message.text.startsWith('/')) {
      return { kind: 'ignored', reason: 'not_a_command' };
    }

    const command = parseForwardCommand(message.text);
    if (flags.discoveryMode && command?.prefix === DISCOVERY_COMMAND) {
      return this.replyWithIds(message);
    }

    const activeChats = await this.store.loadActiveSourceChatIds();
    if (!activeChats.includes(message.chatId)) {
      return { kind: 'ignored', reason: 'inactive_source' };
    }

    if (!command) {
      console.warn(`[forwarder] Could not parse message: ${message.text}`);
      return { kind: 'ignored', reason: 'unparseable' };
    }

    const topics = await this.store.loadTopics();
    const topic = topics.find((t) => t.prefix === command.prefix);
    if (!topic) {
      const reply = formatUnknownPrefixReply(topics.map((t) => t.prefix));
      await this.sender.sendMessage(message.chatId, reply, { replyToMessageId: message.messageId });
      console.log(`[forwarder] Unknown prefix '${command.prefix}' from chat ${message.chatId}`);
      return { kind: 'unknown_prefix', prefix: command.prefix, reply };
    }

    const settings = resolveForwardingSettings(config);
    const text = settings.includeSenderInfo
      ? formatForwardedText(settings.senderFormat, message.sender ?? NO_SENDER, command.content)
      : command.content;

    await this.sender.sendMessage(settings.targetChatId, text, { threadId: topic.threadId });
    console.log(
      `[forwarder] Forwarded '${command.prefix}' to thread ${topic.threadId} (${topic.name}): ${command.content.slice(0, 50)}`,
    );

    return {
      kind: 'forwarded',
      prefix: command.prefix,
      targetChatId: settings.targetChatId,
      threadId: topic.threadId,
      text,
    };
  }

  private async replyWithIds(message: IncomingMessage): Promise<ForwardOutcome> {
    const reply = formatDiscoveryReply(message.chatId, message.chatType, message.threadId);
    const options: SendOptions = { replyToMessageId: message.messageId };
    if (message.threadId !== null) {
      options.threadId = message.threadId;
    }
    await this.sender.sendMessage(message.chatId, reply, options);
    console.log(
      `[forwarder] Discovery: chat ${message.chatId} (${message.chatType}), thread ${message.threadId ?? 'none'}`,
    );
    return { kind: 'discovery', reply };
  }
}
