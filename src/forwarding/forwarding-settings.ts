import { ForwardingConfigError } from '../common/errors/index.js';
import type { ForwardingSettings, KnownConfigKey, RuntimeFlags } from '../common/types/bot-config.js';

const TRUE_VALUES = new Set(['true', '1', 'yes']);
const FALSE_VALUES = new Set(['false', '0', 'no']);

function requireKey(config: Record<string, string>, key: KnownConfigKey): string {
  const value = config[key];
  if (value === undefined) {
    throw new ForwardingConfigError(`Config key '${key}' is missing`, key);
  }
  return value;
}

export function parseBooleanSetting(value: string, key: KnownConfigKey): boolean {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new ForwardingConfigError(`Config key '${key}' must be true or false, got '${value}'`, key);
}

/**
 * Build the typed settings the forwarder needs from the raw bot_config rows.
 * Missing values are errors: nothing falls back to a built-in default.
 */
export function resolveForwardingSettings(config: Record<string, string>): ForwardingSettings {
  const targetChatId = requireKey(config, 'target_chat_id').trim();
  if (targetChatId.length === 0) {
    throw new ForwardingConfigError('Config key \'target_chat_id\' is empty', 'target_chat_id');
  }

  return {
    targetChatId,
    includeSenderInfo: parseBooleanSetting(requireKey(config, 'include_sender_info'), 'include_sender_info'),
    senderFormat: requireKey(config, 'sender_format'),
  };
}

export function resolveRuntimeFlags(config: Record<string, string>): RuntimeFlags {
  return {
    discoveryMode: parseBooleanSetting(requireKey(config, 'discovery_mode'), 'discovery_mode'),
    debugMode: parseBooleanSetting(requireKey(config, 'debug_mode'), 'debug_mode'),
  };
}
