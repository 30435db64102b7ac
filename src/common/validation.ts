import { ValidationError } from './errors/index.js';

/**
 * Letters (any script, with their combining marks), digits and underscore:
 * what may follow "/" in a command. Marks matter because lower-casing can
 * produce them, e.g. "İ" becomes "i" + U+0307.
 */
export const PREFIX_CHARS = '[\\p{L}\\p{M}\\p{N}_]';

/** Commands the relay answers itself; no topic may take these prefixes. */
export const RESERVED_PREFIXES: readonly string[] = ['whereami'];

const PREFIX_RE = new RegExp(`^${PREFIX_CHARS}+$`, 'u');
const MAX_PREFIX_LENGTH = 50;
const CHAT_ID_RE = /^-?\d{1,100}$/;
const MAX_CONFIG_KEY_LENGTH = 100;

/** Checks and lower-cases a topic prefix. A leading "/" is tolerated. */
export function normalizePrefix(raw: string): string {
  const trimmed = raw.trim().replace(/^\//, '');
  const prefix = trimmed.toLowerCase();
  // Length is counted in code points, like VARCHAR(50)
  const length = [...prefix].length;
  if (!PREFIX_RE.test(trimmed) || length === 0 || length > MAX_PREFIX_LENGTH) {
    throw new ValidationError(
      `Invalid prefix '${raw}': expected 1-50 letters, digits or underscores`,
      'prefix',
    );
  }
  return prefix;
}

/** normalizePrefix plus the check that the prefix is free for a new topic. */
export function validateNewPrefix(raw: string): string {
  const prefix = normalizePrefix(raw);
  if (RESERVED_PREFIXES.includes(prefix)) {
    throw new ValidationError(`Prefix '${prefix}' is reserved for a relay command`, 'prefix');
  }
  return prefix;
}

/**
 * Run a write-side format check on a lookup key. A key that could never
 * have been stored is reported through `notFound` instead of as a
 * validation failure.
 */
export function toLookupKey(raw: string, normalize: (raw: string) => string, notFound: () => Error): string {
  try {
    return normalize(raw);
  } catch (err) {
    if (err instanceof ValidationError) {
      throw notFound();
    }
    throw err;
  }
}

export function validateChatId(raw: string): string {
  const chatId = raw.trim();
  if (!CHAT_ID_RE.test(chatId)) {
    throw new ValidationError(`Invalid chat id '${raw}': expected an integer such as -1001234567890`, 'chatId');
  }
  return chatId;
}

export function validateThreadId(value: number): number {
  if (!Number.isInteger(value) || value <= 0 || value > 2_147_483_647) {
    throw new ValidationError(`Invalid thread id '${value}': expected a positive integer`, 'threadId');
  }
  return value;
}

export function validateName(value: string, field: string = 'name'): string {
  const name = value.trim();
  if (name.length === 0 || name.length > 255) {
    throw new ValidationError(`Invalid ${field}: expected 1-255 characters`, field);
  }
  return name;
}

export function validateConfigKey(raw: string): string {
  if (raw.trim().length === 0 || [...raw].length > MAX_CONFIG_KEY_LENGTH) {
    throw new ValidationError(`Invalid config key '${raw}': expected 1-100 characters`, 'key');
  }
  return raw;
}
