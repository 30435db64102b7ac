import { PREFIX_CHARS } from '../common/validation.js';

export interface ForwardCommand {
  prefix: string;   // lower-cased, without the leading "/"
  content: string;  // everything after the prefix, trimmed; may span lines
}

// "/sky 27.5", "/sky@relay_bot 27.5", "/скай\nline two"
const COMMAND_RE = new RegExp(`^\\/(${PREFIX_CHARS}+)(?:@\\w+)?\\s*([\\s\\S]*)$`, 'u');

/**
 * Split a "/prefix text" message into its prefix and content.
 * Returns null for anything that is not a command of that shape.
 */
export function parseForwardCommand(text: string): ForwardCommand | null {
  const match = COMMAND_RE.exec(text.trim());
  if (!match) return null;

  return {
    prefix: match[1].toLowerCase(),
    content: match[2].trim(),
  };
}
