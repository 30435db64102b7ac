export interface SenderInfo {
  name: string | null;
  username: string | null;  // without "@"
  id: number | null;
}

const UNKNOWN_NAME = 'Unknown';
const NO_USERNAME = 'no username';
const UNKNOWN_ID = 'unknown';

/**
 * Fill a sender_format template. Recognised placeholders are {message},
 * {sender_name}, {sender_username} and {sender_id}; any other {word} is left as written.
 */
export function formatForwardedText(template: string, sender: SenderInfo, message: string): string {
  const values: Record<string, string> = {
    message,
    sender_name: sender.name || UNKNOWN_NAME,
    sender_username: sender.username ? `@${sender.username}` : NO_USERNAME,
    sender_id: sender.id === null ? UNKNOWN_ID : String(sender.id),
  };

  return template.replace(/\{(\w+)\}/g, (placeholder: string, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : placeholder,
  );
}

/** Reply text for a prefix that matches no topic. */
export function formatUnknownPrefixReply(availablePrefixes: string[]): string {
  if (availablePrefixes.length === 0) {
    return 'No topics are configured.';
  }
  const list = [...availablePrefixes].sort().map((p) => `/${p}`).join(', ');
  return `Unknown topic. Available: ${list}`;
}

/** Reply to `/whereami`: the ids an operator needs to register a chat or topic. */
export function formatDiscoveryReply(chatId: string, chatType: string, threadId: number | null): string {
  return [
    `Chat ID: ${chatId}`,
    `Chat type: ${chatType}`,
    `Thread ID: ${threadId === null ? 'none' : threadId}`,
  ].join('\n');
}
