import { query, isUniqueViolation } from '../pool.js';
import { DuplicateSourceChatError, SourceChatNotFoundError } from '../../common/errors/index.js';
import { toLookupKey, validateChatId, validateName } from '../../common/validation.js';
import type { SourceChat, SourceChatCreateInput } from '../../common/types/source-chat.js';

/** Row shape returned by all source chat queries */
interface SourceChatRow {
  id: number;
  chat_id: string;
  name: string | null;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

export async function addSourceChat(input: SourceChatCreateInput): Promise<SourceChat> {
  const chatId = validateChatId(input.chatId);
  const name = input.name == null ? null : validateName(input.name);

  try {
    const result = await query<SourceChatRow>(
      `INSERT INTO source_chats (chat_id, name)
       VALUES ($1, $2)
       RETURNING *`,
      [chatId, name],
    );
    console.log(`[source-chats] Added source chat ${chatId} (${name ?? 'unnamed'})`);
    return mapSourceChatRow(result.rows[0]);
  } catch (err) {
    if (isUniqueViolation(err)) {
      throw new DuplicateSourceChatError(chatId, err);
    }
    throw err;
  }
}

export async function getSourceChat(rawChatId: string): Promise<SourceChat> {
  const chatId = lookupChatId(rawChatId);
  const result = await query<SourceChatRow>(
    'SELECT * FROM source_chats WHERE chat_id = $1',
    [chatId],
  );

  if (result.rows.length === 0) {
    throw new SourceChatNotFoundError(chatId);
  }

  return mapSourceChatRow(result.rows[0]);
}

export async function listSourceChats(): Promise<SourceChat[]> {
  const result = await query<SourceChatRow>('SELECT * FROM source_chats ORDER BY id ASC');
  return result.rows.map(mapSourceChatRow);
}

export async function listActiveSourceChatIds(): Promise<string[]> {
  const result = await query<{ chat_id: string }>(
    'SELECT chat_id FROM source_chats WHERE is_active = true ORDER BY id ASC',
  );
  return result.rows.map((r) => r.chat_id);
}

/** Activates or deactivates a source chat. */
export async function setSourceChatActive(rawChatId: string, isActive: boolean): Promise<SourceChat> {
  const chatId = lookupChatId(rawChatId);
  const result = await query<SourceChatRow>(
    `UPDATE source_chats
     SET is_active = $1, updated_at = now()
     WHERE chat_id = $2
     RETURNING *`,
    [isActive, chatId],
  );

  if (result.rows.length === 0) {
    throw new SourceChatNotFoundError(chatId);
  }

  console.log(`[source-chats] Chat ${chatId} ${isActive ? 'activated' : 'deactivated'}`);
  return mapSourceChatRow(result.rows[0]);
}

export async function deleteSourceChat(rawChatId: string): Promise<void> {
  const chatId = lookupChatId(rawChatId);
  const result = await query<{ id: number }>(
    'DELETE FROM source_chats WHERE chat_id = $1 RETURNING id',
    [chatId],
  );

  if (result.rows.length === 0) {
    throw new SourceChatNotFoundError(chatId);
  }

  console.log(`[source-chats] Deleted source chat ${chatId}`);
}

/** A chat id that fails the format check cannot exist, so it is reported as not found. */
function lookupChatId(raw: string): string {
  return toLookupKey(raw, validateChatId, () => new SourceChatNotFoundError(raw));
}

function mapSourceChatRow(row: SourceChatRow): SourceChat {
  return {
    id: row.id,
    chatId: row.chat_id,
    name: row.name,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
