import { query, withTransaction } from '../pool.js';
import { ConfigKeyNotFoundError } from '../../common/errors/index.js';
import { toLookupKey, validateConfigKey } from '../../common/validation.js';
import type { BotConfigEntry, DefaultConfigEntry } from '../../common/types/bot-config.js';

/** Row shape returned by all bot_config queries */
interface BotConfigRow {
  id: number;
  key: string;
  value: string;
  description: string | null;
  created_at: Date;
  updated_at: Date;
}

/**
 * Rows every installation starts with. `target_chat_id` is left empty:
 * the forwarder refuses to run until an operator sets it.
 */
export const DEFAULT_BOT_CONFIG: readonly DefaultConfigEntry[] = [
  {
    key: 'target_chat_id',
    value: '',
    description: 'ID of the chat that receives forwarded messages',
  },
  {
    key: 'include_sender_info',
    value: 'true',
    description: 'Whether to annotate forwarded messages with the sender',
  },
  {
    key: 'sender_format',
    value: '{message}\nSent by: {sender_name} ({sender_username})',
    description: 'Template for forwarded messages when sender info is included',
  },
  {
    key: 'discovery_mode',
    value: 'false',
    description: 'Whether /whereami replies with the chat and thread ids in any chat',
  },
  {
    key: 'debug_mode',
    value: 'false',
    description: 'Whether every incoming update is written to the log',
  },
];

export async function getConfigEntry(key: string): Promise<BotConfigEntry> {
  const result = await query<BotConfigRow>(
    'SELECT * FROM bot_config WHERE key = $1',
    [toLookupKey(key, validateConfigKey, () => new ConfigKeyNotFoundError(key))],
  );

  if (result.rows.length === 0) {
    throw new ConfigKeyNotFoundError(key);
  }

  return mapConfigRow(result.rows[0]);
}

export async function getConfigValue(key: string): Promise<string> {
  const entry = await getConfigEntry(key);
  return entry.value;
}

export async function listConfigEntries(): Promise<BotConfigEntry[]> {
  const result = await query<BotConfigRow>('SELECT * FROM bot_config ORDER BY key ASC');
  return result.rows.map(mapConfigRow);
}

export async function getAllConfig(): Promise<Record<string, string>> {
  const result = await query<{ key: string; value: string }>('SELECT key, value FROM bot_config');
  const config: Record<string, string> = {};
  for (const row of result.rows) {
    config[row.key] = row.value;
  }
  return config;
}

/**
 * Insert or update a config value. When `description` is omitted an
 * existing description is kept.
 */
export async function setConfigValue(
  rawKey: string,
  value: string,
  description?: string,
): Promise<BotConfigEntry> {
  const key = validateConfigKey(rawKey);

  const entry = await withTransaction(async (client) => {
    const setClauses = ['value = $1'];
    const values: unknown[] = [value];
    if (description !== undefined) {
      values.push(description);
      setClauses.push(`description = $${values.length}`);
    }
    setClauses.push('updated_at = now()');
    values.push(key);

    const updated = await client.query<BotConfigRow>(
      `UPDATE bot_config SET ${setClauses.join(', ')} WHERE key = $${values.length} RETURNING *`,
      values,
    );
    if (updated.rows.length > 0) {
      return mapConfigRow(updated.rows[0]);
    }

    const inserted = await client.query<BotConfigRow>(
      `INSERT INTO bot_config (key, value, description)
       VALUES ($1, $2, $3)
       RETURNING *`,
      [key, value, description ?? null],
    );
    return mapConfigRow(inserted.rows[0]);
  });

  console.log(`[config] Set ${key} = ${value}`);
  return entry;
}

/**
 * Insert the default rows that are missing. Existing keys are left untouched,
 * so running this on every startup is safe. Returns the keys it inserted.
 */
export async function seedDefaultConfig(): Promise<string[]> {
  const placeholders: string[] = [];
  const values: string[] = [];
  for (const entry of DEFAULT_BOT_CONFIG) {
    values.push(entry.key, entry.value, entry.description);
    const n = values.length;
    placeholders.push(`($${n - 2}, $${n - 1}, $${n})`);
  }

  const result = await query<{ key: string }>(
    `INSERT INTO bot_config (key, value, description)
     VALUES ${placeholders.join(', ')}
     ON CONFLICT (key) DO NOTHING
     RETURNING key`,
    values,
  );

  const inserted = result.rows.map((r) => r.key);
  if (inserted.length > 0) {
    console.log(`[config] Seeded default config: ${inserted.join(', ')}`);
  }
  return inserted;
}

function mapConfigRow(row: BotConfigRow): BotConfigEntry {
  return {
    id: row.id,
    key: row.key,
    value: row.value,
    description: row.description,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
