import { query, isUniqueViolation } from '../pool.js';
import { DuplicateTopicError, TopicNotFoundError } from '../../common/errors/index.js';
import { normalizePrefix, toLookupKey, validateName, validateNewPrefix, validateThreadId } from '../../common/validation.js';
import type { Topic, TopicCreateInput, TopicUpdateInput } from '../../common/types/topic.js';

/** Row shape returned by all topic queries */
interface TopicRow {
  id: number;
  prefix: string;
  name: string;
  topic_id: number;
  created_at: Date;
  updated_at: Date;
}

export async function createTopic(input: TopicCreateInput): Promise<Topic> {
  const prefix = validateNewPrefix(input.prefix);
  const name = validateName(input.name);
  const threadId = validateThreadId(input.threadId);

  try {
    const result = await query<TopicRow>(
      `INSERT INTO topics (prefix, name, topic_id)
       VALUES ($1, $2, $3)
       RETURNING *`,
      [prefix, name, threadId],
    );
    console.log(`[topics] Added topic ${prefix} -> ${name} (thread ${threadId})`);
    return mapTopicRow(result.rows[0]);
  } catch (err) {
    if (isUniqueViolation(err)) {
      throw new DuplicateTopicError(prefix, err);
    }
    throw err;
  }
}

export async function getTopicByPrefix(rawPrefix: string): Promise<Topic> {
  const prefix = lookupPrefix(rawPrefix);
  const result = await query<TopicRow>(
    'SELECT * FROM topics WHERE prefix = $1',
    [prefix],
  );

  if (result.rows.length === 0) {
    throw new TopicNotFoundError(prefix);
  }

  return mapTopicRow(result.rows[0]);
}

export async function listTopics(): Promise<Topic[]> {
  const result = await query<TopicRow>('SELECT * FROM topics ORDER BY prefix ASC');
  return result.rows.map(mapTopicRow);
}

export async function updateTopic(rawPrefix: string, updates: TopicUpdateInput): Promise<Topic> {
  const prefix = lookupPrefix(rawPrefix);
  const setClauses: string[] = [];
  const values: unknown[] = [];

  if (updates.name !== undefined) {
    values.push(validateName(updates.name));
    setClauses.push(`name = $${values.length}`);
  }
  if (updates.threadId !== undefined) {
    values.push(validateThreadId(updates.threadId));
    setClauses.push(`topic_id = $${values.length}`);
  }

  if (setClauses.length === 0) {
    return getTopicByPrefix(prefix);
  }

  setClauses.push('updated_at = now()');
  values.push(prefix);

  const result = await query<TopicRow>(
    `UPDATE topics SET ${setClauses.join(', ')} WHERE prefix = $${values.length} RETURNING *`,
    values,
  );

  if (result.rows.length === 0) {
    throw new TopicNotFoundError(prefix);
  }

  console.log(`[topics] Updated topic ${prefix}`);
  return mapTopicRow(result.rows[0]);
}

export async function deleteTopic(rawPrefix: string): Promise<void> {
  const prefix = lookupPrefix(rawPrefix);
  const result = await query<{ id: number }>(
    'DELETE FROM topics WHERE prefix = $1 RETURNING id',
    [prefix],
  );

  if (result.rows.length === 0) {
    throw new TopicNotFoundError(prefix);
  }

  console.log(`[topics] Deleted topic ${prefix}`);
}

/** A prefix that fails the format check cannot exist, so it is reported as not found. */
function lookupPrefix(raw: string): string {
  return toLookupKey(raw, normalizePrefix, () => new TopicNotFoundError(raw));
}

function mapTopicRow(row: TopicRow): Topic {
  return {
    id: row.id,
    prefix: row.prefix,
    name: row.name,
    threadId: row.topic_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
