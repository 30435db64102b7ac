import { describe, it, expect, beforeEach, vi } from 'vitest';
import { setupTestDatabase } from '../../helpers/test-database.js';
import {
  seedDefaultConfig,
  getConfigEntry,
  getConfigValue,
  getAllConfig,
  listConfigEntries,
  setConfigValue,
} from '@database/repositories/bot-config-repository.js';
import { ConfigKeyNotFoundError, ValidationError } from '@common/errors/index.js';

describe('bot-config-repository', () => {
  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    await setupTestDatabase();
  });

  describe('seedDefaultConfig', () => {
    it('inserts the default keys into an empty table', async () => {
      const inserted = await seedDefaultConfig();

      expect([...inserted].sort()).toEqual([
        'debug_mode',
        'discovery_mode',
        'include_sender_info',
        'sender_format',
        'target_chat_id',
      ]);
      expect(await getAllConfig()).toEqual({
        target_chat_id: '',
        include_sender_info: 'true',
        sender_format: '{message}\nSent by: {sender_name} ({sender_username})',
        discovery_mode: 'false',
        debug_mode: 'false',
      });
    });

    it('is idempotent: a second run inserts nothing', async () => {
      await seedDefaultConfig();
      const second = await seedDefaultConfig();

      expect(second).toEqual([]);
      expect(await listConfigEntries()).toHaveLength(5);
    });

    it('never overwrites a value an operator has set', async () => {
      await seedDefaultConfig();
      await setConfigValue('target_chat_id', '-1002000000000');

      await seedDefaultConfig();

      expect(await getConfigValue('target_chat_id')).toBe('-1002000000000');
    });

    it('fills in only the keys that are missing', async () => {
      await setConfigValue('include_sender_info', 'false');

      const inserted = await seedDefaultConfig();

      expect([...inserted].sort()).toEqual(['debug_mode', 'discovery_mode', 'sender_format', 'target_chat_id']);
      expect(await getConfigValue('include_sender_info')).toBe('false');
    });
  });

  it('reports a missing key as not found instead of returning a default', async () => {
    await expect(getConfigValue('target_chat_id')).rejects.toBeInstanceOf(ConfigKeyNotFoundError);
    await expect(getConfigEntry('no_such_key')).rejects.toBeInstanceOf(ConfigKeyNotFoundError);
  });

  it('reports a lookup with a key of the wrong case as not found', async () => {
    await seedDefaultConfig();

    await expect(getConfigEntry('TARGET_CHAT_ID')).rejects.toBeInstanceOf(ConfigKeyNotFoundError);
  });

  it('reports a lookup with a blank or overlong key as not found', async () => {
    await expect(getConfigEntry('   ')).rejects.toBeInstanceOf(ConfigKeyNotFoundError);
    await expect(getConfigValue('k'.repeat(101))).rejects.toBeInstanceOf(ConfigKeyNotFoundError);
  });

  it('stores keys in any case', async () => {
    await setConfigValue('SenderFormat', '{message}');

    expect(await getConfigValue('SenderFormat')).toBe('{message}');
  });

  it('rejects blank and overlong keys on write', async () => {
    await expect(setConfigValue('   ', 'x')).rejects.toBeInstanceOf(ValidationError);
    await expect(setConfigValue('k'.repeat(101), 'x')).rejects.toBeInstanceOf(ValidationError);
  });

  it('inserts a new key with its description', async () => {
    const entry = await setConfigValue('welcome_text', 'hello', 'Greeting for new chats');

    expect(entry.key).toBe('welcome_text');
    expect(entry.value).toBe('hello');
    expect(entry.description).toBe('Greeting for new chats');
  });

  it('keeps the stored description when an update omits it', async () => {
    await seedDefaultConfig();

    const entry = await setConfigValue('sender_format', '{sender_name}: {message}');

    expect(entry.value).toBe('{sender_name}: {message}');
    expect(entry.description).toBe('Template for forwarded messages when sender info is included');
  });

  it('replaces the description when an update provides one', async () => {
    await seedDefaultConfig();

    const entry = await setConfigValue('include_sender_info', 'false', 'Sender annotation switch');

    expect(entry.description).toBe('Sender annotation switch');
    expect(await getConfigValue('include_sender_info')).toBe('false');
  });

  it('lists entries ordered by key', async () => {
    await seedDefaultConfig();

    const keys = (await listConfigEntries()).map((e) => e.key);
    expect(keys).toEqual(['include_sender_info', 'sender_format', 'target_chat_id']);
  });
});
