import { describe, it, expect } from 'vitest';
import {
  normalizePrefix,
  validateNewPrefix,
  toLookupKey,
  validateChatId,
  validateThreadId,
  validateName,
  validateConfigKey,
} from '@common/validation.js';
import { ValidationError } from '@common/errors/index.js';

describe('normalizePrefix', () => {
  it('lower-cases and strips a leading slash', () => {
    expect(normalizePrefix('/Sky')).toBe('sky');
    expect(normalizePrefix('  VEGAN ')).toBe('vegan');
  });

  it('keeps digits, underscores and non-latin letters', () => {
    expect(normalizePrefix('1')).toBe('1');
    expect(normalizePrefix('team_2')).toBe('team_2');
    expect(normalizePrefix('Эверест')).toBe('эверест');
  });

  it('accepts letters whose lower case carries a combining mark', () => {
    expect(normalizePrefix('İstanbul')).toBe('i\u0307stanbul');
  });

  it('rejects empty, spaced, punctuated and overlong prefixes', () => {
    expect(() => normalizePrefix('')).toThrow(ValidationError);
    expect(() => normalizePrefix('a b')).toThrow(ValidationError);
    expect(() => normalizePrefix('sky!')).toThrow(ValidationError);
    expect(() => normalizePrefix('a'.repeat(51))).toThrow(ValidationError);
  });

  it('names the offending field', () => {
    try {
      normalizePrefix('a b');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.field).toBe('prefix');
      }
    }
  });
});

describe('validateNewPrefix', () => {
  it('returns the normalized prefix', () => {
    expect(validateNewPrefix('/Sky')).toBe('sky');
  });

  it('rejects prefixes the relay answers itself', () => {
    expect(() => validateNewPrefix('WhereAmI')).toThrow("Prefix 'whereami' is reserved for a relay command");
  });
});

describe('toLookupKey', () => {
  const notFound = () => new Error('not found');

  it('passes valid keys through the normalizer', () => {
    expect(toLookupKey('/Sky', normalizePrefix, notFound)).toBe('sky');
  });

  it('reports a malformed key through the not-found factory', () => {
    expect(() => toLookupKey('a-b', normalizePrefix, notFound)).toThrow('not found');
  });

  it('rethrows errors that are not validation failures', () => {
    const broken = (): string => {
      throw new TypeError('boom');
    };
    expect(() => toLookupKey('sky', broken, notFound)).toThrow(TypeError);
  });
});

describe('validateChatId', () => {
  it('accepts signed integers as text', () => {
    expect(validateChatId('-1003000000001')).toBe('-1003000000001');
    expect(validateChatId(' 12345 ')).toBe('12345');
  });

  it('rejects anything else', () => {
    expect(() => validateChatId('@channel')).toThrow(ValidationError);
    expect(() => validateChatId('')).toThrow(ValidationError);
  });
});

describe('validateThreadId', () => {
  it('accepts positive integers', () => {
    expect(validateThreadId(2898)).toBe(2898);
  });

  it('rejects zero, negatives and fractions', () => {
    expect(() => validateThreadId(0)).toThrow(ValidationError);
    expect(() => validateThreadId(-5)).toThrow(ValidationError);
    expect(() => validateThreadId(1.5)).toThrow(ValidationError);
  });
});

describe('validateName', () => {
  it('trims names', () => {
    expect(validateName('  Sky  ')).toBe('Sky');
  });

  it('rejects blank names', () => {
    expect(() => validateName('   ')).toThrow('Invalid name');
  });
});

describe('validateConfigKey', () => {
  it('accepts any non-empty key up to 100 characters', () => {
    expect(validateConfigKey('sender_format')).toBe('sender_format');
    expect(validateConfigKey('SenderFormat')).toBe('SenderFormat');
    expect(validateConfigKey('1key')).toBe('1key');
    expect(validateConfigKey('k'.repeat(100))).toBe('k'.repeat(100));
  });

  it('rejects blank and overlong keys', () => {
    expect(() => validateConfigKey('')).toThrow(ValidationError);
    expect(() => validateConfigKey('   ')).toThrow(ValidationError);
    expect(() => validateConfigKey('k'.repeat(101))).toThrow(ValidationError);
  });
});
