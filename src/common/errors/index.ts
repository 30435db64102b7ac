/**
 * Error hierarchy for the relay.
 *
 * Every error has a `code` (machine-readable) and `message` (human-readable)
 * so the API layer can map errors to HTTP status codes without string matching.
 */

export class RelayError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly statusCode: number = 500,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'RelayError';
  }
}

// ─── Database Errors ───────────────────────────────────────────

export class DatabaseError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super('DATABASE_ERROR', message, 500, cause);
    this.name = 'DatabaseError';
  }
}

// ─── Validation Errors ─────────────────────────────────────────

export class ValidationError extends RelayError {
  constructor(message: string, public readonly field: string) {
    super('VALIDATION_FAILED', message, 400);
    this.name = 'ValidationError';
  }
}

// ─── Topic Errors ──────────────────────────────────────────────

export class TopicNotFoundError extends RelayError {
  constructor(prefix: string) {
    super('TOPIC_NOT_FOUND', `Topic not found: ${prefix}`, 404);
    this.name = 'TopicNotFoundError';
  }
}

export class DuplicateTopicError extends RelayError {
  constructor(prefix: string, cause?: unknown) {
    super('TOPIC_EXISTS', `Topic with prefix '${prefix}' already exists`, 409, cause);
    this.name = 'DuplicateTopicError';
  }
}

// ─── Source Chat Errors ────────────────────────────────────────

export class SourceChatNotFoundError extends RelayError {
  constructor(chatId: string) {
    super('SOURCE_CHAT_NOT_FOUND', `Source chat not found: ${chatId}`, 404);
    this.name = 'SourceChatNotFoundError';
  }
}

export class DuplicateSourceChatError extends RelayError {
  constructor(chatId: string, cause?: unknown) {
    super('SOURCE_CHAT_EXISTS', `Source chat '${chatId}' already exists`, 409, cause);
    this.name = 'DuplicateSourceChatError';
  }
}

// ─── Config Errors ─────────────────────────────────────────────

export class ConfigKeyNotFoundError extends RelayError {
  constructor(key: string) {
    super('CONFIG_KEY_NOT_FOUND', `Config key not found: ${key}`, 404);
    this.name = 'ConfigKeyNotFoundError';
  }
}

export class ForwardingConfigError extends RelayError {
  constructor(message: string, public readonly key: string) {
    super('FORWARDING_CONFIG_INVALID', message, 500);
    this.name = 'ForwardingConfigError';
  }
}

// ─── Auth Errors ───────────────────────────────────────────────

export class AuthenticationError extends RelayError {
  constructor(message: string = 'Authentication required') {
    super('AUTH_REQUIRED', message, 401);
    this.name = 'AuthenticationError';
  }
}
