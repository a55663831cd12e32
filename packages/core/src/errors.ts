/**
 * Common error classes
 *
 * Every fallible constructor in this package returns one of these inside a
 * failed Result rather than throwing it.
 */

/**
 * Base error class for model errors
 */
export class ModelError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ModelError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Error returned when a payload fails schema validation
 */
export class ValidationError extends ModelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * A bounded value was given more bytes than its limit allows.
 */
export class LengthExceededError extends ModelError {
  constructor(
    public readonly value: string,
    public readonly limit: number,
    kind: 'string' | 'url' = 'string'
  ) {
    const label = kind === 'url' ? 'Url' : 'String';
    super(`${label} "${value}" should not exceed length ${limit}`, 'LENGTH_EXCEEDED', { value, limit });
    this.name = 'LengthExceededError';
  }
}

/**
 * Text within the length bound that is not a valid URL.
 */
export class UrlParseError extends ModelError {
  constructor(
    public readonly input: string,
    cause: unknown
  ) {
    const detail = cause instanceof Error ? cause.message : 'Invalid URL';
    super(`Url "${input}" could not be parsed: ${detail}`, 'URL_MALFORMED', { input });
    this.name = 'UrlParseError';
    this.cause = cause;
  }
}

export type ShortIdErrorCode = 'INVALID_CHARACTERS' | 'INCORRECT_LENGTH';

const SHORT_ID_MESSAGES: Record<ShortIdErrorCode, string> = {
  INVALID_CHARACTERS: 'A ShortId should only contain alphabetical characters (a-z)',
  INCORRECT_LENGTH: 'A ShortId should only be 5 characters in length',
};

export class ShortIdError extends ModelError {
  constructor(
    public override readonly code: ShortIdErrorCode,
    public readonly input: string
  ) {
    super(SHORT_ID_MESSAGES[code], code, { input });
    this.name = 'ShortIdError';
  }
}

export class UuidParseError extends ModelError {
  constructor(public readonly input: string) {
    super(`"${input}" is not a valid UUID`, 'UUID_MALFORMED', { input });
    this.name = 'UuidParseError';
  }
}

export class SnowflakeParseError extends ModelError {
  constructor(public readonly input: string) {
    super(`"${input}" is not an unsigned 64-bit account id`, 'SNOWFLAKE_MALFORMED', { input });
    this.name = 'SnowflakeParseError';
  }
}
