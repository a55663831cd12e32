/**
 * Errors raised by the resource models and their codecs.
 */

import { ModelError } from '@pkmodel/core';

export class ColorParseError extends ModelError {
  constructor(public readonly input: string) {
    super(`"${input}" is not a 6 digit hex color`, 'COLOR_MALFORMED', { input });
    this.name = 'ColorParseError';
  }
}

export class TimestampParseError extends ModelError {
  constructor(public readonly input: string) {
    super(`"${input}" is not an ISO 8601 date or date-time`, 'TIMESTAMP_MALFORMED', { input });
    this.name = 'TimestampParseError';
  }
}

export class ProxyTagLimitError extends ModelError {
  constructor(public readonly limit: number) {
    super(`proxy tags must not exceed ${limit} total characters`, 'PROXY_TAG_LIMIT_EXCEEDED', { limit });
    this.name = 'ProxyTagLimitError';
  }
}

/**
 * Thrown, never returned: an unmodified patch field reached a serializer.
 * Field emission skips unmodified values, so this is always a bug in the
 * caller.
 */
export class SerializationContractError extends ModelError {
  constructor(field?: string) {
    super(
      field
        ? `unmodified patchable "${field}" should not be serialized`
        : 'unmodified patchable should not be serialized',
      'SERIALIZATION_CONTRACT_VIOLATION',
      field ? { field } : undefined
    );
    this.name = 'SerializationContractError';
  }
}
