/**
 * Identifiers and references for systems, members and groups.
 *
 * The API addresses a resource by its short id (5 letters, e.g. "ptckn"), by
 * its UUID, and in the case of systems also by a linked account id or by
 * "@me" for the authenticated system. Short ids are friendly for users but the
 * API's operators may reassign them on request, so store UUIDs instead.
 */

import { validate as isUuid } from 'uuid';
import { ShortIdError, SnowflakeParseError, UuidParseError } from './errors';
import { byteLength } from './limited';
import { err, ok, type Result } from './validation';

export const SHORT_ID_LENGTH = 5;

const SHORT_ID_CHARACTERS = /^[a-z]+$/;

export class ShortId {
  private constructor(readonly value: string) {
    Object.freeze(this);
  }

  /**
   * Length is checked before characters, so "ABCDEFG" reports
   * INCORRECT_LENGTH rather than INVALID_CHARACTERS.
   */
  static tryFrom(value: string): Result<ShortId, ShortIdError> {
    if (byteLength(value) !== SHORT_ID_LENGTH) {
      return err(new ShortIdError('INCORRECT_LENGTH', value));
    }
    if (!SHORT_ID_CHARACTERS.test(value)) {
      return err(new ShortIdError('INVALID_CHARACTERS', value));
    }
    return ok(new ShortId(value));
  }

  equals(other: ShortId): boolean {
    return this.value === other.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

// Branded types for values parsed by their own codecs
export type Uuid = string & { readonly __brand: 'Uuid' };
export type Snowflake = bigint & { readonly __brand: 'Snowflake' };

const SNOWFLAKE_MAX = 2n ** 64n - 1n;
const DECIMAL = /^\d+$/;

/**
 * Parse a UUID into its canonical lowercase form.
 */
export function parseUuid(text: string): Result<Uuid, UuidParseError> {
  if (!isUuid(text)) {
    return err(new UuidParseError(text));
  }
  return ok(text.toLowerCase() as Uuid);
}

/**
 * Parse a linked account id, from decimal text or a bigint.
 */
export function parseSnowflake(input: string | bigint): Result<Snowflake, SnowflakeParseError> {
  if (typeof input === 'string' && !DECIMAL.test(input)) {
    return err(new SnowflakeParseError(input));
  }
  const value = typeof input === 'string' ? BigInt(input) : input;
  if (value < 0n || value > SNOWFLAKE_MAX) {
    return err(new SnowflakeParseError(String(input)));
  }
  return ok(value as Snowflake);
}

/**
 * Reference to a member or group.
 *
 * Systems have more ways to be referenced, see {@link SystemRef}.
 */
export type GenericRef =
  | { readonly type: 'shortId'; readonly shortId: ShortId }
  | { readonly type: 'uuid'; readonly uuid: Uuid };

/**
 * Reference to a system.
 */
export type SystemRef =
  | { readonly type: 'shortId'; readonly shortId: ShortId }
  | { readonly type: 'uuid'; readonly uuid: Uuid }
  | { readonly type: 'snowflake'; readonly snowflake: Snowflake }
  | { readonly type: 'current' };

/** Path token the API resolves to the authenticated system. */
export const CURRENT_SYSTEM_TOKEN = '@me';

export const CURRENT_SYSTEM: SystemRef = Object.freeze({ type: 'current' });

/**
 * Text is only ever read as a short id. Build UUID references from a parsed
 * {@link Uuid} instead.
 */
export function genericRefFromString(text: string): Result<GenericRef, ShortIdError> {
  const shortId = ShortId.tryFrom(text);
  return shortId.success ? ok(genericRefFromShortId(shortId.data)) : shortId;
}

export function genericRefFromShortId(shortId: ShortId): GenericRef {
  return { type: 'shortId', shortId };
}

export function genericRefFromUuid(uuid: Uuid): GenericRef {
  return { type: 'uuid', uuid };
}

export function formatGenericRef(ref: GenericRef): string {
  switch (ref.type) {
    case 'shortId':
      return ref.shortId.value;
    case 'uuid':
      return ref.uuid;
  }
}

export function systemRefFromString(text: string): Result<SystemRef, ShortIdError> {
  const shortId = ShortId.tryFrom(text);
  return shortId.success ? ok(systemRefFromShortId(shortId.data)) : shortId;
}

export function systemRefFromShortId(shortId: ShortId): SystemRef {
  return { type: 'shortId', shortId };
}

export function systemRefFromUuid(uuid: Uuid): SystemRef {
  return { type: 'uuid', uuid };
}

export function systemRefFromSnowflake(snowflake: Snowflake): SystemRef {
  return { type: 'snowflake', snowflake };
}

export function formatSystemRef(ref: SystemRef): string {
  switch (ref.type) {
    case 'shortId':
      return ref.shortId.value;
    case 'uuid':
      return ref.uuid;
    case 'snowflake':
      return ref.snowflake.toString();
    case 'current':
      return CURRENT_SYSTEM_TOKEN;
  }
}
