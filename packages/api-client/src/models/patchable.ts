/**
 * Tri-state patch fields.
 *
 * A PATCH body must tell apart "leave this field alone" from "set this field",
 * and for nullable fields "set it to null" means "clear it on the server".
 * `T | null | undefined` cannot carry that distinction safely, so every patch
 * field is a `Patchable<T>`:
 *
 * - `unmodified()`: not part of the patch, never emitted
 * - `patched(value)`: emitted with the value's own encoding
 * - `patched(null)` on a `Patchable<T | null>`: emitted as JSON null
 */

import type { Encoder, JsonObject, JsonValue } from '../json';
import { nullable } from '../json';
import { SerializationContractError } from '../errors';
import { encodeColor, encodeTimestamp, type Rgb8 } from '../utils';

export type Unmodified = { readonly state: 'unmodified' };
export type Patched<T> = { readonly state: 'patched'; readonly value: T };
export type Patchable<T> = Unmodified | Patched<T>;

const UNMODIFIED: Unmodified = Object.freeze({ state: 'unmodified' });

export function unmodified<T = never>(): Patchable<T> {
  return UNMODIFIED;
}

export function patched<T>(value: T): Patchable<T> {
  const field: Patched<T> = { state: 'patched', value };
  return Object.freeze(field);
}

export function isUnmodified<T>(field: Patchable<T>): field is Unmodified {
  return field.state === 'unmodified';
}

export function isPatched<T>(field: Patchable<T>): field is Patched<T> {
  return field.state === 'patched';
}

/**
 * Encode a patched value.
 *
 * @throws SerializationContractError when `field` is unmodified; callers are
 * expected to have skipped it already (see {@link emitPatched}).
 */
export function serializePatchable<T>(field: Patchable<T>, encode: Encoder<T>, name?: string): JsonValue {
  if (isUnmodified(field)) {
    throw new SerializationContractError(name);
  }
  return encode(field.value);
}

/**
 * Write `key` into `target` only when `field` is patched.
 */
export function emitPatched<T>(target: JsonObject, key: string, field: Patchable<T>, encode: Encoder<T>): void {
  if (isUnmodified(field)) {
    return;
  }
  target[key] = serializePatchable(field, encode, key);
}

export function serializePatchableColor(field: Patchable<Rgb8 | null>): JsonValue {
  return serializePatchable(field, nullable(encodeColor), 'color');
}

export function serializePatchableTimestamp(field: Patchable<Date | null>, name?: string): JsonValue {
  return serializePatchable(field, nullable(encodeTimestamp), name);
}
