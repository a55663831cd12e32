/**
 * JSON shapes produced by the serializers.
 */

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue };

export type Encoder<T> = (value: T) => JsonValue;

export const encodeString: Encoder<string> = (value) => value;
export const encodeBoolean: Encoder<boolean> = (value) => value;
export const encodeNumber: Encoder<number> = (value) => value;

/** For values that already know their JSON text form (limited values, ids). */
export const encodeText: Encoder<{ toJSON(): string }> = (value) => value.toJSON();

/**
 * Lift an encoder over a nullable value; `null` encodes as JSON null.
 */
export function nullable<T>(encode: Encoder<T>): Encoder<T | null> {
  return (value) => (value === null ? null : encode(value));
}
