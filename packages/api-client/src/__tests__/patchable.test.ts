import { describe, it, test, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  unmodified,
  patched,
  isUnmodified,
  isPatched,
  serializePatchable,
  emitPatched,
  serializePatchableColor,
  serializePatchableTimestamp,
} from '../models/patchable';
import { encodeNumber, encodeString, nullable, type JsonObject } from '../json';
import { SerializationContractError } from '../errors';

describe('Patchable', () => {
  it('should report its state', () => {
    expect(isUnmodified(unmodified())).toBe(true);
    expect(isPatched(unmodified())).toBe(false);
    expect(isUnmodified(patched(null))).toBe(false);
    expect(isPatched(patched('x'))).toBe(true);
  });

  it('should encode a patched value with the given encoder', () => {
    expect(serializePatchable(patched('Robin'), encodeString)).toBe('Robin');
  });

  it('should encode patched null as null through nullable', () => {
    expect(serializePatchable(patched<string | null>(null), nullable(encodeString))).toBeNull();
  });

  it('should throw when asked to serialize an unmodified value', () => {
    expect(() => serializePatchable(unmodified<string>(), encodeString)).toThrow(SerializationContractError);
    expect(() => serializePatchable(unmodified<string>(), encodeString, 'name')).toThrow(
      'unmodified patchable "name" should not be serialized'
    );
  });

  describe('emitPatched', () => {
    it('should leave the key out entirely when unmodified', () => {
      const body: JsonObject = {};
      emitPatched(body, 'name', unmodified<string>(), encodeString);
      expect(body).toEqual({});
      expect('name' in body).toBe(false);
    });

    it('should write null for a field patched to null', () => {
      const body: JsonObject = {};
      emitPatched(body, 'description', patched<string | null>(null), nullable(encodeString));
      expect(body).toEqual({ description: null });
    });

    test('omits every unmodified field and writes every patched one', () => {
      fc.assert(
        fc.property(fc.option(fc.integer(), { nil: undefined }), (value) => {
          const body: JsonObject = {};
          emitPatched(body, 'count', value === undefined ? unmodified<number>() : patched(value), encodeNumber);
          expect(body).toEqual(value === undefined ? {} : { count: value });
        }),
        { numRuns: 100 }
      );
    });
  });

  describe('custom field adapters', () => {
    it('should encode a patched color as hex', () => {
      expect(serializePatchableColor(patched({ r: 255, g: 0, b: 0 }))).toBe('ff0000');
    });

    it('should encode a color cleared to null as null', () => {
      expect(serializePatchableColor(patched(null))).toBeNull();
    });

    it('should encode a patched timestamp as ISO 8601', () => {
      expect(serializePatchableTimestamp(patched(new Date(Date.UTC(2000, 0, 1))))).toBe(
        '2000-01-01T00:00:00.000Z'
      );
    });

    it('should fail loudly on unmodified values', () => {
      expect(() => serializePatchableColor(unmodified())).toThrow(SerializationContractError);
      expect(() => serializePatchableTimestamp(unmodified(), 'birthday')).toThrow(
        'unmodified patchable "birthday" should not be serialized'
      );
    });
  });
});
