import { describe, it, test, expect } from 'vitest';
import * as fc from 'fast-check';
import { LimitedStr, LimitedUrl, byteLength } from '../limited';
import { LengthExceededError, UrlParseError } from '../errors';

describe('@pkmodel/core - limited', () => {
  describe('byteLength', () => {
    it('should count UTF-8 bytes', () => {
      expect(byteLength('hello')).toBe(5);
      expect(byteLength('é')).toBe(2);
      expect(byteLength('')).toBe(0);
    });
  });

  describe('LimitedStr', () => {
    it('should accept a value at the limit', () => {
      const result = LimitedStr.tryFrom(5, 'hello');
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.value).toBe('hello');
        expect(result.data.limit).toBe(5);
        expect(result.data.toString()).toBe('hello');
      }
    });

    it('should reject a value over the limit with the input and limit', () => {
      const result = LimitedStr.tryFrom(5, 'hello!');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(LengthExceededError);
        expect(result.error.value).toBe('hello!');
        expect(result.error.limit).toBe(5);
        expect(result.error.code).toBe('LENGTH_EXCEEDED');
        expect(result.error.message).toBe('String "hello!" should not exceed length 5');
      }
    });

    it('should count multi-byte characters by their bytes', () => {
      expect(LimitedStr.tryFrom(4, 'éé').success).toBe(true);
      expect(LimitedStr.tryFrom(3, 'éé').success).toBe(false);
    });

    it('should let unchecked values through regardless of length', () => {
      const value = LimitedStr.unchecked(2, 'too long');
      expect(value.value).toBe('too long');
      expect(value.limit).toBe(2);
    });

    it('should serialize to the plain string', () => {
      const result = LimitedStr.tryFrom(10, 'Robin');
      expect(JSON.stringify({ name: result.success ? result.data : null })).toBe('{"name":"Robin"}');
    });

    it('should compare by value', () => {
      expect(LimitedStr.unchecked(10, 'a').equals(LimitedStr.unchecked(10, 'a'))).toBe(true);
      expect(LimitedStr.unchecked(10, 'a').equals(LimitedStr.unchecked(10, 'b'))).toBe(false);
    });

    it('should be frozen', () => {
      expect(Object.isFrozen(LimitedStr.unchecked(10, 'a'))).toBe(true);
    });

    test('accepts every string within the limit unchanged', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 64 }), fc.string({ maxLength: 64 }), (limit, text) => {
          fc.pre(byteLength(text) <= limit);
          const result = LimitedStr.tryFrom(limit, text);
          expect(result.success).toBe(true);
          if (result.success) {
            expect(result.data.value).toBe(text);
          }
        }),
        { numRuns: 200 }
      );
    });

    test('rejects every string over the limit, reporting the limit', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 16 }), fc.string({ minLength: 1, maxLength: 64 }), (limit, text) => {
          fc.pre(byteLength(text) > limit);
          const result = LimitedStr.tryFrom(limit, text);
          expect(result.success).toBe(false);
          if (!result.success) {
            expect(result.error.limit).toBe(limit);
            expect(result.error.value).toBe(text);
          }
        }),
        { numRuns: 200 }
      );
    });
  });

  describe('LimitedUrl', () => {
    it('should parse a URL within the limit', () => {
      const result = LimitedUrl.tryFrom(256, 'https://example.com/avatar.png');
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.href).toBe('https://example.com/avatar.png');
        expect(result.data.url.hostname).toBe('example.com');
      }
    });

    it('should check length before parsing', () => {
      const result = LimitedUrl.tryFrom(5, 'not a url at all');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(LengthExceededError);
        expect(result.error.message).toBe('Url "not a url at all" should not exceed length 5');
      }
    });

    it('should report malformed URLs separately', () => {
      const result = LimitedUrl.tryFrom(256, 'not a url');
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(UrlParseError);
        expect(result.error.code).toBe('URL_MALFORMED');
      }
    });

    it('should hand out copies of the URL', () => {
      const result = LimitedUrl.tryFrom(256, 'https://example.com/a');
      expect(result.success).toBe(true);
      if (result.success) {
        const copy = result.data.url;
        copy.pathname = '/b';
        expect(result.data.href).toBe('https://example.com/a');
      }
    });

    it('should serialize to the normalized href', () => {
      const result = LimitedUrl.tryFrom(256, 'https://example.com');
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.toJSON()).toBe('https://example.com/');
      }
    });

    it('should wrap unchecked URLs without a length check', () => {
      const value = LimitedUrl.unchecked(4, new URL('https://example.com/long/path'));
      expect(value.href).toBe('https://example.com/long/path');
      expect(value.equals(LimitedUrl.unchecked(4, new URL('https://example.com/long/path')))).toBe(true);
    });
  });
});
