/**
 * Zod schemas for reading API payloads.
 *
 * Each field schema runs the value's checked constructor, so a value over its
 * limit (or otherwise malformed) fails the parse instead of being truncated or
 * dropped.
 */

import { z } from 'zod';
import {
  LimitedStr,
  LimitedUrl,
  ShortId,
  parseUuid,
  refineWith,
  type Uuid,
} from '@pkmodel/core';
import { decodeColor, decodeTimestamp, type Rgb8 } from './utils';

export function limitedStrSchema<L extends number>(limit: L) {
  return z.string().transform(refineWith<string, LimitedStr<L>>((value) => LimitedStr.tryFrom(limit, value)));
}

export function limitedUrlSchema<L extends number>(limit: L) {
  return z.string().transform(refineWith<string, LimitedUrl<L>>((value) => LimitedUrl.tryFrom(limit, value)));
}

export const shortIdSchema = z.string().transform(refineWith<string, ShortId>((value) => ShortId.tryFrom(value)));

export const uuidSchema = z.string().transform(refineWith<string, Uuid>(parseUuid));

export const colorSchema = z.string().transform(refineWith<string, Rgb8>(decodeColor));

export const timestampSchema = z.string().transform(refineWith<string, Date>(decodeTimestamp));

/**
 * Absent and null both read as null.
 */
export function optional<S extends z.ZodTypeAny>(schema: S) {
  return schema.nullish().transform((value): z.output<S> | null => value ?? null);
}
