/**
 * ISO 8601 timestamp codec
 *
 * Timestamps are written in UTC with millisecond precision
 * (`2024-03-01T12:00:00.000Z`). Reading also accepts an explicit offset and
 * bare `YYYY-MM-DD` dates, which the API uses for birthdays; those are read as
 * UTC midnight. Calendar dates that do not exist (`2023-02-30`) are rejected.
 */

import { z } from 'zod';
import { err, ok, type Result } from '@pkmodel/core';
import { TimestampParseError } from '../errors';

const IsoDateTime = z.string().datetime({ offset: true });
const IsoDate = z.string().date();

// `Date` only reads `+hh:mm` offsets; the schema also allows `+hh` and `+hhmm`.
const SHORT_OFFSET = /([+-]\d{2}):?(\d{2})?$/;

export function encodeTimestamp(date: Date): string {
  return date.toISOString();
}

export function decodeTimestamp(text: string): Result<Date, TimestampParseError> {
  let normalized: string;
  if (IsoDateTime.safeParse(text).success) {
    normalized = text.replace(
      SHORT_OFFSET,
      (_offset, hours: string, minutes?: string) => `${hours}:${minutes ?? '00'}`
    );
  } else if (IsoDate.safeParse(text).success) {
    normalized = text;
  } else {
    return err(new TimestampParseError(text));
  }
  const date = new Date(normalized);
  if (Number.isNaN(date.getTime())) {
    return err(new TimestampParseError(text));
  }
  return ok(date);
}
