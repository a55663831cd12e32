/**
 * Hex color codec
 *
 * The API exchanges colors as 6 hex digits without a leading "#".
 */

import { err, ok, type Result } from '@pkmodel/core';
import { ColorParseError } from '../errors';

export interface Rgb8 {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

const HEX_COLOR = /^[0-9a-fA-F]{6}$/;

function toHexByte(channel: number): string {
  if (!Number.isInteger(channel) || channel < 0 || channel > 255) {
    throw new RangeError(`Color channel out of range: ${channel}`);
  }
  return channel.toString(16).padStart(2, '0');
}

/**
 * @example
 * encodeColor({ r: 255, g: 0, b: 0 }) // "ff0000"
 */
export function encodeColor(color: Rgb8): string {
  return `${toHexByte(color.r)}${toHexByte(color.g)}${toHexByte(color.b)}`;
}

export function decodeColor(text: string): Result<Rgb8, ColorParseError> {
  if (!HEX_COLOR.test(text)) {
    return err(new ColorParseError(text));
  }
  return ok({
    r: parseInt(text.slice(0, 2), 16),
    g: parseInt(text.slice(2, 4), 16),
    b: parseInt(text.slice(4, 6), 16),
  });
}
