/**
 * Proxy tags: the prefix/suffix pair that marks a message as sent by a member.
 *
 * The API limits the two fragments together, not each on its own.
 */

import { z } from 'zod';
import { byteLength, err, ok, refineWith, type Result } from '@pkmodel/core';
import { ProxyTagLimitError } from '../errors';
import type { JsonObject } from '../json';

export const PROXY_TAG_SIZE_LIMIT = 100;

export interface ProxyTag {
  readonly prefix: string | null;
  readonly suffix: string | null;
}

export function createProxyTag(
  prefix: string | null | undefined,
  suffix: string | null | undefined
): Result<ProxyTag, ProxyTagLimitError> {
  const length = byteLength(prefix ?? '') + byteLength(suffix ?? '');
  if (length > PROXY_TAG_SIZE_LIMIT) {
    return err(new ProxyTagLimitError(PROXY_TAG_SIZE_LIMIT));
  }
  return ok(Object.freeze({ prefix: prefix ?? null, suffix: suffix ?? null }));
}

export function serializeProxyTag(tag: ProxyTag): JsonObject {
  return { prefix: tag.prefix, suffix: tag.suffix };
}

export const proxyTagSchema = z
  .object({
    prefix: z.string().nullish(),
    suffix: z.string().nullish(),
  })
  .transform(refineWith<{ prefix?: string | null; suffix?: string | null }, ProxyTag>(({ prefix, suffix }) =>
    createProxyTag(prefix, suffix)
  ));
