/**
 * Member patch
 *
 * Mirrors {@link Member}'s writable fields, each wrapped in a Patchable so that
 * only the fields a caller touched reach the request body. `proxyTags` is not a
 * delta: it is always sent, as the member's complete new list of tags.
 *
 * @example
 * ```typescript
 * const patch = createMemberPatch({
 *   pronouns: patched(unwrap(LimitedStr.tryFrom(100, 'they/them'))),
 *   description: patched(null),
 *   privacy: patched(MEMBER_PRIVACY_PRIVATE),
 * });
 * serializeMemberPatch(patch);
 * // { pronouns: 'they/them', description: null, proxy_tags: [], privacy: { visibility: 'private', ... } }
 * ```
 */

import { SILENT_LOGGER, type LimitedStr, type LimitedUrl, type Logger } from '@pkmodel/core';
import { encodeBoolean, encodeText, nullable, type JsonObject } from '../json';
import type { Rgb8 } from '../utils';
import { serializeMemberPrivacyPatch, type MemberPrivacyPatch } from './member-privacy';
import type {
  MEMBER_DESCRIPTION_LIMIT,
  MEMBER_NAME_LIMIT,
  MEMBER_PRONOUNS_LIMIT,
  MEMBER_URL_LIMIT,
} from './member';
import {
  emitPatched,
  isPatched,
  serializePatchableColor,
  serializePatchableTimestamp,
  unmodified,
  type Patchable,
} from './patchable';
import { serializeProxyTag, type ProxyTag } from './proxy-tag';

export interface MemberPatch {
  readonly name: Patchable<LimitedStr<typeof MEMBER_NAME_LIMIT>>;
  readonly displayName: Patchable<LimitedStr<typeof MEMBER_NAME_LIMIT> | null>;
  readonly color: Patchable<Rgb8 | null>;
  readonly birthday: Patchable<Date | null>;
  readonly pronouns: Patchable<LimitedStr<typeof MEMBER_PRONOUNS_LIMIT> | null>;
  readonly avatar: Patchable<LimitedUrl<typeof MEMBER_URL_LIMIT> | null>;
  readonly webhookAvatar: Patchable<LimitedUrl<typeof MEMBER_URL_LIMIT> | null>;
  readonly banner: Patchable<LimitedUrl<typeof MEMBER_URL_LIMIT> | null>;
  readonly description: Patchable<LimitedStr<typeof MEMBER_DESCRIPTION_LIMIT> | null>;
  readonly proxyTags: readonly ProxyTag[];
  readonly keepProxyTags: Patchable<boolean>;
  readonly textToSpeech: Patchable<boolean>;
  readonly autoproxyEnabled: Patchable<boolean | null>;
  readonly privacy: Patchable<MemberPrivacyPatch>;
}

export function createMemberPatch(fields: Partial<MemberPatch> = {}): MemberPatch {
  return {
    name: fields.name ?? unmodified(),
    displayName: fields.displayName ?? unmodified(),
    color: fields.color ?? unmodified(),
    birthday: fields.birthday ?? unmodified(),
    pronouns: fields.pronouns ?? unmodified(),
    avatar: fields.avatar ?? unmodified(),
    webhookAvatar: fields.webhookAvatar ?? unmodified(),
    banner: fields.banner ?? unmodified(),
    description: fields.description ?? unmodified(),
    proxyTags: fields.proxyTags ?? [],
    keepProxyTags: fields.keepProxyTags ?? unmodified(),
    textToSpeech: fields.textToSpeech ?? unmodified(),
    autoproxyEnabled: fields.autoproxyEnabled ?? unmodified(),
    privacy: fields.privacy ?? unmodified(),
  };
}

export interface SerializeOptions {
  logger?: Logger;
}

/**
 * Build the PATCH request body. Unmodified fields are left out entirely.
 */
export function serializeMemberPatch(patch: MemberPatch, options: SerializeOptions = {}): JsonObject {
  const logger = options.logger ?? SILENT_LOGGER;
  const text = nullable(encodeText);
  const body: JsonObject = {};

  emitPatched(body, 'name', patch.name, encodeText);
  emitPatched(body, 'display_name', patch.displayName, text);
  if (isPatched(patch.color)) {
    body.color = serializePatchableColor(patch.color);
  }
  if (isPatched(patch.birthday)) {
    body.birthday = serializePatchableTimestamp(patch.birthday, 'birthday');
  }
  emitPatched(body, 'pronouns', patch.pronouns, text);
  emitPatched(body, 'avatar_url', patch.avatar, text);
  emitPatched(body, 'webhook_avatar_url', patch.webhookAvatar, text);
  emitPatched(body, 'banner', patch.banner, text);
  emitPatched(body, 'description', patch.description, text);
  body.proxy_tags = patch.proxyTags.map(serializeProxyTag);
  emitPatched(body, 'keep_proxy', patch.keepProxyTags, encodeBoolean);
  emitPatched(body, 'text_to_speech', patch.textToSpeech, encodeBoolean);
  emitPatched(body, 'autoproxy_enabled', patch.autoproxyEnabled, nullable(encodeBoolean));
  emitPatched(body, 'privacy', patch.privacy, serializeMemberPrivacyPatch);

  logger.debug('Serialized member patch', { fields: Object.keys(body) });
  return body;
}
