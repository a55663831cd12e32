/**
 * Member resource
 *
 * Model fields are camelCase; the wire names are snake_case with a few
 * renames (`system`, `avatar_url`, `webhook_avatar_url`, `keep_proxy`).
 */

import { z } from 'zod';
import {
  SILENT_LOGGER,
  safeParse,
  type LimitedStr,
  type LimitedUrl,
  type Logger,
  type Result,
  type ShortId,
  type Uuid,
  type ValidationError,
} from '@pkmodel/core';
import { encodeText, nullable, type JsonObject } from '../json';
import {
  limitedStrSchema,
  limitedUrlSchema,
  optional,
  shortIdSchema,
  timestampSchema,
  uuidSchema,
  colorSchema,
} from '../schemas';
import { encodeColor, encodeTimestamp, type Rgb8 } from '../utils';
import { memberPrivacySchema, serializeMemberPrivacy, type MemberPrivacy } from './member-privacy';
import { proxyTagSchema, serializeProxyTag, type ProxyTag } from './proxy-tag';

export const MEMBER_NAME_LIMIT = 100;
export const MEMBER_PRONOUNS_LIMIT = 100;
export const MEMBER_DESCRIPTION_LIMIT = 1000;
export const MEMBER_URL_LIMIT = 256;

export interface Member {
  readonly id: ShortId;
  readonly uuid: Uuid;
  readonly systemId: ShortId;
  readonly name: LimitedStr<typeof MEMBER_NAME_LIMIT>;
  readonly displayName: LimitedStr<typeof MEMBER_NAME_LIMIT> | null;
  readonly color: Rgb8 | null;
  readonly birthday: Date | null;
  readonly pronouns: LimitedStr<typeof MEMBER_PRONOUNS_LIMIT> | null;
  readonly avatar: LimitedUrl<typeof MEMBER_URL_LIMIT> | null;
  readonly webhookAvatar: LimitedUrl<typeof MEMBER_URL_LIMIT> | null;
  readonly banner: LimitedUrl<typeof MEMBER_URL_LIMIT> | null;
  readonly description: LimitedStr<typeof MEMBER_DESCRIPTION_LIMIT> | null;
  readonly created: Date | null;
  readonly proxyTags: readonly ProxyTag[];
  readonly keepProxyTags: boolean;
  readonly textToSpeech: boolean;
  readonly autoproxyEnabled: boolean | null;
  readonly messageCount: number | null;
  readonly lastMessageTimestamp: Date | null;
  readonly privacy: MemberPrivacy | null;
}

const U32_MAX = 4294967295;

export const memberSchema = z
  .object({
    id: shortIdSchema,
    uuid: uuidSchema,
    system: shortIdSchema,
    name: limitedStrSchema(MEMBER_NAME_LIMIT),
    display_name: optional(limitedStrSchema(MEMBER_NAME_LIMIT)),
    color: optional(colorSchema),
    birthday: optional(timestampSchema),
    pronouns: optional(limitedStrSchema(MEMBER_PRONOUNS_LIMIT)),
    avatar_url: optional(limitedUrlSchema(MEMBER_URL_LIMIT)),
    webhook_avatar_url: optional(limitedUrlSchema(MEMBER_URL_LIMIT)),
    banner: optional(limitedUrlSchema(MEMBER_URL_LIMIT)),
    description: optional(limitedStrSchema(MEMBER_DESCRIPTION_LIMIT)),
    created: optional(timestampSchema),
    proxy_tags: z.array(proxyTagSchema),
    keep_proxy: z.boolean(),
    text_to_speech: z.boolean(),
    autoproxy_enabled: optional(z.boolean()),
    message_count: optional(z.number().int().min(0).max(U32_MAX)),
    last_message_timestamp: optional(timestampSchema),
    privacy: optional(memberPrivacySchema),
  })
  .transform(
    (wire): Member => ({
      id: wire.id,
      uuid: wire.uuid,
      systemId: wire.system,
      name: wire.name,
      displayName: wire.display_name,
      color: wire.color,
      birthday: wire.birthday,
      pronouns: wire.pronouns,
      avatar: wire.avatar_url,
      webhookAvatar: wire.webhook_avatar_url,
      banner: wire.banner,
      description: wire.description,
      created: wire.created,
      proxyTags: wire.proxy_tags,
      keepProxyTags: wire.keep_proxy,
      textToSpeech: wire.text_to_speech,
      autoproxyEnabled: wire.autoproxy_enabled,
      messageCount: wire.message_count,
      lastMessageTimestamp: wire.last_message_timestamp,
      privacy: wire.privacy,
    })
  );

export interface ParseOptions {
  logger?: Logger;
}

/**
 * Read a member payload returned by the API.
 *
 * Any field that breaks its limit or format fails the whole parse.
 */
export function parseMember(input: unknown, options: ParseOptions = {}): Result<Member, ValidationError> {
  const logger = options.logger ?? SILENT_LOGGER;
  const result = safeParse(memberSchema, input);
  if (!result.success) {
    logger.debug('Member payload rejected', { issues: result.error.details?.issues });
  }
  return result;
}

export function serializeMember(member: Member): JsonObject {
  const text = nullable(encodeText);
  const timestamp = nullable(encodeTimestamp);
  return {
    id: member.id.value,
    uuid: member.uuid,
    system: member.systemId.value,
    name: member.name.value,
    display_name: text(member.displayName),
    color: nullable(encodeColor)(member.color),
    birthday: timestamp(member.birthday),
    pronouns: text(member.pronouns),
    avatar_url: text(member.avatar),
    webhook_avatar_url: text(member.webhookAvatar),
    banner: text(member.banner),
    description: text(member.description),
    created: timestamp(member.created),
    proxy_tags: member.proxyTags.map(serializeProxyTag),
    keep_proxy: member.keepProxyTags,
    text_to_speech: member.textToSpeech,
    autoproxy_enabled: member.autoproxyEnabled,
    message_count: member.messageCount,
    last_message_timestamp: timestamp(member.lastMessageTimestamp),
    privacy: member.privacy === null ? null : serializeMemberPrivacy(member.privacy),
  };
}
