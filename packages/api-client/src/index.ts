/**
 * @pkmodel/api-client
 *
 * Resource models for the API: full member payloads, member patches and the
 * codecs behind them.
 *
 * Example:
 * ```typescript
 * import { LimitedStr, unwrap } from '@pkmodel/core';
 * import { createMemberPatch, patched, serializeMemberPatch } from '@pkmodel/api-client';
 *
 * const patch = createMemberPatch({
 *   name: patched(unwrap(LimitedStr.tryFrom(100, 'Robin'))),
 *   color: patched({ r: 255, g: 0, b: 0 }),
 * });
 *
 * serializeMemberPatch(patch); // { name: 'Robin', color: 'ff0000', proxy_tags: [] }
 * ```
 */

// Errors
export * from './errors';

// JSON encoding
export type { JsonValue, JsonObject, Encoder } from './json';
export { encodeString, encodeBoolean, encodeNumber, encodeText, nullable } from './json';

// Codecs
export * from './utils/index';

// Field schemas
export {
  limitedStrSchema,
  limitedUrlSchema,
  shortIdSchema,
  uuidSchema,
  colorSchema,
  timestampSchema,
  optional,
} from './schemas';

// Patch fields
export type { Patchable, Patched, Unmodified } from './models/patchable';
export {
  unmodified,
  patched,
  isUnmodified,
  isPatched,
  serializePatchable,
  emitPatched,
  serializePatchableColor,
  serializePatchableTimestamp,
} from './models/patchable';

// Privacy
export type { Privacy } from './models/privacy';
export { PRIVACY_LEVELS, privacySchema } from './models/privacy';
export type { MemberPrivacy, MemberPrivacyPatch } from './models/member-privacy';
export {
  memberPrivacySchema,
  createMemberPrivacyPatch,
  MEMBER_PRIVACY_PUBLIC,
  MEMBER_PRIVACY_PRIVATE,
  serializeMemberPrivacy,
  serializeMemberPrivacyPatch,
} from './models/member-privacy';

// Proxy tags
export type { ProxyTag } from './models/proxy-tag';
export { PROXY_TAG_SIZE_LIMIT, createProxyTag, serializeProxyTag, proxyTagSchema } from './models/proxy-tag';

// Members
export type { Member, ParseOptions } from './models/member';
export {
  MEMBER_NAME_LIMIT,
  MEMBER_PRONOUNS_LIMIT,
  MEMBER_DESCRIPTION_LIMIT,
  MEMBER_URL_LIMIT,
  memberSchema,
  parseMember,
  serializeMember,
} from './models/member';
export type { MemberPatch, SerializeOptions } from './models/member-patch';
export { createMemberPatch, serializeMemberPatch } from './models/member-patch';
