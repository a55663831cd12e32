/**
 * Member privacy settings and their patch form.
 */

import { z } from 'zod';
import { encodeString, type JsonObject } from '../json';
import { emitPatched, patched, unmodified, type Patchable } from './patchable';
import { privacySchema, type Privacy } from './privacy';

export interface MemberPrivacy {
  readonly visibility: Privacy;
  readonly name: Privacy;
  readonly description: Privacy;
  readonly birthday: Privacy;
  readonly pronouns: Privacy;
  readonly avatar: Privacy;
  readonly metadata: Privacy;
}

export const memberPrivacySchema = z.object({
  visibility: privacySchema,
  name: privacySchema,
  description: privacySchema,
  birthday: privacySchema,
  pronouns: privacySchema,
  avatar: privacySchema,
  metadata: privacySchema,
});

export interface MemberPrivacyPatch {
  readonly visibility: Patchable<Privacy>;
  readonly name: Patchable<Privacy>;
  readonly description: Patchable<Privacy>;
  readonly birthday: Patchable<Privacy>;
  readonly pronouns: Patchable<Privacy>;
  readonly avatar: Patchable<Privacy>;
  readonly metadata: Patchable<Privacy>;
}

export function createMemberPrivacyPatch(fields: Partial<MemberPrivacyPatch> = {}): MemberPrivacyPatch {
  return {
    visibility: fields.visibility ?? unmodified(),
    name: fields.name ?? unmodified(),
    description: fields.description ?? unmodified(),
    birthday: fields.birthday ?? unmodified(),
    pronouns: fields.pronouns ?? unmodified(),
    avatar: fields.avatar ?? unmodified(),
    metadata: fields.metadata ?? unmodified(),
  };
}

function allFields(privacy: Privacy): MemberPrivacyPatch {
  const field = patched(privacy);
  return Object.freeze({
    visibility: field,
    name: field,
    description: field,
    birthday: field,
    pronouns: field,
    avatar: field,
    metadata: field,
  });
}

/** Every privacy field patched to public. */
export const MEMBER_PRIVACY_PUBLIC: MemberPrivacyPatch = allFields('public');

/** Every privacy field patched to private. */
export const MEMBER_PRIVACY_PRIVATE: MemberPrivacyPatch = allFields('private');

export function serializeMemberPrivacy(privacy: MemberPrivacy): JsonObject {
  return {
    visibility: privacy.visibility,
    name: privacy.name,
    description: privacy.description,
    birthday: privacy.birthday,
    pronouns: privacy.pronouns,
    avatar: privacy.avatar,
    metadata: privacy.metadata,
  };
}

export function serializeMemberPrivacyPatch(patch: MemberPrivacyPatch): JsonObject {
  const body: JsonObject = {};
  emitPatched(body, 'visibility', patch.visibility, encodeString);
  emitPatched(body, 'name', patch.name, encodeString);
  emitPatched(body, 'description', patch.description, encodeString);
  emitPatched(body, 'birthday', patch.birthday, encodeString);
  emitPatched(body, 'pronouns', patch.pronouns, encodeString);
  emitPatched(body, 'avatar', patch.avatar, encodeString);
  emitPatched(body, 'metadata', patch.metadata, encodeString);
  return body;
}
