import { z } from 'zod';

export const PRIVACY_LEVELS = ['public', 'private'] as const;

export type Privacy = (typeof PRIVACY_LEVELS)[number];

export const privacySchema = z.enum(PRIVACY_LEVELS);
