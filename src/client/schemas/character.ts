/**
 * character.ts — Zod schema for a Marvel character.
 */

import { z } from 'zod';
import { ImageSchema, SummaryListSchema, UrlSchema } from './common.js';

export const CharacterSchema = z.object({
  id: z.number(),
  name: z.string(),
  description: z.string().default(''),
  modified: z.string().optional(),
  resourceURI: z.string().optional(),
  urls: z.array(UrlSchema).default([]),
  thumbnail: ImageSchema.optional(),
  comics: SummaryListSchema.optional(),
  stories: SummaryListSchema.optional(),
  events: SummaryListSchema.optional(),
  series: SummaryListSchema.optional(),
}).passthrough();

export type Character = z.infer<typeof CharacterSchema>;
