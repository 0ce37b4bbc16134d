/**
 * comic.ts — Zod schema for a Marvel comic.
 *
 * `description` and `isbn` come back as null for many older issues.
 */

import { z } from 'zod';
import {
  DateSchema,
  ImageSchema,
  PriceSchema,
  SummaryListSchema,
  SummarySchema,
  TextObjectSchema,
  UrlSchema,
} from './common.js';

export const ComicSchema = z.object({
  id: z.number(),
  digitalId: z.number().optional(),
  title: z.string(),
  issueNumber: z.number().optional(),
  variantDescription: z.string().optional(),
  description: z.string().nullable().default(null),
  modified: z.string().optional(),
  isbn: z.string().nullable().optional(),
  format: z.string().optional(),
  pageCount: z.number().optional(),
  textObjects: z.array(TextObjectSchema).default([]),
  resourceURI: z.string().optional(),
  urls: z.array(UrlSchema).default([]),
  series: SummarySchema.optional(),
  dates: z.array(DateSchema).default([]),
  prices: z.array(PriceSchema).default([]),
  thumbnail: ImageSchema.optional(),
  images: z.array(ImageSchema).default([]),
  creators: SummaryListSchema.optional(),
  characters: SummaryListSchema.optional(),
  stories: SummaryListSchema.optional(),
  events: SummaryListSchema.optional(),
}).passthrough();

export type Comic = z.infer<typeof ComicSchema>;
