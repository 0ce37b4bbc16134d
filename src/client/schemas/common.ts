/**
 * common.ts — Zod schemas for the small value objects every Marvel resource embeds.
 *
 * Objects pass unknown keys through: the API adds fields over time and
 * callers asking for raw data should still see them.
 */

import { z } from 'zod';

export const ImageSchema = z.object({
  path: z.string(),
  extension: z.string(),
}).passthrough();

export type Image = z.infer<typeof ImageSchema>;

export const UrlSchema = z.object({
  type: z.string(),
  url: z.string(),
}).passthrough();

export const TextObjectSchema = z.object({
  type: z.string(),
  language: z.string(),
  text: z.string(),
}).passthrough();

export const DateSchema = z.object({
  type: z.string(),
  date: z.string(),
}).passthrough();

export const PriceSchema = z.object({
  type: z.string(),
  price: z.number(),
}).passthrough();

// Summary of a related resource: {resourceURI, name[, role | type]}
export const SummarySchema = z.object({
  resourceURI: z.string(),
  name: z.string(),
  role: z.string().optional(),
  type: z.string().optional(),
}).passthrough();

export type Summary = z.infer<typeof SummarySchema>;

/**
 * resourceListSchema — the `{available, returned, collectionURI, items}`
 * block used for every relationship list.
 */
export function resourceListSchema<T extends z.ZodTypeAny>(item: T) {
  return z.object({
    available: z.number(),
    returned: z.number().optional(),
    collectionURI: z.string(),
    items: z.array(item).default([]),
  }).passthrough();
}

export const SummaryListSchema = resourceListSchema(SummarySchema);

export type SummaryList = z.infer<typeof SummaryListSchema>;

/**
 * Renders an image reference as a CDN URL, e.g. `${path}/portrait_xlarge.jpg`.
 */
export function imageUrl(image: Image, variant?: string): string {
  return variant ? `${image.path}/${variant}.${image.extension}` : `${image.path}.${image.extension}`;
}
