/**
 * envelope.ts — The wrapper every Marvel response shares.
 *
 *   { code, status, copyright, attributionText, attributionHTML, etag,
 *     data: { offset, limit, total, count, results: [...] } }
 */

import { z } from 'zod';
import type { ResponseSchema } from '../types.js';

export interface DataContainer<T> {
  offset: number;
  limit: number;
  total: number;
  count: number;
  results: T[];
}

export interface DataWrapper<T> {
  code: number | string;
  status: string;
  copyright?: string;
  attributionText?: string;
  attributionHTML?: string;
  etag?: string;
  data: DataContainer<T>;
}

export const DataContainerSchema = z.object({
  offset: z.number(),
  limit: z.number(),
  total: z.number(),
  count: z.number(),
  results: z.array(z.unknown()),
}).passthrough();

// Envelope with results left undecoded
export const DataWrapperSchema = z.object({
  code: z.union([z.number(), z.string()]),
  status: z.string(),
  copyright: z.string().optional(),
  attributionText: z.string().optional(),
  attributionHTML: z.string().optional(),
  etag: z.string().optional(),
  data: DataContainerSchema,
}).passthrough();

/**
 * dataWrapperSchema — envelope whose results are decoded with `item`.
 * Issues inside a result are reported under `data.results.<index>`.
 */
export function dataWrapperSchema<T>(item: ResponseSchema<T>): ResponseSchema<DataWrapper<T>> {
  return DataWrapperSchema.transform((envelope, ctx): DataWrapper<T> => {
    const results: T[] = [];
    envelope.data.results.forEach((raw, index) => {
      const parsed = item.safeParse(raw);
      if (parsed.success) {
        results.push(parsed.data);
        return;
      }
      for (const issue of parsed.error.issues) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: issue.message,
          path: ['data', 'results', index, ...issue.path],
        });
      }
    });
    return { ...envelope, data: { ...envelope.data, results } };
  });
}
