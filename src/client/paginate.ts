/**
 * paginate.ts — Page envelope for Marvel list endpoints.
 *
 * Marvel paginates with offset/limit and reports `total` in the data
 * container, so whether more results exist is computed from the numbers
 * rather than read from a Link header.
 *
 * Enforces:
 *   - Every list call returns PaginatedResult, never a bare array
 *   - limit is clamped to the API maximum of 100
 */

import type { DataWrapper } from './schemas/index.js';

export const MAX_PAGE_SIZE = 100;

export interface PaginatedResult<T> {
  items: T[];
  total: number;
  offset: number;
  has_more: boolean;
  next_offset: number | null;
}

/**
 * toPage — converts a decoded envelope into a PaginatedResult.
 */
export function toPage<T>(wrapper: DataWrapper<T>): PaginatedResult<T> {
  const { offset, count, total, results } = wrapper.data;
  const consumed = offset + count;
  // count=0 with results remaining would loop forever; treat it as the end
  const has_more = count > 0 && consumed < total;
  return {
    items: results,
    total,
    offset,
    has_more,
    next_offset: has_more ? consumed : null,
  };
}

export function clampLimit(limit: number | undefined): number | undefined {
  if (limit === undefined) return undefined;
  return Math.min(Math.max(1, Math.floor(limit)), MAX_PAGE_SIZE);
}

/**
 * paginateAll — walks every page of a list endpoint, yielding one page at a time.
 *
 * @param fetchPage  Fetches the page starting at `offset`
 * @param maxItems   Stop after this many items in total (default: no limit)
 */
export async function* paginateAll<T>(
  fetchPage: (offset: number) => Promise<PaginatedResult<T>>,
  startOffset = 0,
  maxItems = Number.POSITIVE_INFINITY,
): AsyncGenerator<T[], void, unknown> {
  let offset: number | null = startOffset;
  let yielded = 0;

  while (offset !== null && yielded < maxItems) {
    const page: PaginatedResult<T> = await fetchPage(offset);
    const items = page.items.slice(0, maxItems - yielded);
    if (items.length > 0) {
      yield items;
      yielded += items.length;
    }
    offset = page.next_offset;
  }
}
