/**
 * query.ts — Turns typed, all-optional filter objects into query entries.
 *
 * Only present values are emitted, so the executor never has to know which
 * filters an endpoint supports.
 */

import type { HttpMethod, RequestSpec, ResourceRef, ResourceType } from './types.js';

export type QueryValue = string | number | boolean | Date | ReadonlyArray<string | number | Date>;

export type QueryFilters = { [key: string]: QueryValue | null | undefined };

export interface PageFilters {
  limit?: number;
  offset?: number;
  orderBy?: string;
}

export interface CharacterFilters extends PageFilters {
  name?: string;
  nameStartsWith?: string;
  modifiedSince?: Date | string;
  comics?: number[];
  series?: number[];
  events?: number[];
  stories?: number[];
}

export interface ComicFilters extends PageFilters {
  format?: string;
  formatType?: 'comic' | 'collection';
  noVariants?: boolean;
  dateDescriptor?: 'lastWeek' | 'thisWeek' | 'nextWeek' | 'thisMonth';
  dateRange?: [Date | string, Date | string];
  title?: string;
  titleStartsWith?: string;
  startYear?: number;
  issueNumber?: number;
  digitalId?: number;
  hasDigitalIssue?: boolean;
  modifiedSince?: Date | string;
  creators?: number[];
  characters?: number[];
  series?: number[];
  events?: number[];
  stories?: number[];
}

// Filters accepted by any /{type}/{id}/{related} listing
export type RelatedFilters = PageFilters & QueryFilters;

function renderValue(value: QueryValue): string {
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map((v) => (v instanceof Date ? v.toISOString() : String(v))).join(',');
  return String(value);
}

/**
 * buildQueryParams — drops undefined/null entries and renders the rest as strings.
 * Arrays become comma-separated lists; dates become ISO-8601.
 */
export function buildQueryParams(filters: object = {}): Record<string, string> {
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(filters)) {
    if (value === undefined || value === null) continue;
    if (!isQueryValue(value)) continue;
    params[key] = renderValue(value);
  }
  return params;
}

function isQueryValue(value: unknown): value is QueryValue {
  return (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date ||
    Array.isArray(value)
  );
}

/**
 * resourcePath — `/v1/public/{type}[/{id}[/{related}]]`
 */
export function resourcePath(type: ResourceType, id?: number | string, related?: ResourceType): string {
  let path = `/v1/public/${type}`;
  if (id !== undefined) {
    path += `/${encodeURIComponent(String(id))}`;
    if (related) path += `/${related}`;
  }
  return path;
}

export function buildRequestSpec(
  path: string,
  filters: object = {},
  options: { method?: HttpMethod; resource?: ResourceRef } = {},
): RequestSpec {
  const spec: RequestSpec = {
    method: options.method ?? 'GET',
    path,
    queryParams: buildQueryParams(filters),
  };
  if (options.resource) spec.resource = options.resource;
  return spec;
}
