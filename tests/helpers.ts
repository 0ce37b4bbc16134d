import { createHash } from 'node:crypto';
import type { Transport, TransportRequest, TransportResponse } from '../src/client/transport.js';
import type { Credentials } from '../src/client/types.js';

export const credentials: Credentials = { publicKey: 'test-public', privateKey: 'test-private' };

export const FIXED_NOW_MS = 1_700_000_000_000;

export function md5(text: string): string {
  return createHash('md5').update(text).digest('hex');
}

export function jsonResponse(
  statusCode: number,
  body: unknown,
  headers: Record<string, string> = {},
): TransportResponse {
  return { statusCode, headers: { 'content-type': 'application/json', ...headers }, body: JSON.stringify(body) };
}

export function textResponse(statusCode: number, body: string): TransportResponse {
  return { statusCode, headers: { 'content-type': 'text/html' }, body };
}

/**
 * Transport that answers from a queue and records every request.
 * The last response repeats once the queue is down to one entry.
 */
export function scriptedTransport(
  ...responses: Array<TransportResponse | Error>
): { transport: Transport; requests: TransportRequest[] } {
  const requests: TransportRequest[] = [];
  const transport: Transport = async (request) => {
    requests.push(request);
    const next = responses.length > 1 ? responses.shift() : responses[0];
    if (next === undefined) throw new Error('scriptedTransport has no responses');
    if (next instanceof Error) throw next;
    return next;
  };
  return { transport, requests };
}

export function envelope(
  results: unknown[],
  page: { offset?: number; limit?: number; total?: number } = {},
) {
  return {
    code: 200,
    status: 'Ok',
    copyright: '© Test Data',
    attributionText: 'Test data',
    attributionHTML: '<a href="https://example.test">Test data</a>',
    etag: 'etag-test',
    data: {
      offset: page.offset ?? 0,
      limit: page.limit ?? 20,
      total: page.total ?? results.length,
      count: results.length,
      results,
    },
  };
}

export function characterRecord(id: number, name: string) {
  return {
    id,
    name,
    description: `${name} test description`,
    modified: '2020-01-01T00:00:00-0500',
    resourceURI: `https://gateway.test/v1/public/characters/${id}`,
    urls: [{ type: 'detail', url: `https://example.test/characters/${id}` }],
    thumbnail: { path: `https://img.test/characters/${id}`, extension: 'jpg' },
    comics: { available: 3, returned: 0, collectionURI: `https://gateway.test/v1/public/characters/${id}/comics`, items: [] },
    series: { available: 2, returned: 0, collectionURI: `https://gateway.test/v1/public/characters/${id}/series`, items: [] },
    events: { available: 1, returned: 0, collectionURI: `https://gateway.test/v1/public/characters/${id}/events`, items: [] },
  };
}

export function comicRecord(id: number, title: string) {
  return {
    id,
    title,
    issueNumber: 1,
    description: null,
    format: 'Comic',
    pageCount: 32,
    dates: [{ type: 'onsaleDate', date: '2020-05-06T00:00:00-0400' }],
    prices: [{ type: 'printPrice', price: 3.99 }],
    series: { resourceURI: 'https://gateway.test/v1/public/series/9', name: 'Test Series (2020)' },
    thumbnail: { path: `https://img.test/comics/${id}`, extension: 'png' },
    creators: {
      available: 1,
      returned: 1,
      collectionURI: `https://gateway.test/v1/public/comics/${id}/creators`,
      items: [{ resourceURI: 'https://gateway.test/v1/public/creators/5', name: 'Test Writer', role: 'writer' }],
    },
    characters: {
      available: 1,
      returned: 1,
      collectionURI: `https://gateway.test/v1/public/comics/${id}/characters`,
      items: [{ resourceURI: 'https://gateway.test/v1/public/characters/1', name: 'Test Hero' }],
    },
  };
}
