import got, { RequestError, TimeoutError } from 'got';
import type { HttpMethod } from './types.js';

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  searchParams: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface TransportResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: string;
}

/**
 * One HTTP attempt. Resolves for every response the server sends, whatever
 * its status; rejects only when no response arrives.
 */
export type Transport = (request: TransportRequest) => Promise<TransportResponse>;

export type TransportFailureReason = 'timeout' | 'connection' | 'other';

// Thrown by a transport when the request never produced a status code
export class TransportError extends Error {
  readonly reason: TransportFailureReason;

  constructor(reason: TransportFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
    this.reason = reason;
  }
}

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
]);

function toTransportError(error: RequestError): TransportError {
  if (error instanceof TimeoutError) {
    return new TransportError('timeout', error.message, { cause: error });
  }
  if (CONNECTION_ERROR_CODES.has(error.code)) {
    return new TransportError('connection', error.message, { cause: error });
  }
  return new TransportError('other', error.message, { cause: error });
}

/**
 * createGotTransport — default transport on top of got.
 *
 * got's own retry is disabled (withRetry owns retries) and HTTP errors are
 * returned as responses so the executor can classify them itself.
 */
export function createGotTransport(userAgent = 'marvel-catalog-mcp/1.0.0'): Transport {
  const instance = got.extend({
    headers: {
      'User-Agent': userAgent,
      'Accept': 'application/json',
    },
    retry: { limit: 0 },
    throwHttpErrors: false,
  });

  return async (request) => {
    try {
      const response = await instance(request.url, {
        method: request.method,
        searchParams: request.searchParams,
        timeout: { request: request.timeoutMs },
        signal: request.signal,
        responseType: 'text',
      });
      return {
        statusCode: response.statusCode,
        headers: response.headers,
        body: response.body,
      };
    } catch (error) {
      // Cancellation is not a transport failure; let the caller see the abort
      if (request.signal?.aborted) throw error;
      if (error instanceof RequestError) throw toTransportError(error);
      throw error;
    }
  };
}
