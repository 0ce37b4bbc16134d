/**
 * errors.ts — Closed error taxonomy for Marvel API calls.
 *
 * Every failure that leaves the request executor is an ApiError whose
 * `detail` is a discriminated union keyed by `kind`. Callers switch on
 * `error.detail.kind` to reach the kind-specific fields.
 */

import type { RequestContext } from './types.js';

export const ErrorKind = {
  Authentication: 'AUTHENTICATION',
  NotFound: 'NOT_FOUND',
  Validation: 'VALIDATION',
  RateLimit: 'RATE_LIMIT',
  ServerError: 'SERVER_ERROR',
  Network: 'NETWORK',
  Unknown: 'UNKNOWN',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export type ApiErrorDetail =
  | { kind: 'RATE_LIMIT'; retryAfterSeconds?: number }
  | { kind: 'VALIDATION'; validationMessages: string[] }
  | { kind: 'NOT_FOUND'; resourceType?: string; resourceId?: string }
  | { kind: 'AUTHENTICATION' | 'SERVER_ERROR' | 'NETWORK' | 'UNKNOWN' };

export interface ApiErrorInit {
  message: string;
  detail: ApiErrorDetail;
  statusCode?: number;
  responseBody?: unknown;
  requestContext?: RequestContext;
  cause?: unknown;
}

export class ApiError extends Error {
  readonly detail: ApiErrorDetail;
  readonly statusCode?: number;
  readonly responseBody?: unknown;
  readonly requestContext?: RequestContext;

  constructor(init: ApiErrorInit) {
    super(init.message, init.cause === undefined ? undefined : { cause: init.cause });
    this.name = 'ApiError';
    this.detail = init.detail;
    this.statusCode = init.statusCode;
    this.responseBody = init.responseBody;
    this.requestContext = init.requestContext;
  }

  get kind(): ErrorKind {
    return this.detail.kind;
  }

  override toString(): string {
    return this.statusCode === undefined ? this.message : `${this.message} (Status: ${this.statusCode})`;
  }
}

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

/**
 * classifyStatus — total mapping from an HTTP status code to an ErrorKind.
 */
export function classifyStatus(statusCode: number): ErrorKind {
  switch (statusCode) {
    case 401:
      return ErrorKind.Authentication;
    case 404:
      return ErrorKind.NotFound;
    case 400:
      return ErrorKind.Validation;
    case 429:
      return ErrorKind.RateLimit;
    default:
      return statusCode >= 500 && statusCode < 600 ? ErrorKind.ServerError : ErrorKind.Unknown;
  }
}
