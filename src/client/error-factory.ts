/**
 * error-factory.ts — Builds ApiError values at the boundary where a failure
 * is first observed: a non-2xx response, a transport failure, an unparseable
 * body, or a body that does not match the expected schema.
 */

import type { Logger } from '../logger.js';
import { ApiError, type ApiErrorDetail, ErrorKind, classifyStatus } from './errors.js';
import { TransportError } from './transport.js';
import type { TransportResponse } from './transport.js';
import type { RequestContext, ResourceRef } from './types.js';

const DEFAULT_MESSAGES: Record<ErrorKind, string> = {
  AUTHENTICATION: 'Authentication failed',
  NOT_FOUND: 'Resource not found',
  VALIDATION: 'Validation failed',
  RATE_LIMIT: 'Rate limit exceeded',
  SERVER_ERROR: 'Server error occurred',
  NETWORK: 'Network error occurred',
  UNKNOWN: 'Marvel API error occurred',
};

export interface ApiErrorExtra {
  retryAfterSeconds?: number;
  validationMessages?: string[];
  resourceType?: string;
  resourceId?: string;
  cause?: unknown;
}

// Keeps only the extras that belong to `kind`
function toDetail(kind: ErrorKind, extra: ApiErrorExtra): ApiErrorDetail {
  switch (kind) {
    case 'RATE_LIMIT':
      return extra.retryAfterSeconds === undefined
        ? { kind }
        : { kind, retryAfterSeconds: extra.retryAfterSeconds };
    case 'VALIDATION':
      return { kind, validationMessages: extra.validationMessages ?? [] };
    case 'NOT_FOUND': {
      const detail: Extract<ApiErrorDetail, { kind: 'NOT_FOUND' }> = { kind };
      if (extra.resourceType !== undefined) detail.resourceType = extra.resourceType;
      if (extra.resourceId !== undefined) detail.resourceId = extra.resourceId;
      return detail;
    }
    default:
      return { kind };
  }
}

/**
 * buildApiError — classifies `statusCode` and builds the matching ApiError,
 * falling back to the kind's default message.
 */
export function buildApiError(
  statusCode: number,
  message?: string,
  responseBody?: unknown,
  requestContext?: RequestContext,
  extra: ApiErrorExtra = {},
): ApiError {
  const kind = classifyStatus(statusCode);
  return new ApiError({
    message: message ?? DEFAULT_MESSAGES[kind],
    detail: toDetail(kind, extra),
    statusCode,
    responseBody,
    requestContext,
    cause: extra.cause,
  });
}

// ---------------------------------------------------------------------------
// Response helpers
// ---------------------------------------------------------------------------

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Parses a Retry-After header into whole seconds.
 * Accepts delta-seconds or an HTTP-date; returns undefined when absent or unparseable.
 */
export function parseRetryAfter(value: string | string[] | undefined, now = Date.now()): number | undefined {
  const header = headerValue(value)?.trim();
  if (!header) return undefined;

  const seconds = Number(header);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.ceil(seconds));
  }

  const ts = new Date(header).getTime();
  if (!Number.isNaN(ts)) {
    return Math.max(0, Math.ceil((ts - now) / 1000));
  }

  return undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

// Marvel error bodies look like {"code": 409, "status": "..."} or {"code": "InvalidCredentials", "message": "..."}
function messageFromBody(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;
  if (typeof body['message'] === 'string' && body['message']) return body['message'];
  if (typeof body['status'] === 'string' && body['status']) return body['status'];
  return undefined;
}

function validationMessagesFromBody(body: unknown): string[] {
  if (!isRecord(body)) return [];
  const errors = body['errors'];
  if (Array.isArray(errors)) {
    return errors.filter((e): e is string => typeof e === 'string');
  }
  const message = messageFromBody(body);
  return message ? [message] : [];
}

/**
 * fromHttpResponse — translates a non-2xx response into an ApiError.
 */
export function fromHttpResponse(
  response: TransportResponse,
  context: RequestContext,
  resource?: ResourceRef,
): ApiError {
  const body = tryParseJson(response.body);
  const extra: ApiErrorExtra = {};

  switch (classifyStatus(response.statusCode)) {
    case 'RATE_LIMIT':
      extra.retryAfterSeconds = parseRetryAfter(response.headers['retry-after']);
      break;
    case 'VALIDATION':
      extra.validationMessages = validationMessagesFromBody(body);
      break;
    case 'NOT_FOUND':
      if (resource) {
        extra.resourceType = resource.type;
        extra.resourceId = String(resource.id);
      }
      break;
    default:
      break;
  }

  return buildApiError(response.statusCode, messageFromBody(body), body, context, extra);
}

/**
 * fromTransportFailure — a request that never reached a status code.
 */
export function fromTransportFailure(error: unknown, context: RequestContext): ApiError {
  let message: string;
  if (error instanceof TransportError && error.reason === 'timeout') {
    message = 'Request timeout';
  } else if (error instanceof TransportError && error.reason === 'connection') {
    message = 'Connection error';
  } else {
    message = error instanceof Error ? error.message : String(error);
  }

  return new ApiError({
    message,
    detail: { kind: ErrorKind.Network },
    requestContext: context,
    cause: error,
  });
}

export function jsonParseError(statusCode: number, rawText: string, context: RequestContext, cause: unknown): ApiError {
  return buildApiError(statusCode, 'Failed to parse JSON response', rawText, context, { cause });
}

export function schemaMismatchError(
  statusCode: number,
  payload: unknown,
  context: RequestContext,
  cause: unknown,
): ApiError {
  return buildApiError(statusCode, 'Failed to parse response into model', payload, context, { cause });
}

// ---------------------------------------------------------------------------
// Presentation
// ---------------------------------------------------------------------------

function titleCase(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * formatErrorMessage — user-facing text: the error's string form plus a
 * kind-specific hint.
 */
export function formatErrorMessage(error: ApiError): string {
  const base = error.toString();
  const detail = error.detail;

  switch (detail.kind) {
    case 'NOT_FOUND':
      if (detail.resourceType && detail.resourceId) {
        return `${base} - ${titleCase(detail.resourceType)} with ID ${detail.resourceId} not found`;
      }
      if (detail.resourceType) {
        return `${base} - ${titleCase(detail.resourceType)} not found`;
      }
      return base;
    case 'RATE_LIMIT':
      return detail.retryAfterSeconds
        ? `${base} - Retry after ${detail.retryAfterSeconds} seconds`
        : `${base} - Please wait before making more requests`;
    case 'VALIDATION':
      return detail.validationMessages.length > 0
        ? `${base} - Validation errors: ${detail.validationMessages.join(', ')}`
        : base;
    case 'NETWORK':
      return `${base} - Please check your internet connection and try again`;
    case 'SERVER_ERROR':
      return `${base} - Please try again later`;
    case 'AUTHENTICATION':
      return `${base} - Please check your API keys`;
    default:
      return base;
  }
}

/**
 * logApiError — logs at a level that reflects how actionable the kind is.
 */
export function logApiError(error: ApiError, logger: Logger): void {
  const context = {
    kind: error.kind,
    statusCode: error.statusCode,
    request: error.requestContext,
    response: error.responseBody,
  };
  const message = formatErrorMessage(error);

  switch (error.kind) {
    case 'SERVER_ERROR':
    case 'AUTHENTICATION':
      logger.error(context, message);
      break;
    case 'RATE_LIMIT':
    case 'NETWORK':
      logger.warn(context, message);
      break;
    default:
      logger.info(context, message);
  }
}
