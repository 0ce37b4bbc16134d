/**
 * errors.ts — Typed MCP error responses for all tool handlers.
 *
 * MCP tool errors are returned as successful MCP responses (not thrown)
 * with isError: true and a structured content block. This lets agents
 * read the error_code and decide whether to retry or surface to user.
 */

import { type ApiError, type ErrorKind, isApiError } from '../client/errors.js';
import { formatErrorMessage, logApiError } from '../client/error-factory.js';
import { DEFAULT_RETRY_OPTIONS } from '../client/retry.js';
import { getLogger } from '../logger.js';

const logger = getLogger('tools');

export type ToolErrorCode =
  | 'AUTH_FAILED'
  | 'NOT_FOUND'
  | 'INVALID_INPUT'
  | 'RATE_LIMITED'
  | 'UPSTREAM_ERROR'
  | 'NETWORK_ERROR'
  | 'INTERNAL_ERROR';

export interface ToolErrorPayload {
  error_code: ToolErrorCode;
  message: string;
  retryable: boolean;
  status_code?: number;
  retry_after_seconds?: number;
}

const CODE_BY_KIND: Record<ErrorKind, ToolErrorCode> = {
  AUTHENTICATION: 'AUTH_FAILED',
  NOT_FOUND: 'NOT_FOUND',
  VALIDATION: 'INVALID_INPUT',
  RATE_LIMIT: 'RATE_LIMITED',
  SERVER_ERROR: 'UPSTREAM_ERROR',
  NETWORK: 'NETWORK_ERROR',
  UNKNOWN: 'UPSTREAM_ERROR',
};

/**
 * toolError — builds a structured MCP error response envelope.
 */
export function toolError(
  code: ToolErrorCode,
  message: string,
  retryable = false,
  extra: Pick<ToolErrorPayload, 'status_code' | 'retry_after_seconds'> = {},
): { isError: true; content: Array<{ type: 'text'; text: string }> } {
  const payload: ToolErrorPayload = { error_code: code, message, retryable, ...extra };
  return {
    isError: true,
    content: [{ type: 'text', text: JSON.stringify(payload) }],
  };
}

/**
 * toolSuccess — wraps a plain object as a successful MCP content envelope.
 */
export function toolSuccess(data: unknown): { content: Array<{ type: 'text'; text: string }> } {
  return {
    content: [{ type: 'text', text: JSON.stringify(data, null, 2) }],
  };
}

function fromApiError(error: ApiError): ReturnType<typeof toolError> {
  const extra: Pick<ToolErrorPayload, 'status_code' | 'retry_after_seconds'> = {};
  if (error.statusCode !== undefined) extra.status_code = error.statusCode;
  if (error.detail.kind === 'RATE_LIMIT' && error.detail.retryAfterSeconds !== undefined) {
    extra.retry_after_seconds = error.detail.retryAfterSeconds;
  }
  return toolError(
    CODE_BY_KIND[error.kind],
    formatErrorMessage(error),
    DEFAULT_RETRY_OPTIONS.retryableKinds.has(error.kind),
    extra,
  );
}

/**
 * classifyError — maps any error thrown by MarvelClient to a tool error.
 *
 * Called in every tool handler's catch block.
 */
export function classifyError(error: unknown): ReturnType<typeof toolError> {
  if (isApiError(error)) {
    logApiError(error, logger);
    return fromApiError(error);
  }
  const message = error instanceof Error ? error.message : String(error);
  logger.error({ err: error }, `Unexpected tool failure: ${message}`);
  return toolError('INTERNAL_ERROR', message, false);
}
