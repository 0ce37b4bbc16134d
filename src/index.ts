/**
 * Public API of the Marvel catalog client.
 */

export {
  MarvelClient,
  DEFAULT_BASE_URL,
  DEFAULT_MAX_RETRIES,
  DEFAULT_TIMEOUT_MS,
} from './client/MarvelClient.js';
export type { MarvelClientOptions, CallOptions } from './client/MarvelClient.js';

export { RequestExecutor } from './client/RequestExecutor.js';
export type { RequestExecutorOptions, ExecuteOptions } from './client/RequestExecutor.js';

export { Signer, toQuery } from './client/signer.js';

export { ApiError, ErrorKind, classifyStatus, isApiError } from './client/errors.js';
export type { ApiErrorDetail, ApiErrorInit } from './client/errors.js';

export {
  buildApiError,
  fromHttpResponse,
  fromTransportFailure,
  formatErrorMessage,
  logApiError,
  parseRetryAfter,
} from './client/error-factory.js';
export type { ApiErrorExtra } from './client/error-factory.js';

export { withRetry, sleep, nextDelay, DEFAULT_RETRY_OPTIONS } from './client/retry.js';
export type { RetryOptions, WithRetryOptions, Sleep } from './client/retry.js';

export { createGotTransport, TransportError } from './client/transport.js';
export type { Transport, TransportRequest, TransportResponse, TransportFailureReason } from './client/transport.js';

export { buildQueryParams, buildRequestSpec, resourcePath } from './client/query.js';
export type { CharacterFilters, ComicFilters, PageFilters, RelatedFilters, QueryFilters, QueryValue } from './client/query.js';

export { toPage, paginateAll, MAX_PAGE_SIZE } from './client/paginate.js';
export type { PaginatedResult } from './client/paginate.js';

export * from './client/schemas/index.js';

export type {
  Credentials,
  SignedParams,
  RequestSpec,
  RequestContext,
  ResourceRef,
  ResourceType,
  HttpMethod,
  ResponseSchema,
} from './client/types.js';

export { loadConfig, ConfigError } from './config.js';
export { getLogger } from './logger.js';
export type { Logger } from './logger.js';
