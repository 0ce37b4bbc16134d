import { getLogger } from '../logger.js';
import {
  fromHttpResponse,
  fromTransportFailure,
  jsonParseError,
  schemaMismatchError,
} from './error-factory.js';
import { withRetry, type RetryOptions, type Sleep } from './retry.js';
import { Signer, toQuery } from './signer.js';
import type { Transport, TransportResponse } from './transport.js';
import type { Credentials, RequestContext, RequestSpec, ResponseSchema } from './types.js';

export interface RequestExecutorOptions {
  credentials: Credentials;
  baseUrl: string;
  transport: Transport;
  timeoutMs: number;
  retry?: Partial<RetryOptions>;
  // Test seams
  now?: () => number;
  sleep?: Sleep;
}

export interface ExecuteOptions<T> {
  schema?: ResponseSchema<T>;
  signal?: AbortSignal;
}

/**
 * RequestExecutor — runs one logical call: sign → send → parse → decode,
 * with the whole attempt retried by withRetry.
 *
 * Holds only read-only configuration, so any number of calls can run
 * concurrently on one instance. Each attempt signs again; the gateway
 * rejects timestamps outside its window.
 */
export class RequestExecutor {
  private readonly signer: Signer;
  private readonly baseUrl: string;
  private readonly transport: Transport;
  private readonly timeoutMs: number;
  private readonly retry: Partial<RetryOptions>;
  private readonly sleep?: Sleep;
  private readonly logger = getLogger('RequestExecutor');

  constructor(options: RequestExecutorOptions) {
    this.signer = new Signer(options.credentials, options.now);
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.transport = options.transport;
    this.timeoutMs = options.timeoutMs;
    this.retry = options.retry ?? {};
    this.sleep = options.sleep;
  }

  /**
   * execute — returns the decoded body: typed through `schema` when given,
   * otherwise the raw JSON value.
   *
   * Rejects with ApiError on every failure except cancellation, which
   * rejects with the signal's reason.
   */
  async execute<T>(spec: RequestSpec, options: ExecuteOptions<T> & { schema: ResponseSchema<T> }): Promise<T>;
  async execute(spec: RequestSpec, options?: ExecuteOptions<unknown>): Promise<unknown>;
  async execute<T>(spec: RequestSpec, options: ExecuteOptions<T> = {}): Promise<T | unknown> {
    const url = `${this.baseUrl}${spec.path}`;
    const context: RequestContext = { method: spec.method, url, params: { ...spec.queryParams } };

    return withRetry((attempt) => this.attempt(spec, url, context, attempt, options), {
      ...this.retry,
      signal: options.signal,
      sleep: this.sleep,
    });
  }

  private async attempt<T>(
    spec: RequestSpec,
    url: string,
    context: RequestContext,
    attempt: number,
    options: ExecuteOptions<T>,
  ): Promise<T | unknown> {
    // Signed keys overwrite any caller-supplied ts/apikey/hash
    const searchParams = { ...spec.queryParams, ...toQuery(this.signer.sign()) };

    this.logger.debug({ method: spec.method, url, attempt: attempt + 1 }, 'Sending request');

    let response: TransportResponse;
    try {
      response = await this.transport({
        method: spec.method,
        url,
        searchParams,
        timeoutMs: this.timeoutMs,
        signal: options.signal,
      });
    } catch (error) {
      options.signal?.throwIfAborted();
      throw fromTransportFailure(error, context);
    }

    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw fromHttpResponse(response, context, spec.resource);
    }

    let data: unknown;
    try {
      data = JSON.parse(response.body);
    } catch (error) {
      throw jsonParseError(response.statusCode, response.body, context, error);
    }

    if (!options.schema) return data;

    const parsed = options.schema.safeParse(data);
    if (!parsed.success) {
      this.logger.error(
        { url, issues: parsed.error.issues.slice(0, 5) },
        `Response validation failed with ${parsed.error.issues.length} issue(s)`,
      );
      throw schemaMismatchError(response.statusCode, data, context, parsed.error);
    }
    return parsed.data;
  }
}
