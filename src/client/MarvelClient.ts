import { buildApiError } from './error-factory.js';
import { clampLimit, paginateAll, toPage, type PaginatedResult } from './paginate.js';
import {
  buildRequestSpec,
  resourcePath,
  type CharacterFilters,
  type ComicFilters,
  type PageFilters,
  type RelatedFilters,
} from './query.js';
import { RequestExecutor } from './RequestExecutor.js';
import type { RetryOptions, Sleep } from './retry.js';
import {
  CharacterSchema,
  ComicSchema,
  dataWrapperSchema,
  type Character,
  type Comic,
} from './schemas/index.js';
import { createGotTransport, type Transport } from './transport.js';
import type { Credentials, RequestSpec, ResourceType, ResponseSchema } from './types.js';

export const DEFAULT_BASE_URL = 'https://gateway.marvel.com';
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_RETRIES = 3;

export interface MarvelClientOptions extends Credentials {
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  // Backoff knobs other than maxRetries
  retry?: Partial<Omit<RetryOptions, 'maxRetries'>>;
  transport?: Transport;
  now?: () => number;
  sleep?: Sleep;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/**
 * MarvelClient — typed entry point to the Marvel catalog API.
 *
 * Design constraints:
 *   - Credentials and policy knobs are fixed at construction; instances share nothing
 *   - Every call goes through RequestExecutor (signing, retry, error translation)
 *   - Every list call returns PaginatedResult
 *
 * Generic methods cover every resource and relationship; the typed
 * convenience methods exist for characters and comics.
 */
export class MarvelClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly maxRetries: number;

  private readonly executor: RequestExecutor;

  constructor(options: MarvelClientOptions) {
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;

    this.executor = new RequestExecutor({
      credentials: { publicKey: options.publicKey, privateKey: options.privateKey },
      baseUrl: this.baseUrl,
      transport: options.transport ?? createGotTransport(),
      timeoutMs: this.timeoutMs,
      retry: { ...options.retry, maxRetries: this.maxRetries },
      now: options.now,
      sleep: options.sleep,
    });
  }

  /**
   * request — runs a prepared RequestSpec. Without a schema the raw JSON is returned.
   */
  async request<T>(spec: RequestSpec, schema: ResponseSchema<T>, options?: CallOptions): Promise<T>;
  async request(spec: RequestSpec, schema?: undefined, options?: CallOptions): Promise<unknown>;
  async request<T>(spec: RequestSpec, schema?: ResponseSchema<T>, options: CallOptions = {}): Promise<T | unknown> {
    if (schema) {
      return this.executor.execute(spec, { schema, signal: options.signal });
    }
    return this.executor.execute(spec, { signal: options.signal });
  }

  // ---------------------------------------------------------------------------
  // Generic resource access
  // ---------------------------------------------------------------------------

  /**
   * getResource — fetches `/v1/public/{type}/{id}` and returns its single result.
   *
   * An envelope with no results is reported as NOT_FOUND, the same as a 404.
   */
  async getResource<T>(type: ResourceType, id: number, schema: ResponseSchema<T>, options?: CallOptions): Promise<T> {
    const spec = buildRequestSpec(resourcePath(type, id), {}, { resource: { type, id } });
    const wrapper = await this.request(spec, dataWrapperSchema(schema), options);
    const [first] = wrapper.data.results;
    if (first === undefined) {
      throw buildApiError(404, undefined, wrapper, undefined, {
        resourceType: type,
        resourceId: String(id),
      });
    }
    return first;
  }

  /**
   * listResources — one page of `/v1/public/{type}` filtered by `filters`.
   */
  async listResources<T>(
    type: ResourceType,
    filters: PageFilters & object,
    schema: ResponseSchema<T>,
    options?: CallOptions,
  ): Promise<PaginatedResult<T>> {
    const spec = buildRequestSpec(resourcePath(type), withClampedLimit(filters));
    return toPage(await this.request(spec, dataWrapperSchema(schema), options));
  }

  /**
   * listRelated — one page of `/v1/public/{type}/{id}/{related}`,
   * e.g. the comics a character appears in.
   */
  async listRelated<T>(
    type: ResourceType,
    id: number,
    related: ResourceType,
    filters: RelatedFilters,
    schema: ResponseSchema<T>,
    options?: CallOptions,
  ): Promise<PaginatedResult<T>> {
    const spec = buildRequestSpec(resourcePath(type, id, related), withClampedLimit(filters), {
      resource: { type, id },
    });
    return toPage(await this.request(spec, dataWrapperSchema(schema), options));
  }

  /**
   * getRaw — fetches any path and returns the undecoded JSON envelope.
   */
  async getRaw(path: string, filters: object = {}, options?: CallOptions): Promise<unknown> {
    return this.request(buildRequestSpec(path, filters), undefined, options);
  }

  // ---------------------------------------------------------------------------
  // Characters
  // ---------------------------------------------------------------------------

  async getCharacter(characterId: number, options?: CallOptions): Promise<Character> {
    return this.getResource('characters', characterId, CharacterSchema, options);
  }

  async listCharacters(filters: CharacterFilters = {}, options?: CallOptions): Promise<PaginatedResult<Character>> {
    return this.listResources('characters', filters, CharacterSchema, options);
  }

  /**
   * searchCharacters — characters whose name starts with `query`.
   */
  async searchCharacters(query: string, limit = 20, options?: CallOptions): Promise<PaginatedResult<Character>> {
    return this.listCharacters({ nameStartsWith: query, limit }, options);
  }

  async getCharacterComics(
    characterId: number,
    filters: ComicFilters = {},
    options?: CallOptions,
  ): Promise<PaginatedResult<Comic>> {
    return this.listRelated('characters', characterId, 'comics', { ...filters }, ComicSchema, options);
  }

  // ---------------------------------------------------------------------------
  // Comics
  // ---------------------------------------------------------------------------

  async getComic(comicId: number, options?: CallOptions): Promise<Comic> {
    return this.getResource('comics', comicId, ComicSchema, options);
  }

  async listComics(filters: ComicFilters = {}, options?: CallOptions): Promise<PaginatedResult<Comic>> {
    return this.listResources('comics', filters, ComicSchema, options);
  }

  async getComicCharacters(
    comicId: number,
    filters: CharacterFilters = {},
    options?: CallOptions,
  ): Promise<PaginatedResult<Character>> {
    return this.listRelated('comics', comicId, 'characters', { ...filters }, CharacterSchema, options);
  }

  /**
   * iterateCharacters — every page of characters matching `filters`.
   */
  iterateCharacters(
    filters: CharacterFilters = {},
    maxItems?: number,
    options?: CallOptions,
  ): AsyncGenerator<Character[], void, unknown> {
    return paginateAll(
      (offset) => this.listCharacters({ ...filters, offset }, options),
      filters.offset ?? 0,
      maxItems,
    );
  }
}

function withClampedLimit<F extends PageFilters>(filters: F): F {
  const limit = clampLimit(filters.limit);
  return limit === undefined ? filters : { ...filters, limit };
}
