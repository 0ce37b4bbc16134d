import type { ZodType, ZodTypeDef } from 'zod';

// API key pair issued by the Marvel developer portal; fixed for the lifetime of a client instance
export interface Credentials {
  readonly publicKey: string;
  readonly privateKey: string;
}

// Authentication parameters for exactly one transport attempt
export interface SignedParams {
  timestamp: number; // integer Unix seconds
  apiKey: string;
  hash: string; // lowercase hex MD5
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type ResourceType = 'characters' | 'comics' | 'creators' | 'events' | 'series' | 'stories';

// Identifies the single entity a call addresses, so a 404 can say what was missing
export interface ResourceRef {
  type: ResourceType;
  id: number | string;
}

// One logical call, before authentication is added
export interface RequestSpec {
  method: HttpMethod;
  path: string;
  queryParams: Record<string, string>;
  resource?: ResourceRef;
}

// Attached to every ApiError. Never contains the signed parameters.
export interface RequestContext {
  method: HttpMethod;
  url: string;
  params: Record<string, string>;
}

// Any zod schema whose parsed output is T, whatever input it accepts
export type ResponseSchema<T> = ZodType<T, ZodTypeDef, unknown>;
