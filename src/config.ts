/**
 * config.ts — Environment-driven configuration for the MCP server entry point.
 *
 * Library users construct MarvelClient directly; this module only turns
 * MARVEL_* variables into MarvelClientOptions.
 */

import { z } from 'zod';
import { DEFAULT_BASE_URL, DEFAULT_MAX_RETRIES, DEFAULT_TIMEOUT_MS } from './client/MarvelClient.js';
import type { MarvelClientOptions } from './client/MarvelClient.js';

const ConfigEnvSchema = z.object({
  MARVEL_PUBLIC_KEY: z.string().min(1, 'MARVEL_PUBLIC_KEY is required'),
  MARVEL_PRIVATE_KEY: z.string().min(1, 'MARVEL_PRIVATE_KEY is required'),
  MARVEL_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  MARVEL_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  MARVEL_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(DEFAULT_MAX_RETRIES),
});

export type ConfigEnv = z.infer<typeof ConfigEnvSchema>;

export class ConfigError extends Error {
  readonly variables: string[];
  constructor(issues: z.ZodIssue[]) {
    const variables = [...new Set(issues.map((issue) => String(issue.path[0])))];
    super(`Invalid configuration: ${issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`);
    this.name = 'ConfigError';
    this.variables = variables;
  }
}

/**
 * loadConfig — validates MARVEL_* variables. Empty strings count as unset
 * for the optional ones so `MARVEL_BASE_URL=` in a .env file falls back to
 * the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MarvelClientOptions {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith('MARVEL_') && value !== ''),
  );
  const parsed = ConfigEnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues);
  }

  return {
    publicKey: parsed.data.MARVEL_PUBLIC_KEY,
    privateKey: parsed.data.MARVEL_PRIVATE_KEY,
    baseUrl: parsed.data.MARVEL_BASE_URL,
    timeoutMs: parsed.data.MARVEL_TIMEOUT_MS,
    maxRetries: parsed.data.MARVEL_MAX_RETRIES,
  };
}
