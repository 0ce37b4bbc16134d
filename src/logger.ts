/**
 * logger.ts — pino root logger and per-category child loggers.
 *
 * Logs go to stderr; in stdio mode stdout carries the MCP protocol stream.
 */

import pino from 'pino';
import { z } from 'zod';

export type Logger = pino.Logger;

const LoggerEnvSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  NODE_ENV: z.string().optional(),
  VITEST: z.string().optional(),
});

function resolveLevel(env: NodeJS.ProcessEnv): pino.LevelWithSilent {
  const parsed = LoggerEnvSchema.safeParse(env);
  if (!parsed.success) return 'info';
  const { LOG_LEVEL, NODE_ENV, VITEST } = parsed.data;
  if (LOG_LEVEL) return LOG_LEVEL;
  // Keep test output clean unless a level is asked for explicitly
  if (NODE_ENV === 'test' || VITEST === 'true') return 'silent';
  return 'info';
}

const loggerCache = new Map<string, Logger>();
let rootLogger: Logger | undefined;

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino(
      {
        level: resolveLevel(process.env),
        base: { service: 'marvel-catalog-mcp' },
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination(2),
    );
  }
  return rootLogger;
}

/**
 * Returns a child logger tagged with `category`, cached per category.
 */
export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) return cached;

  const logger = getRootLogger().child({ category });
  loggerCache.set(category, logger);
  return logger;
}
