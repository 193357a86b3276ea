import type { DestinationStream, Logger } from 'pino';
import { pino } from 'pino';

export type { DestinationStream, Logger };

const LOG_LEVEL_VARIABLE = 'GRAPHQL_ENGINE_LOG_LEVEL';

/**
 * Creates the engine's default logger. The engine is silent unless a level is
 * given here or through the `GRAPHQL_ENGINE_LOG_LEVEL` environment variable.
 * Output goes to stdout unless a destination is given.
 */
export function createLogger(options?: {
  name?: string;
  level?: string;
  destination?: DestinationStream;
}): Logger {
  const pinoOptions = {
    name: options?.name ?? 'graphql-incremental-engine',
    level: options?.level ?? process.env[LOG_LEVEL_VARIABLE] ?? 'silent',
  };
  return options?.destination === undefined
    ? pino(pinoOptions)
    : pino(pinoOptions, options.destination);
}

export const defaultLogger = createLogger();
