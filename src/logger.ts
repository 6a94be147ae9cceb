/**
 * kvgas — Logger
 */

import { pino, type DestinationStream, type Logger } from 'pino';

export type { Logger } from 'pino';

const DEFAULT_LEVEL = 'info';

/** Options for createLogger. */
export interface LoggerOptions {
  /** Minimum level. Falls back to KVGAS_LOG_LEVEL, then 'info'. */
  readonly level?: string;
  /** Where log lines go. Default: stdout. */
  readonly destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env['KVGAS_LOG_LEVEL'] ?? DEFAULT_LEVEL;
  const opts = { name: 'kvgas', level };
  return options.destination !== undefined ? pino(opts, options.destination) : pino(opts);
}
