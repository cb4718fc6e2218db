/**
 * Logger construction.
 *
 * Components accept an optional pino `Logger` and derive children with a
 * `component` binding; when none is given they fall back to a disabled one.
 */

import { destination, pino, type DestinationStream, type Logger } from 'pino';

export type { Logger };

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'silent'];

export interface LoggerOptions {
  /** Minimum level (default: 'info') */
  level?: LogLevel;
  /** Logger name, added to every line */
  name?: string;
  /** Where lines go (default: stdout) */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const config = {
    level: options.level ?? 'info',
    ...(options.name !== undefined ? { name: options.name } : {}),
  };
  return options.destination !== undefined ? pino(config, options.destination) : pino(config);
}

/**
 * A logger that drops everything.
 */
export function silentLogger(): Logger {
  return pino({ enabled: false });
}

/**
 * Logger writing to stderr, for entry points whose stdout carries a protocol.
 */
export function stderrLogger(options: Omit<LoggerOptions, 'destination'> = {}): Logger {
  return createLogger({ ...options, destination: destination(2) });
}
