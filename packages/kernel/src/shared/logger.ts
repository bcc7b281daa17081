/**
 * Structured logging for the kernel.
 *
 * JSON logs through pino with the level emitted as a label and the kernel's
 * identity in every record. Runs get a child logger bound to their plan id.
 */

import pino from 'pino';

export type LogLevel = pino.LevelWithSilent;

export type Logger = pino.Logger;

export interface LoggerOptions {
  component: string;
  level?: LogLevel;
  environment?: string;
  /** Destination stream; stdout when omitted */
  destination?: pino.DestinationStream;
}

const LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

export function createLogger(options: LoggerOptions): Logger {
  const config: pino.LoggerOptions = {
    level: options.level ?? 'info',
    formatters: {
      level: (label) => ({ level: label }),
    },
    base: {
      service: 'mesh-kernel',
      component: options.component,
      environment: options.environment ?? process.env['NODE_ENV'] ?? 'development',
    },
  };

  return options.destination ? pino(config, options.destination) : pino(config);
}

/**
 * Logger that drops everything; the default for library callers that did
 * not wire one in.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Serialise an error for a log record
 */
export function errorFields(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: { name: error.name, message: error.message, stack: error.stack } };
  }
  return { error: { message: String(error) } };
}
