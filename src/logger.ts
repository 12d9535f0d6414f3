import pino, { type DestinationStream } from 'pino';

import type { LogLevel } from './types.js';

export interface LoggerLike {
  info(...args: unknown[]): void;
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  trace(...args: unknown[]): void;
  fatal(...args: unknown[]): void;
  child(bindings: Record<string, unknown>): LoggerLike;
}

export interface LoggerConfiguration {
  level?: LogLevel;
  /** Defaults to stderr so that stdout carries only the collection report. */
  destination?: DestinationStream;
}

const SERVICE_NAME = 'recipe-corpus';

// Library use stays quiet until a caller opts in.
let activeLogger: LoggerLike = createPinoInstance('silent');

export function configureLogger(config: LoggerConfiguration = {}): void {
  activeLogger = createPinoInstance(config.level ?? 'silent', config.destination);
}

export function getLogger(): LoggerLike {
  return activeLogger;
}

function createPinoInstance(level: LogLevel, destination?: DestinationStream): LoggerLike {
  return pino(
    {
      level,
      base: { service: SERVICE_NAME },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    destination ?? pino.destination(2),
  );
}
