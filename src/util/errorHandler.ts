import {
  CorpusError,
  ensureCorpusError,
  type ErrorKind,
  type ErrorSeverity,
} from '../errors.js';
import { getLogger, type LoggerLike } from '../logger.js';

/** Where in the walk an error surfaced; these become bindings on the log line. */
export interface ErrorContext {
  site?: string;
  stage?: string;
  id?: number;
  url?: string;
  attempt?: number;
}

export interface ErrorHandlingOptions {
  defaultKind?: ErrorKind;
  defaultSeverity?: ErrorSeverity;
  throwOnFatal?: boolean;
  /** Level for recoverable errors. Fatal errors always log at `error`. */
  recoverableLevel?: 'debug' | 'warn';
  logger?: LoggerLike;
}

const CONTEXT_KEYS = ['site', 'stage', 'id', 'url', 'attempt'] as const;

/**
 * Logs a corpus error as one structured line. Context fields found in either
 * the error details or the explicit context are bound on a child logger; the
 * explicit context wins. Fatal errors are rethrown unless `throwOnFatal` is off.
 */
export function reportCorpusError(
  error: unknown,
  context: ErrorContext = {},
  options: ErrorHandlingOptions = {},
): CorpusError {
  const corpusError = ensureCorpusError(error, {
    kind: options.defaultKind ?? 'internal',
    severity: options.defaultSeverity,
  });

  const details: Record<string, unknown> = { ...(corpusError.details ?? {}) };
  const bindings: Record<string, unknown> = {};
  for (const key of CONTEXT_KEYS) {
    const value = context[key] ?? details[key];
    delete details[key];
    if (value !== undefined) {
      bindings[key] = value;
    }
  }

  const logger = (options.logger ?? getLogger()).child(bindings);
  const entry = {
    kind: corpusError.kind,
    severity: corpusError.severity,
    ...details,
    cause: causeMessage(corpusError),
  };

  if (corpusError.severity === 'fatal') {
    logger.error(entry, corpusError.message);
    if (options.throwOnFatal ?? true) {
      throw corpusError;
    }
  } else if (options.recoverableLevel === 'debug') {
    logger.debug(entry, corpusError.message);
  } else {
    logger.warn(entry, corpusError.message);
  }

  return corpusError;
}

function causeMessage(error: CorpusError): string | undefined {
  return error.cause instanceof Error ? error.cause.message : undefined;
}
