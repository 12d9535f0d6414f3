export type ErrorKind =
  | 'fetch'
  | 'parse'
  | 'ledger'
  | 'storage'
  | 'config'
  | 'internal';

export type ErrorSeverity = 'recoverable' | 'fatal';

export interface CorpusErrorProps {
  message: string;
  kind: ErrorKind;
  severity?: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class CorpusError extends Error {
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly details?: Record<string, unknown>;

  constructor({ message, kind, severity = 'recoverable', details, cause }: CorpusErrorProps) {
    super(message, cause ? { cause } : undefined);
    this.name = `${capitalize(kind)}Error`;
    this.kind = kind;
    this.severity = severity;
    this.details = details;
  }
}

export function isCorpusError(value: unknown): value is CorpusError {
  return value instanceof CorpusError;
}

export function ensureCorpusError(
  error: unknown,
  fallback: Partial<CorpusErrorProps> & Pick<CorpusErrorProps, 'kind'> = { kind: 'internal' },
): CorpusError {
  if (isCorpusError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new CorpusError({
    message,
    kind: fallback.kind,
    severity: fallback.severity ?? 'fatal',
    details: fallback.details,
    cause: error instanceof Error ? error : undefined,
  });
}

export function createFetchError(
  message: string,
  details: Record<string, unknown> = {},
  options: { severity?: ErrorSeverity; cause?: unknown } = {},
): CorpusError {
  return new CorpusError({
    message,
    kind: 'fetch',
    severity: options.severity ?? 'recoverable',
    details,
    cause: options.cause,
  });
}

export function createParseError(
  message: string,
  details: Record<string, unknown> = {},
  options: { severity?: ErrorSeverity; cause?: unknown } = {},
): CorpusError {
  return new CorpusError({
    message,
    kind: 'parse',
    severity: options.severity ?? 'recoverable',
    details,
    cause: options.cause,
  });
}

/**
 * A ledger that cannot be replayed exactly is never trusted: the seen-set built
 * from it decides which identifiers are fetched again.
 */
export function createLedgerError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): CorpusError {
  return new CorpusError({
    message,
    kind: 'ledger',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

export function createStorageError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): CorpusError {
  return new CorpusError({
    message,
    kind: 'storage',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

export function createConfigurationError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): CorpusError {
  return new CorpusError({
    message,
    kind: 'config',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

function capitalize(value: string): string {
  if (!value) {
    return value;
  }
  return value.charAt(0).toUpperCase() + value.slice(1);
}
