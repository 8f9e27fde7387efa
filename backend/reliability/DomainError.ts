/**
 * Failure categories surfaced by the service layer.
 *
 * Engine failures arrive as `AnalysisError` values and are converted at the
 * service boundary; everything thrown past a controller is one of these.
 */
export type DomainErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'COMPUTATION_ERROR'
  | 'DATA_INTEGRITY_ERROR'
  | 'UNKNOWN_ERROR';

export type DomainErrorDetails = Record<string, unknown>;

export type DomainErrorInit = {
  code: DomainErrorCode;
  message: string;
  details?: DomainErrorDetails;
  retryable?: boolean;
  cause?: unknown;
};

export class DomainError extends Error {
  readonly code: DomainErrorCode;
  readonly details?: DomainErrorDetails;
  readonly cause?: unknown;
  readonly retryable: boolean;

  constructor({
    code,
    message,
    details,
    retryable = false,
    cause,
  }: DomainErrorInit) {
    super(message);
    this.name = 'DomainError';
    this.code = code;
    this.details = details;
    this.retryable = retryable;
    this.cause = cause;
  }

  /** Offending input path for validation failures, e.g. `geometry.volumeCm3`. */
  get field(): string | undefined {
    const field = this.details?.field;
    return typeof field === 'string' ? field : undefined;
  }
}

export const isDomainError = (err: unknown): err is DomainError =>
  err instanceof DomainError;

/** Wraps anything thrown so callers only ever handle one error shape. */
export const asDomainError = (err: unknown): DomainError =>
  isDomainError(err)
    ? err
    : new DomainError({
        code: 'UNKNOWN_ERROR',
        message: err instanceof Error ? err.message : 'Unexpected error.',
        cause: err,
      });

export const validationError = (field: string, message: string) =>
  new DomainError({ code: 'VALIDATION_ERROR', message, details: { field } });

export const notFoundError = (resource: string, id: string) =>
  new DomainError({
    code: 'NOT_FOUND',
    message: `${resource} not found.`,
    details: { resource, id },
  });
