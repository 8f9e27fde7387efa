import { v4 as uuid } from 'uuid';

import { telemetry } from '../telemetry/Telemetry';
import {
  asDomainError,
  type DomainError,
  type DomainErrorCode,
} from './DomainError';

export type PublicApiError = {
  errorId: string;
  code: DomainErrorCode;
  message: string;
  retryable: boolean;
  /** Violated input field, for validation failures. */
  field?: string;
};

export type ApiErrorResponse = {
  success: false;
  errorMessage: string;
  error: PublicApiError;
};

type ErrorPolicy = {
  status: number;
  /** Whether the error's own message is safe to return to the client. */
  exposeMessage: boolean;
  fallbackMessage: string;
};

const ERROR_POLICIES: Readonly<Record<DomainErrorCode, ErrorPolicy>> = {
  VALIDATION_ERROR: {
    status: 400,
    exposeMessage: true,
    fallbackMessage: 'Invalid request.',
  },
  NOT_FOUND: {
    status: 404,
    exposeMessage: true,
    fallbackMessage: 'Requested resource not found.',
  },
  COMPUTATION_ERROR: {
    status: 422,
    exposeMessage: true,
    fallbackMessage:
      'Inputs produce values outside the range the estimator can compute.',
  },
  DATA_INTEGRITY_ERROR: {
    status: 500,
    exposeMessage: false,
    fallbackMessage:
      'Catalog data is inconsistent. Please contact an administrator.',
  },
  UNKNOWN_ERROR: {
    status: 500,
    exposeMessage: false,
    fallbackMessage: 'Unexpected error.',
  },
};

export const httpStatusFor = (code: DomainErrorCode): number =>
  ERROR_POLICIES[code].status;

const publicMessageFor = (err: DomainError): string => {
  const policy = ERROR_POLICIES[err.code];
  return policy.exposeMessage && err.message
    ? err.message
    : policy.fallbackMessage;
};

/**
 * Converts anything a handler throws into a status and error envelope.
 *
 * The full error (details, stack) is written to one structured log line
 * keyed by `errorId`; the client only sees the public message and the id.
 */
export function mapErrorToApiResponse(
  err: unknown,
  context: { operation: string },
): { status: number; body: ApiErrorResponse } {
  const domain = asDomainError(err);
  const errorId = uuid();
  const { operation } = context;

  telemetry.record({
    name: 'api.error',
    durationMs: 0,
    tags: { operation, code: domain.code, errorId },
    metrics: {},
  });

  // eslint-disable-next-line no-console
  console.error(
    JSON.stringify({
      type: 'moldcheck.error',
      errorId,
      operation,
      code: domain.code,
      field: domain.field,
      message: domain.message,
      details: domain.details,
      stack: domain.stack,
    }),
  );

  const message = publicMessageFor(domain);
  const error: PublicApiError = {
    errorId,
    code: domain.code,
    message,
    retryable: domain.retryable,
  };
  if (domain.field) error.field = domain.field;

  return {
    status: httpStatusFor(domain.code),
    body: { success: false, errorMessage: message, error },
  };
}
