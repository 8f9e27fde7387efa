import { telemetryStore } from '../../telemetry/TelemetryStore';
import { DomainError, notFoundError, validationError } from '../DomainError';
import { httpStatusFor, mapErrorToApiResponse } from '../FailureHandling';

describe('mapErrorToApiResponse', () => {
  const previousLogs = process.env.MOLDCHECK_TELEMETRY_LOGS;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    process.env.MOLDCHECK_TELEMETRY_LOGS = 'false';
    telemetryStore.reset();
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
    if (previousLogs === undefined) delete process.env.MOLDCHECK_TELEMETRY_LOGS;
    else process.env.MOLDCHECK_TELEMETRY_LOGS = previousLogs;
  });

  test('validation errors are 400 and name the field', () => {
    const { status, body } = mapErrorToApiResponse(
      validationError(
        'config.cavityCount',
        'cavityCount must be an integer of at least 1.',
      ),
      { operation: 'analysis.create' },
    );

    expect(status).toBe(400);
    expect(body.success).toBe(false);
    expect(body.errorMessage).toBe(
      'cavityCount must be an integer of at least 1.',
    );
    expect(body.error.code).toBe('VALIDATION_ERROR');
    expect(body.error.field).toBe('config.cavityCount');
    expect(body.error.retryable).toBe(false);
    expect(body.error.errorId).toMatch(/^[0-9a-f-]{36}$/);
  });

  test('not found errors are 404 without a field', () => {
    const { status, body } = mapErrorToApiResponse(
      notFoundError('Part', 'missing'),
      { operation: 'parts.get' },
    );

    expect(status).toBe(404);
    expect(body.errorMessage).toBe('Part not found.');
    expect(body.error.field).toBeUndefined();
  });

  test('unexpected errors hide their message', () => {
    const { status, body } = mapErrorToApiResponse(new Error('boom'), {
      operation: 'analysis.get',
    });

    expect(status).toBe(500);
    expect(body.error.code).toBe('UNKNOWN_ERROR');
    expect(body.errorMessage).toBe('Unexpected error.');
  });

  test('catalog integrity errors use a fixed public message', () => {
    const { status, body } = mapErrorToApiResponse(
      new DomainError({
        code: 'DATA_INTEGRITY_ERROR',
        message:
          'Invalid machine seed record #3: tonnage must be greater than 0 T.',
      }),
      { operation: 'catalog.load' },
    );

    expect(status).toBe(500);
    expect(body.errorMessage).toBe(
      'Catalog data is inconsistent. Please contact an administrator.',
    );
  });

  test('logs one line and records an api.error event with the same id', () => {
    const { body } = mapErrorToApiResponse(notFoundError('Analysis', 'x'), {
      operation: 'analysis.get',
    });

    expect(errorSpy).toHaveBeenCalledTimes(1);
    const events = telemetryStore.listRecent();
    expect(events).toHaveLength(1);
    expect(events[0].name).toBe('api.error');
    expect(events[0].tags).toEqual({
      operation: 'analysis.get',
      code: 'NOT_FOUND',
      errorId: body.error.errorId,
    });
  });
});

describe('httpStatusFor', () => {
  test.each([
    ['VALIDATION_ERROR', 400],
    ['NOT_FOUND', 404],
    ['COMPUTATION_ERROR', 422],
    ['DATA_INTEGRITY_ERROR', 500],
    ['UNKNOWN_ERROR', 500],
  ] as const)('%s → %d', (code, status) => {
    expect(httpStatusFor(code)).toBe(status);
  });
});
