export type AnalysisErrorKind =
  | 'InvalidGeometry'
  | 'InvalidMaterial'
  | 'InvalidMachine'
  | 'InvalidConfig'
  | 'ComputationOverflow';

/**
 * Engine failure, reported through the return value (never thrown).
 *
 * `field` names the violated precondition using the input's property path,
 * e.g. `wallThicknessMm.min` or `config.cavityCount`.
 */
export type AnalysisError = {
  kind: AnalysisErrorKind;
  field: string;
  message: string;
};

export type EngineResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: AnalysisError };

export const succeed = <T>(value: T): EngineResult<T> => ({ ok: true, value });

export const fail = (
  kind: AnalysisErrorKind,
  field: string,
  message: string,
): { ok: false; error: AnalysisError } => ({
  ok: false,
  error: { kind, field, message },
});

export const isPositiveFinite = (value: unknown): value is number =>
  typeof value === 'number' && Number.isFinite(value) && value > 0;

/** Guards derived values against degenerate inputs (NaN / Infinity). */
export const requireFinite = (
  value: number,
  field: string,
): EngineResult<number> =>
  Number.isFinite(value)
    ? succeed(value)
    : fail(
        'ComputationOverflow',
        field,
        `Computed ${field} is not a finite number.`,
      );
