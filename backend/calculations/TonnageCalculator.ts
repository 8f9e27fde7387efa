import {
  type EngineResult,
  fail,
  isPositiveFinite,
  requireFinite,
  succeed,
} from '../analysis/AnalysisError';

import { clampForceKn, CONSERVATIVE_TONNAGE_MARGIN } from './Formulas';
import { kilonewtonsToMetricTons } from './Units';

export type TonnageInput = {
  projectedAreaCm2: number;
  cavityCount: number;
  cavityPressureMpa: number;
  safetyFactor: number;
};

/** Clamp tonnage range in metric tons. */
export type TonnageRange = {
  minimum: number;
  recommended: number;
  conservative: number;
  clampForceKn: number;
};

/**
 * Clamp tonnage from projected area, cavity count and cavity pressure.
 *
 * minimum = F / g; recommended = minimum × SF; conservative = recommended × 1.1
 */
export function calculateTonnage(
  input: TonnageInput,
): EngineResult<TonnageRange> {
  if (!isPositiveFinite(input.projectedAreaCm2)) {
    return fail(
      'InvalidGeometry',
      'projectedAreaCm2',
      'Projected area must be greater than 0 cm².',
    );
  }
  if (!Number.isInteger(input.cavityCount) || input.cavityCount < 1) {
    return fail(
      'InvalidConfig',
      'cavityCount',
      'Cavity count must be an integer of at least 1.',
    );
  }
  if (!isPositiveFinite(input.cavityPressureMpa)) {
    return fail(
      'InvalidMaterial',
      'cavityPressureMpa',
      'Cavity pressure must be greater than 0 MPa.',
    );
  }
  if (!isPositiveFinite(input.safetyFactor)) {
    return fail(
      'InvalidConfig',
      'safetyFactor',
      'Safety factor must be greater than 0.',
    );
  }

  const forceKn = clampForceKn(
    input.projectedAreaCm2,
    input.cavityCount,
    input.cavityPressureMpa,
  );
  const minimum = requireFinite(
    kilonewtonsToMetricTons(forceKn),
    'tonnage.minimum',
  );
  if (!minimum.ok) return minimum;

  const recommended = minimum.value * input.safetyFactor;
  const conservative = requireFinite(
    recommended * CONSERVATIVE_TONNAGE_MARGIN,
    'tonnage.conservative',
  );
  if (!conservative.ok) return conservative;

  return succeed({
    minimum: minimum.value,
    recommended,
    conservative: conservative.value,
    clampForceKn: forceKn,
  });
}
