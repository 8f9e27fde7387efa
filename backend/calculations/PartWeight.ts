import {
  type EngineResult,
  requireFinite,
  succeed,
} from '../analysis/AnalysisError';

import { partWeightGrams } from './Formulas';

export type PartWeight = {
  partWeightG: number;
  shotWeightG: number;
  requiredShotVolumeCm3: number;
};

/**
 * Part and shot weight from one volume/density pair.
 *
 * Callers pass the same geometry and material snapshot used by every other
 * calculator in the run.
 */
export const calculatePartWeight = (params: {
  volumeCm3: number;
  densityGPerCm3: number;
  cavityCount: number;
}): EngineResult<PartWeight> => {
  const partWeightG = requireFinite(
    partWeightGrams(params.volumeCm3, params.densityGPerCm3),
    'partWeightG',
  );
  if (!partWeightG.ok) return partWeightG;

  const shotWeightG = requireFinite(
    partWeightG.value * params.cavityCount,
    'shotWeightG',
  );
  if (!shotWeightG.ok) return shotWeightG;

  const requiredShotVolumeCm3 = requireFinite(
    params.volumeCm3 * params.cavityCount,
    'requiredShotVolumeCm3',
  );
  if (!requiredShotVolumeCm3.ok) return requiredShotVolumeCm3;

  return succeed({
    partWeightG: partWeightG.value,
    shotWeightG: shotWeightG.value,
    requiredShotVolumeCm3: requiredShotVolumeCm3.value,
  });
};
