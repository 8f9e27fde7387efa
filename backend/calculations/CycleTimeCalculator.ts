import {
  type EngineResult,
  fail,
  isPositiveFinite,
  requireFinite,
  succeed,
} from '../analysis/AnalysisError';
import type {
  MaterialMorphology,
  MaterialProperties,
} from '../domain/MaterialProperties';

import {
  coolingTimeSeconds,
  MOLD_OVERHEAD_SECONDS,
  packTimeSeconds,
} from './Formulas';

/** Polymer family → morphology. Keys are upper-case category codes. */
export const CATEGORY_MORPHOLOGY: Readonly<Record<string, MaterialMorphology>> =
  Object.freeze({
    PP: 'crystalline',
    PE: 'crystalline',
    HDPE: 'crystalline',
    LDPE: 'crystalline',
    PA: 'crystalline',
    POM: 'crystalline',
    PBT: 'crystalline',
    PET: 'crystalline',
    PPS: 'crystalline',
    PEEK: 'crystalline',
    ABS: 'amorphous',
    PC: 'amorphous',
    PS: 'amorphous',
    HIPS: 'amorphous',
    PMMA: 'amorphous',
    SAN: 'amorphous',
    ASA: 'amorphous',
    'PC+ABS': 'amorphous',
    PVC: 'amorphous',
    PPO: 'amorphous',
  });

export function resolveMorphology(
  material: Pick<MaterialProperties, 'category' | 'morphology'>,
): EngineResult<MaterialMorphology> {
  if (material.morphology) return succeed(material.morphology);

  const key = material.category.trim().toUpperCase();
  const morphology = CATEGORY_MORPHOLOGY[key];
  if (!morphology) {
    return fail(
      'InvalidMaterial',
      'category',
      `Material category "${material.category}" has no known morphology; set morphology explicitly.`,
    );
  }
  return succeed(morphology);
}

export type CycleTimeInput = {
  fillTimeS: number;
  maxThicknessMm: number;
  morphology: MaterialMorphology;
};

/** Cycle breakdown in seconds; `total` is exactly the sum of the parts. */
export type CycleTimeBreakdown = {
  fill: number;
  pack: number;
  cool: number;
  overhead: number;
  total: number;
};

/**
 * Cycle = Fill + Pack + Cool + Mold open/close.
 *
 * Cooling dominates and scales with the square of the thickest wall.
 */
export function calculateCycleTime(
  input: CycleTimeInput,
): EngineResult<CycleTimeBreakdown> {
  if (!Number.isFinite(input.fillTimeS) || input.fillTimeS < 0) {
    return fail(
      'ComputationOverflow',
      'fillTimeS',
      'Fill time must be a finite, non-negative number of seconds.',
    );
  }
  if (!isPositiveFinite(input.maxThicknessMm)) {
    return fail(
      'InvalidGeometry',
      'wallThicknessMm.max',
      'Max wall thickness must be greater than 0 mm.',
    );
  }

  const cool = coolingTimeSeconds(input.maxThicknessMm, input.morphology);
  const pack = packTimeSeconds(cool);
  const overhead = MOLD_OVERHEAD_SECONDS;

  const total = requireFinite(
    input.fillTimeS + pack + cool + overhead,
    'cycle.total',
  );
  if (!total.ok) return total;

  return succeed({
    fill: input.fillTimeS,
    pack,
    cool,
    overhead,
    total: total.value,
  });
}
