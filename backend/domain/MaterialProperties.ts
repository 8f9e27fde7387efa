export type ViscosityClass = 'low' | 'medium' | 'high';

export type MaterialMorphology = 'crystalline' | 'amorphous';

export type NumericRange = {
  min: number;
  max: number;
};

/**
 * MaterialProperties (catalog record).
 *
 * Owned by the material catalog; read-only to the analysis engine.
 * Temperatures in °C, density in g/cm³, shrinkage in %, pressure in MPa.
 */
export type MaterialProperties = {
  readonly id: string;
  readonly name: string;
  readonly manufacturer?: string;
  readonly grade?: string;
  /** Polymer family, e.g. ABS, PP, PC. */
  readonly category: string;
  /** Overrides the morphology derived from `category` (custom grades). */
  readonly morphology?: MaterialMorphology;

  readonly meltTempC: Readonly<NumericRange>;
  readonly moldTempC: Readonly<NumericRange>;
  readonly densityGPerCm3: number;
  readonly shrinkagePercent: Readonly<NumericRange>;
  readonly meltFlowIndex?: number;

  readonly viscosityClass: ViscosityClass;
  /** Fillability limit: longest flow path divided by wall thickness. */
  readonly maxFlowLengthRatio: number;
  readonly cavityPressureMpa: Readonly<NumericRange>;

  readonly isCustom?: boolean;
  /** Datasheet citation. */
  readonly source?: string;
};

export const VISCOSITY_CLASSES: readonly ViscosityClass[] = [
  'low',
  'medium',
  'high',
];

export const MATERIAL_MORPHOLOGIES: readonly MaterialMorphology[] = [
  'crystalline',
  'amorphous',
];

export const isViscosityClass = (value: unknown): value is ViscosityClass =>
  value === 'low' || value === 'medium' || value === 'high';

export const isMaterialMorphology = (
  value: unknown,
): value is MaterialMorphology =>
  value === 'crystalline' || value === 'amorphous';
