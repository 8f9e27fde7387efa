import type { GeometrySummary } from '../domain/GeometrySummary';
import type { MachineSpec } from '../domain/MachineSpec';
import {
  isMaterialMorphology,
  isViscosityClass,
  type MaterialProperties,
  type NumericRange,
} from '../domain/MaterialProperties';
import { isGateType, type ProcessConfig } from '../domain/ProcessConfig';

import {
  type AnalysisErrorKind,
  type EngineResult,
  fail,
  isPositiveFinite,
  succeed,
} from './AnalysisError';

/**
 * One validation pass per input category. Each validator short-circuits on
 * the first violated precondition and names it in `field`.
 */

type Check = { ok: true } | { ok: false; field: string; message: string };

const pass: Check = { ok: true };

const positive = (value: unknown, field: string, unit: string): Check =>
  isPositiveFinite(value)
    ? pass
    : { ok: false, field, message: `${field} must be greater than 0${unit}.` };

const finite = (value: unknown, field: string): Check =>
  typeof value === 'number' && Number.isFinite(value)
    ? pass
    : { ok: false, field, message: `${field} must be a finite number.` };

const orderedRange = (
  range: NumericRange | undefined,
  field: string,
  options: { minFloor?: number; positive?: boolean } = {},
): Check => {
  if (!range) return { ok: false, field, message: `${field} is required.` };

  const minCheck = options.positive
    ? positive(range.min, `${field}.min`, '')
    : finite(range.min, `${field}.min`);
  if (!minCheck.ok) return minCheck;
  const maxCheck = finite(range.max, `${field}.max`);
  if (!maxCheck.ok) return maxCheck;

  if (options.minFloor !== undefined && range.min < options.minFloor) {
    return {
      ok: false,
      field: `${field}.min`,
      message: `${field}.min must be at least ${options.minFloor}.`,
    };
  }
  if (range.max < range.min) {
    return {
      ok: false,
      field,
      message: `${field}.max must be greater than or equal to ${field}.min.`,
    };
  }
  return pass;
};

const firstFailure = (checks: Array<() => Check>): Check => {
  for (const check of checks) {
    const result = check();
    if (!result.ok) return result;
  }
  return pass;
};

const toResult = <T>(
  kind: AnalysisErrorKind,
  check: Check,
  value: T,
  prefix = '',
): EngineResult<T> =>
  check.ok
    ? succeed(value)
    : fail(kind, `${prefix}${check.field}`, check.message);

const nonEmptyString = (value: unknown, field: string): Check =>
  typeof value === 'string' && value.trim().length > 0
    ? pass
    : { ok: false, field, message: `${field} is required.` };

export function validateGeometry(
  geometry: GeometrySummary,
): EngineResult<GeometrySummary> {
  const thickness = geometry.wallThicknessMm;
  const bbox = geometry.boundingBoxMm;

  const check = firstFailure([
    () => positive(geometry.volumeCm3, 'volumeCm3', ' cm³'),
    () => positive(geometry.projectedAreaCm2, 'projectedAreaCm2', ' cm²'),
    () =>
      thickness
        ? pass
        : {
            ok: false,
            field: 'wallThicknessMm',
            message: 'wallThicknessMm is required.',
          },
    () => positive(thickness.min, 'wallThicknessMm.min', ' mm'),
    () => positive(thickness.avg, 'wallThicknessMm.avg', ' mm'),
    () => positive(thickness.max, 'wallThicknessMm.max', ' mm'),
    () =>
      thickness.min <= thickness.avg && thickness.avg <= thickness.max
        ? pass
        : {
            ok: false,
            field: 'wallThicknessMm',
            message: 'Wall thickness must satisfy min ≤ avg ≤ max.',
          },
    () =>
      bbox
        ? pass
        : {
            ok: false,
            field: 'boundingBoxMm',
            message: 'boundingBoxMm is required.',
          },
    () => positive(bbox.x, 'boundingBoxMm.x', ' mm'),
    () => positive(bbox.y, 'boundingBoxMm.y', ' mm'),
    () => positive(bbox.z, 'boundingBoxMm.z', ' mm'),
    () =>
      geometry.surfaceAreaCm2 === undefined
        ? pass
        : positive(geometry.surfaceAreaCm2, 'surfaceAreaCm2', ' cm²'),
    () =>
      geometry.provenance === 'from-cad' ||
      geometry.provenance === 'manual-estimate'
        ? pass
        : {
            ok: false,
            field: 'provenance',
            message: 'provenance must be "from-cad" or "manual-estimate".',
          },
  ]);

  return toResult('InvalidGeometry', check, geometry);
}

export function validateMaterial(
  material: MaterialProperties,
): EngineResult<MaterialProperties> {
  const check = firstFailure([
    () => nonEmptyString(material.id, 'id'),
    () => nonEmptyString(material.category, 'category'),
    () =>
      material.morphology === undefined ||
      isMaterialMorphology(material.morphology)
        ? pass
        : {
            ok: false,
            field: 'morphology',
            message: 'morphology must be "crystalline" or "amorphous".',
          },
    () => orderedRange(material.meltTempC, 'meltTempC'),
    () => orderedRange(material.moldTempC, 'moldTempC'),
    () => positive(material.densityGPerCm3, 'densityGPerCm3', ' g/cm³'),
    () =>
      orderedRange(material.shrinkagePercent, 'shrinkagePercent', {
        minFloor: 0,
      }),
    () =>
      isViscosityClass(material.viscosityClass)
        ? pass
        : {
            ok: false,
            field: 'viscosityClass',
            message: 'viscosityClass must be one of low, medium, high.',
          },
    () => positive(material.maxFlowLengthRatio, 'maxFlowLengthRatio', ''),
    () =>
      orderedRange(material.cavityPressureMpa, 'cavityPressureMpa', {
        positive: true,
      }),
  ]);

  return toResult('InvalidMaterial', check, material);
}

export function validateMachine(
  machine: MachineSpec,
  index: number,
): EngineResult<MachineSpec> {
  const check = firstFailure([
    () => nonEmptyString(machine.id, 'id'),
    () => positive(machine.tonnage, 'tonnage', ' T'),
    () => positive(machine.maxShotVolumeCm3, 'maxShotVolumeCm3', ' cm³'),
    () => positive(machine.platenMm?.width, 'platenMm.width', ' mm'),
    () => positive(machine.platenMm?.height, 'platenMm.height', ' mm'),
    () =>
      positive(
        machine.tieBarSpacingMm?.horizontal,
        'tieBarSpacingMm.horizontal',
        ' mm',
      ),
    () =>
      positive(
        machine.tieBarSpacingMm?.vertical,
        'tieBarSpacingMm.vertical',
        ' mm',
      ),
  ]);

  return toResult('InvalidMachine', check, machine, `machines[${index}].`);
}

export function validateMachines(
  machines: readonly MachineSpec[],
): EngineResult<readonly MachineSpec[]> {
  for (let i = 0; i < machines.length; i += 1) {
    const result = validateMachine(machines[i], i);
    if (!result.ok) return result;
  }
  return succeed(machines);
}

/**
 * Process config checks. Needs the geometry to place the optional gate
 * location inside the bounding box.
 */
export function validateConfig(
  config: ProcessConfig,
  geometry: GeometrySummary,
): EngineResult<ProcessConfig> {
  const gate = config.gateLocationMm;
  const bbox = geometry.boundingBoxMm;

  const check = firstFailure([
    () =>
      Number.isInteger(config.cavityCount) && config.cavityCount >= 1
        ? pass
        : {
            ok: false,
            field: 'cavityCount',
            message: 'cavityCount must be an integer of at least 1.',
          },
    () =>
      isGateType(config.gateType)
        ? pass
        : {
            ok: false,
            field: 'gateType',
            message: 'gateType must be one of edge, pin, fan, submarine.',
          },
    () => positive(config.safetyFactor, 'safetyFactor', ''),
    () =>
      config.gateDiameterMm === undefined
        ? pass
        : positive(config.gateDiameterMm, 'gateDiameterMm', ' mm'),
    () =>
      config.runnerDiameterMm === undefined
        ? pass
        : positive(config.runnerDiameterMm, 'runnerDiameterMm', ' mm'),
    () => {
      if (!gate) return pass;
      const axes = ['x', 'y', 'z'] as const;
      for (const axis of axes) {
        const value = gate[axis];
        if (
          typeof value !== 'number' ||
          !Number.isFinite(value) ||
          value < 0 ||
          value > bbox[axis]
        ) {
          return {
            ok: false,
            field: `gateLocationMm.${axis}`,
            message: `gateLocationMm.${axis} must lie within the bounding box [0, ${bbox[axis]}] mm.`,
          };
        }
      }
      return pass;
    },
  ]);

  return toResult('InvalidConfig', check, config, 'config.');
}
