import { runAnalysis } from '../analysis/AnalysisOrchestrator';
import type { AnalysisResult } from '../analysis/AnalysisResult';
import type { GeometrySummary } from '../domain/GeometrySummary';
import type { MachineSpec } from '../domain/MachineSpec';
import type { MaterialProperties } from '../domain/MaterialProperties';
import type { ProcessConfig } from '../domain/ProcessConfig';

export const makeGeometry = (
  overrides?: Partial<GeometrySummary>,
): GeometrySummary => ({
  volumeCm3: 50,
  projectedAreaCm2: 100,
  wallThicknessMm: { min: 1.5, avg: 2.5, max: 3 },
  boundingBoxMm: { x: 150, y: 100, z: 30 },
  provenance: 'from-cad',
  ...(overrides ?? {}),
});

export const makeMaterial = (
  overrides?: Partial<MaterialProperties>,
): MaterialProperties => ({
  id: 'test-abs',
  name: 'Test ABS',
  category: 'ABS',
  meltTempC: { min: 220, max: 260 },
  moldTempC: { min: 50, max: 80 },
  densityGPerCm3: 1.05,
  shrinkagePercent: { min: 0.4, max: 0.7 },
  viscosityClass: 'medium',
  maxFlowLengthRatio: 150,
  cavityPressureMpa: { min: 80, max: 120 },
  ...(overrides ?? {}),
});

export const makeMachine = (
  id: string,
  tonnage: number,
  maxShotVolumeCm3: number,
  overrides?: Partial<MachineSpec>,
): MachineSpec => ({
  id,
  name: `${tonnage}T Test`,
  tonnage,
  maxShotVolumeCm3,
  platenMm: { width: 600, height: 600 },
  tieBarSpacingMm: { horizontal: 480, vertical: 480 },
  ...(overrides ?? {}),
});

export const makeConfig = (
  overrides?: Partial<ProcessConfig>,
): ProcessConfig => ({
  cavityCount: 1,
  gateType: 'edge',
  safetyFactor: 1.15,
  ...(overrides ?? {}),
});

/** 80T borderline, 120T ideal, 180T acceptable, 250T borderline at 117 T. */
export const makeFleet = (): MachineSpec[] => [
  makeMachine('m-250', 250, 500),
  makeMachine('m-80', 80, 100),
  makeMachine('m-180', 180, 300),
  makeMachine('m-120', 120, 180),
];

/** Engine result for the default fixtures. */
export const makeAnalysisResult = (partId = 'part-1'): AnalysisResult => {
  const result = runAnalysis({
    partId,
    geometry: makeGeometry(),
    material: makeMaterial(),
    machines: makeFleet(),
    config: makeConfig(),
  });
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
};
