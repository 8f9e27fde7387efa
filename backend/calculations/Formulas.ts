import type { BoundingBox } from '../domain/GeometrySummary';
import type {
  MaterialMorphology,
  NumericRange,
  ViscosityClass,
} from '../domain/MaterialProperties';
import type { GateLocation, GateType } from '../domain/ProcessConfig';

import { cm2ToMm2, newtonsToKilonewtons } from './Units';

/**
 * Closed-form injection-molding formulas.
 *
 * Every function here is pure and unvalidated: callers (the calculators)
 * check preconditions and guard against non-finite results. Constants are
 * declared, not derived; keep them stable since warning thresholds are
 * calibrated against them.
 */

// ---- Clamp force ----

/**
 * Clamp force in kN.
 *
 * F = A[mm²] × n × P[MPa] / 1000  (MPa × mm² = N)
 *
 * Reference: Rosato, "Injection Molding Handbook", 3rd Ed.
 */
export const clampForceKn = (
  projectedAreaCm2: number,
  cavityCount: number,
  cavityPressureMpa: number,
): number =>
  newtonsToKilonewtons(
    cm2ToMm2(projectedAreaCm2) * cavityCount * cavityPressureMpa,
  );

/** Margin applied on top of the safety-factored tonnage. */
export const CONSERVATIVE_TONNAGE_MARGIN = 1.1;

export const rangeMidpoint = (range: NumericRange): number =>
  (range.min + range.max) / 2;

// ---- Gate / runner sizing ----

export const GATE_BASE_FRACTION_OF_THICKNESS = 0.6;
export const GATE_MIN_FRACTION_OF_THICKNESS = 0.4;
export const GATE_MAX_FRACTION_OF_THICKNESS = 0.8;
export const GATE_MIN_DIAMETER_MM = 0.8;
export const RUNNER_TO_GATE_RATIO = 1.75;

const GATE_VISCOSITY_ADJUSTMENT: Record<ViscosityClass, number> = {
  low: -0.05,
  medium: 0,
  high: 0.1,
};

/** Pin and submarine gates run smaller than edge gates; fan gates larger. */
export const GATE_TYPE_FACTOR: Record<GateType, number> = {
  edge: 1.0,
  fan: 1.1,
  submarine: 0.85,
  pin: 0.75,
};

const clamp = (value: number, min: number, max: number) =>
  Math.min(max, Math.max(min, value));

/**
 * Gate diameter heuristic: 40–80% of the max wall thickness, adjusted for
 * viscosity, part volume and gate type, with a 0.8 mm floor.
 */
export const recommendGateDiameterMm = (params: {
  maxThicknessMm: number;
  volumeCm3: number;
  viscosityClass: ViscosityClass;
  gateType: GateType;
}): number => {
  const volumeAdjustment = Math.min(0.1, (params.volumeCm3 / 500) * 0.1);
  const fraction = clamp(
    GATE_BASE_FRACTION_OF_THICKNESS +
      GATE_VISCOSITY_ADJUSTMENT[params.viscosityClass] +
      volumeAdjustment,
    GATE_MIN_FRACTION_OF_THICKNESS,
    GATE_MAX_FRACTION_OF_THICKNESS,
  );

  const diameter =
    params.maxThicknessMm * fraction * GATE_TYPE_FACTOR[params.gateType];
  return Math.max(diameter, GATE_MIN_DIAMETER_MM);
};

/** Runner ≈ 1.5–2× gate diameter (Beaumont, Runner and Gating Design). */
export const recommendRunnerDiameterMm = (gateDiameterMm: number): number =>
  gateDiameterMm * RUNNER_TO_GATE_RATIO;

export const circleAreaMm2 = (diameterMm: number): number =>
  Math.PI * (diameterMm / 2) ** 2;

// ---- Fill ----

/** cm³/s per mm² of gate area at reference conditions. */
export const BASE_FLOW_RATE_CM3_PER_S_PER_MM2 = 12.0;

/** Wall thickness the base flow rate is normalised to. */
export const REFERENCE_WALL_THICKNESS_MM = 2.5;

/** Cap on the thickness factor so thick parts do not fill arbitrarily fast. */
export const MAX_THICKNESS_FLOW_FACTOR = 1.2;

export const FILL_VISCOSITY_FACTOR: Record<ViscosityClass, number> = {
  low: 0.8,
  medium: 1.0,
  high: 1.3,
};

export const thicknessFlowFactor = (avgThicknessMm: number): number =>
  Math.min(
    avgThicknessMm / REFERENCE_WALL_THICKNESS_MM,
    MAX_THICKNESS_FLOW_FACTOR,
  );

/**
 * Volumetric flow rate through the gate.
 *
 * Q = q₀ × A_gate / k_visc × min(t_avg / 2.5, 1.2)
 */
export const fillFlowRateCm3PerS = (params: {
  gateDiameterMm: number;
  viscosityClass: ViscosityClass;
  avgThicknessMm: number;
}): number =>
  ((BASE_FLOW_RATE_CM3_PER_S_PER_MM2 * circleAreaMm2(params.gateDiameterMm)) /
    FILL_VISCOSITY_FACTOR[params.viscosityClass]) *
  thicknessFlowFactor(params.avgThicknessMm);

/** t = V / Q */
export const fillTimeSeconds = (
  volumeCm3: number,
  flowRateCm3PerS: number,
): number => volumeCm3 / flowRateCm3PerS;

// ---- Flow length / injection pressure ----

type Axis = 'x' | 'y' | 'z';

/** The two largest bounding-box axes, largest first (stable on ties). */
const largestFaceAxes = (bbox: BoundingBox): [Axis, Axis] => {
  const axes: Axis[] = ['x', 'y', 'z'];
  const sorted = [...axes].sort((a, b) => bbox[b] - bbox[a]);
  return [sorted[0], sorted[1]];
};

/** Largest bounding-box face, as width ≥ height. */
export const largestFaceMm = (
  bbox: BoundingBox,
): { width: number; height: number } => {
  const [first, second] = largestFaceAxes(bbox);
  return { width: bbox[first], height: bbox[second] };
};

/**
 * Longest flow path approximation.
 *
 * The gate is assumed to sit on the largest bounding-box face (the plane of
 * the two largest dimensions). Without a gate location it sits at the centre
 * of that face and the flow length is the face's half-diagonal; with one, the
 * gate is projected onto the face and the flow length is the distance to the
 * farthest face corner.
 */
export const estimateFlowLengthMm = (
  bbox: BoundingBox,
  gate?: GateLocation,
): number => {
  const [first, second] = largestFaceAxes(bbox);
  const spanFirst = bbox[first];
  const spanSecond = bbox[second];

  if (!gate) return Math.hypot(spanFirst / 2, spanSecond / 2);

  const reachFirst = Math.max(gate[first], spanFirst - gate[first]);
  const reachSecond = Math.max(gate[second], spanSecond - gate[second]);
  return Math.hypot(reachFirst, reachSecond);
};

export const flowLengthRatio = (
  flowLengthMm: number,
  wallThicknessMm: number,
): number => flowLengthMm / wallThicknessMm;

export const PRESSURE_VISCOSITY_MULTIPLIER: Record<ViscosityClass, number> = {
  low: 0.85,
  medium: 1.0,
  high: 1.25,
};

/** Flow ratio below which no extra pressure is needed. */
export const PRESSURE_REFERENCE_FLOW_RATIO = 50;

/**
 * Injection pressure correlation.
 *
 * P = P_base × k_visc × (1 + 0.3 × log10(max(L/t ÷ 50, 1)))
 */
export const injectionPressureMpa = (params: {
  basePressureMpa: number;
  viscosityClass: ViscosityClass;
  flowRatio: number;
}): number => {
  const ratioFactor =
    1 +
    0.3 *
      Math.log10(
        Math.max(params.flowRatio / PRESSURE_REFERENCE_FLOW_RATIO, 1),
      );
  return (
    params.basePressureMpa *
    PRESSURE_VISCOSITY_MULTIPLIER[params.viscosityClass] *
    ratioFactor
  );
};

export type FlowLengthRiskStatus = 'safe' | 'borderline' | 'risk';

/** Fraction of the material limit at which flow length becomes a concern. */
export const BORDERLINE_FLOW_RATIO_FRACTION = 0.7;

/**
 * Flow-length check against the material limit.
 *
 * Bands: safe < 0.7×limit ≤ borderline ≤ limit < risk.
 */
export const classifyFlowLengthRisk = (
  flowRatio: number,
  maxFlowLengthRatio: number,
): { status: FlowLengthRiskStatus; utilizationPercent: number } => {
  const utilizationPercent = (flowRatio / maxFlowLengthRatio) * 100;
  if (flowRatio > maxFlowLengthRatio)
    return { status: 'risk', utilizationPercent };
  if (flowRatio >= maxFlowLengthRatio * BORDERLINE_FLOW_RATIO_FRACTION)
    return { status: 'borderline', utilizationPercent };
  return { status: 'safe', utilizationPercent };
};

// ---- Cycle ----

/** Cooling coefficients in s/mm² (Menges, "How to Make Injection Molds"). */
export const COOLING_COEFFICIENT: Record<MaterialMorphology, number> = {
  crystalline: 2.5,
  amorphous: 2.0,
};

export const PACK_TO_COOLING_RATIO = 0.3;

/** Mold open/close plus ejection. */
export const MOLD_OVERHEAD_SECONDS = 3.0;

/** Cooling ≈ k × t² */
export const coolingTimeSeconds = (
  maxThicknessMm: number,
  morphology: MaterialMorphology,
): number => COOLING_COEFFICIENT[morphology] * maxThicknessMm ** 2;

export const packTimeSeconds = (coolingSeconds: number): number =>
  coolingSeconds * PACK_TO_COOLING_RATIO;

// ---- Weight ----

/** W = V × ρ */
export const partWeightGrams = (
  volumeCm3: number,
  densityGPerCm3: number,
): number => volumeCm3 * densityGPerCm3;
