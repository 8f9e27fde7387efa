import {
  type EngineResult,
  fail,
  isPositiveFinite,
  requireFinite,
  succeed,
} from '../analysis/AnalysisError';
import type { BoundingBox, ThicknessRange } from '../domain/GeometrySummary';
import type {
  NumericRange,
  ViscosityClass,
} from '../domain/MaterialProperties';
import type { GateLocation, GateType } from '../domain/ProcessConfig';

import {
  circleAreaMm2,
  classifyFlowLengthRisk,
  estimateFlowLengthMm,
  fillFlowRateCm3PerS,
  fillTimeSeconds,
  flowLengthRatio,
  type FlowLengthRiskStatus,
  injectionPressureMpa,
  rangeMidpoint,
  recommendGateDiameterMm,
  recommendRunnerDiameterMm,
} from './Formulas';

export type FillEstimateInput = {
  volumeCm3: number;
  gateDiameterMm: number;
  viscosityClass: ViscosityClass;
  avgThicknessMm: number;
};

export type FillEstimate = {
  fillTimeS: number;
  flowRateCm3PerS: number;
  gateAreaMm2: number;
};

/**
 * Fill time through a single gate: t = V / Q.
 *
 * A gate diameter ≤ 0 is rejected as invalid input rather than defaulted.
 */
export function estimateFill(
  input: FillEstimateInput,
): EngineResult<FillEstimate> {
  if (!isPositiveFinite(input.volumeCm3)) {
    return fail(
      'InvalidGeometry',
      'volumeCm3',
      'Part volume must be greater than 0 cm³.',
    );
  }
  if (!isPositiveFinite(input.gateDiameterMm)) {
    return fail(
      'InvalidConfig',
      'gateDiameterMm',
      'Gate diameter must be greater than 0 mm.',
    );
  }
  if (!isPositiveFinite(input.avgThicknessMm)) {
    return fail(
      'InvalidGeometry',
      'wallThicknessMm.avg',
      'Average wall thickness must be greater than 0 mm.',
    );
  }

  const flowRateCm3PerS = fillFlowRateCm3PerS(input);
  if (!isPositiveFinite(flowRateCm3PerS)) {
    return fail(
      'ComputationOverflow',
      'flowRateCm3PerS',
      'Fill flow rate is not a positive finite number.',
    );
  }

  const fillTime = requireFinite(
    fillTimeSeconds(input.volumeCm3, flowRateCm3PerS),
    'fillTimeS',
  );
  if (!fillTime.ok) return fillTime;

  return succeed({
    fillTimeS: fillTime.value,
    flowRateCm3PerS,
    gateAreaMm2: circleAreaMm2(input.gateDiameterMm),
  });
}

export type FlowFillInput = {
  volumeCm3: number;
  wallThicknessMm: ThicknessRange;
  boundingBoxMm: BoundingBox;
  viscosityClass: ViscosityClass;
  maxFlowLengthRatio: number;
  cavityPressureMpa: NumericRange;
  gateType: GateType;
  gateDiameterMm?: number;
  runnerDiameterMm?: number;
  gateLocationMm?: GateLocation;
};

export type FlowFillResult = {
  gateDiameterMm: number;
  gateDiameterSource: 'recommended' | 'override';
  runnerDiameterMm: number;
  runnerDiameterSource: 'recommended' | 'override';
  gateAreaMm2: number;
  flowRateCm3PerS: number;
  fillTimeS: number;
  flowLengthMm: number;
  flowRatio: number;
  flowLengthRisk: {
    status: FlowLengthRiskStatus;
    utilizationPercent: number;
    maxFlowLengthRatio: number;
  };
  injectionPressureMpa: number;
};

/**
 * Gate/runner sizing, fill time, flow-length ratio and injection pressure.
 *
 * Overrides from the process config win over the heuristics; the runner is
 * sized from whichever gate diameter is in effect.
 */
export function calculateFlowFill(
  input: FlowFillInput,
): EngineResult<FlowFillResult> {
  if (
    input.gateDiameterMm !== undefined &&
    !isPositiveFinite(input.gateDiameterMm)
  ) {
    return fail(
      'InvalidConfig',
      'gateDiameterMm',
      'Gate diameter override must be greater than 0 mm.',
    );
  }
  if (
    input.runnerDiameterMm !== undefined &&
    !isPositiveFinite(input.runnerDiameterMm)
  ) {
    return fail(
      'InvalidConfig',
      'runnerDiameterMm',
      'Runner diameter override must be greater than 0 mm.',
    );
  }

  const gateDiameterMm =
    input.gateDiameterMm ??
    recommendGateDiameterMm({
      maxThicknessMm: input.wallThicknessMm.max,
      volumeCm3: input.volumeCm3,
      viscosityClass: input.viscosityClass,
      gateType: input.gateType,
    });
  const runnerDiameterMm =
    input.runnerDiameterMm ?? recommendRunnerDiameterMm(gateDiameterMm);

  const fill = estimateFill({
    volumeCm3: input.volumeCm3,
    gateDiameterMm,
    viscosityClass: input.viscosityClass,
    avgThicknessMm: input.wallThicknessMm.avg,
  });
  if (!fill.ok) return fill;

  const flowLengthMm = estimateFlowLengthMm(
    input.boundingBoxMm,
    input.gateLocationMm,
  );
  const flowRatio = requireFinite(
    flowLengthRatio(flowLengthMm, input.wallThicknessMm.avg),
    'flowRatio',
  );
  if (!flowRatio.ok) return flowRatio;

  const pressure = requireFinite(
    injectionPressureMpa({
      basePressureMpa: rangeMidpoint(input.cavityPressureMpa),
      viscosityClass: input.viscosityClass,
      flowRatio: flowRatio.value,
    }),
    'injectionPressureMpa',
  );
  if (!pressure.ok) return pressure;

  const risk = classifyFlowLengthRisk(
    flowRatio.value,
    input.maxFlowLengthRatio,
  );

  return succeed({
    gateDiameterMm,
    gateDiameterSource:
      input.gateDiameterMm === undefined ? 'recommended' : 'override',
    runnerDiameterMm,
    runnerDiameterSource:
      input.runnerDiameterMm === undefined ? 'recommended' : 'override',
    gateAreaMm2: fill.value.gateAreaMm2,
    flowRateCm3PerS: fill.value.flowRateCm3PerS,
    fillTimeS: fill.value.fillTimeS,
    flowLengthMm,
    flowRatio: flowRatio.value,
    flowLengthRisk: {
      status: risk.status,
      utilizationPercent: risk.utilizationPercent,
      maxFlowLengthRatio: input.maxFlowLengthRatio,
    },
    injectionPressureMpa: pressure.value,
  });
}
