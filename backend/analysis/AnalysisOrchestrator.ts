import {
  calculateCycleTime,
  resolveMorphology,
} from '../calculations/CycleTimeCalculator';
import { calculateFlowFill } from '../calculations/FlowFillCalculator';
import { largestFaceMm, rangeMidpoint } from '../calculations/Formulas';
import { calculatePartWeight } from '../calculations/PartWeight';
import { calculateTonnage } from '../calculations/TonnageCalculator';
import { provenanceLabel } from '../domain/GeometrySummary';
import {
  FeasibilityEvaluator,
  feasibilityEvaluator,
  noSuitableMachineWarning,
  summarizeFeasibility,
} from '../feasibility/FeasibilityEvaluator';
import { STANDARD_WARNING_RULE_SET_VERSION } from '../feasibility/StandardWarningRuleSet';
import {
  MachineRecommender,
  machineRecommender,
} from '../machines/MachineRecommender';

import { type EngineResult, succeed } from './AnalysisError';
import type { AnalysisInput, AnalysisResult } from './AnalysisResult';
import {
  validateConfig,
  validateGeometry,
  validateMachines,
  validateMaterial,
} from './InputValidation';

const deepFreeze = <T>(value: T): T => {
  if (value !== null && typeof value === 'object') {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
};

/**
 * AnalysisOrchestrator
 *
 * Responsibilities:
 * - Validate inputs in a fixed order: geometry, material, machines, config.
 * - Run tonnage, flow/fill, cycle and weight; then feasibility; then the
 *   machine recommender.
 * - Assemble one deeply frozen AnalysisResult, or return the first error.
 *
 * Non-responsibilities:
 * - No ids, timestamps, logging or storage.
 * - No catalog lookups; catalogs arrive as snapshots in the input.
 */
export class AnalysisOrchestrator {
  private readonly evaluator: FeasibilityEvaluator;
  private readonly recommender: MachineRecommender;

  constructor(
    evaluator: FeasibilityEvaluator = feasibilityEvaluator,
    recommender: MachineRecommender = machineRecommender,
  ) {
    this.evaluator = evaluator;
    this.recommender = recommender;
  }

  run(input: AnalysisInput): EngineResult<AnalysisResult> {
    const geometryCheck = validateGeometry(input.geometry);
    if (!geometryCheck.ok) return geometryCheck;
    const materialCheck = validateMaterial(input.material);
    if (!materialCheck.ok) return materialCheck;
    const machinesCheck = validateMachines(input.machines);
    if (!machinesCheck.ok) return machinesCheck;
    const configCheck = validateConfig(input.config, input.geometry);
    if (!configCheck.ok) return configCheck;

    const { geometry, material, machines, config } = input;

    const morphology = resolveMorphology(material);
    if (!morphology.ok) return morphology;

    const cavityPressureMpa = rangeMidpoint(material.cavityPressureMpa);
    const tonnage = calculateTonnage({
      projectedAreaCm2: geometry.projectedAreaCm2,
      cavityCount: config.cavityCount,
      cavityPressureMpa,
      safetyFactor: config.safetyFactor,
    });
    if (!tonnage.ok) return tonnage;

    const flow = calculateFlowFill({
      volumeCm3: geometry.volumeCm3,
      wallThicknessMm: geometry.wallThicknessMm,
      boundingBoxMm: geometry.boundingBoxMm,
      viscosityClass: material.viscosityClass,
      maxFlowLengthRatio: material.maxFlowLengthRatio,
      cavityPressureMpa: material.cavityPressureMpa,
      gateType: config.gateType,
      gateDiameterMm: config.gateDiameterMm,
      runnerDiameterMm: config.runnerDiameterMm,
      gateLocationMm: config.gateLocationMm,
    });
    if (!flow.ok) return flow;

    const cycle = calculateCycleTime({
      fillTimeS: flow.value.fillTimeS,
      maxThicknessMm: geometry.wallThicknessMm.max,
      morphology: morphology.value,
    });
    if (!cycle.ok) return cycle;

    const weight = calculatePartWeight({
      volumeCm3: geometry.volumeCm3,
      densityGPerCm3: material.densityGPerCm3,
      cavityCount: config.cavityCount,
    });
    if (!weight.ok) return weight;

    const evaluation = this.evaluator.evaluate({
      minThicknessMm: geometry.wallThicknessMm.min,
      maxThicknessMm: geometry.wallThicknessMm.max,
      projectedAreaCm2: geometry.projectedAreaCm2,
      flowRatio: flow.value.flowRatio,
      maxFlowLengthRatio: material.maxFlowLengthRatio,
      recommendedTonnage: tonnage.value.recommended,
      materialName: material.name,
    });

    const recommendedMachines = this.recommender.recommend({
      requiredTonnage: tonnage.value.recommended,
      requiredShotVolumeCm3: weight.value.requiredShotVolumeCm3,
      machines,
      partFootprintMm: largestFaceMm(geometry.boundingBoxMm),
    });

    let { warnings, feasibility } = evaluation;
    if (recommendedMachines.length === 0) {
      warnings = [
        ...warnings,
        noSuitableMachineWarning({
          requiredTonnage: tonnage.value.recommended,
          requiredShotVolumeCm3: weight.value.requiredShotVolumeCm3,
          catalogSize: machines.length,
        }),
      ];
      feasibility = summarizeFeasibility(warnings);
    }

    const result: AnalysisResult = {
      partId: input.partId,
      materialId: material.id,
      materialName: material.name,
      config,
      geometryProvenance: geometry.provenance,
      geometryLabel: provenanceLabel(geometry.provenance),
      ruleSetVersion: STANDARD_WARNING_RULE_SET_VERSION,
      tonnage: { ...tonnage.value, cavityPressureMpa },
      flow: flow.value,
      cycle: cycle.value,
      morphology: morphology.value,
      partWeightG: weight.value.partWeightG,
      shotWeightG: weight.value.shotWeightG,
      requiredShotVolumeCm3: weight.value.requiredShotVolumeCm3,
      feasibility,
      warnings,
      recommendedMachines,
    };

    // Copy first so caller-owned catalog records and config are not frozen.
    return succeed(deepFreeze(structuredClone(result)));
  }
}

export const analysisOrchestrator = new AnalysisOrchestrator();

export const runAnalysis = (
  input: AnalysisInput,
): EngineResult<AnalysisResult> => analysisOrchestrator.run(input);
