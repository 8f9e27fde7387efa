import type { AnalysisResult } from '../analysis/AnalysisResult';
import { roundTo } from '../calculations/Units';
import type { ProcessConfig } from '../domain/ProcessConfig';
import type { WarningSeverity } from '../feasibility/AnalysisWarning';
import type { FeasibilityStatus } from '../feasibility/FeasibilityEvaluator';
import type { MachineSuitability } from '../machines/MachineRecommender';

export type ReportAudience = 'designer' | 'customer';

export const REPORT_AUDIENCES: readonly ReportAudience[] = [
  'designer',
  'customer',
];

export const CUSTOMER_MACHINE_LIMIT = 3;

export const ACCURACY_NOTE =
  'Early feasibility assessment with an expected accuracy of ±15–20%, not a detailed CAE simulation. Verify with a full mold-flow analysis before tool design.';

const NO_CONCERNS_MESSAGE = 'No significant concerns identified.';

/** A stored analysis: the engine result plus the identity given at storage. */
export type ReportSubject = {
  id: string;
  createdAt: string;
  result: AnalysisResult;
};

export type CustomerReport = {
  audience: 'customer';
  analysisId: string;
  createdAt: string;
  materialName: string;
  geometryLabel: string;
  status: FeasibilityStatus;
  statusMessage: string;
  recommendedTonnage: number;
  cycleTimeS: number;
  partWeightG: number;
  considerations: string[];
  machines: Array<{
    name: string;
    tonnage: number;
    suitability: MachineSuitability;
  }>;
  accuracyNote: string;
};

export type DesignerReport = {
  audience: 'designer';
  analysisId: string;
  createdAt: string;
  partId: string;
  materialId: string;
  materialName: string;
  morphology: AnalysisResult['morphology'];
  geometryLabel: string;
  config: ProcessConfig;
  ruleSetVersion: number;
  feasibility: {
    status: FeasibilityStatus;
    score: number;
    statusMessage: string;
    warningCount: number;
    highSeverityCount: number;
  };
  tonnage: {
    minimum: number;
    recommended: number;
    conservative: number;
    clampForceKn: number;
    cavityPressureMpa: number;
  };
  flow: {
    gateDiameterMm: number;
    gateDiameterSource: 'recommended' | 'override';
    runnerDiameterMm: number;
    runnerDiameterSource: 'recommended' | 'override';
    flowRateCm3PerS: number;
    fillTimeS: number;
    flowLengthMm: number;
    flowRatio: number;
    flowLengthStatus: AnalysisResult['flow']['flowLengthRisk']['status'];
    flowLengthUtilizationPercent: number;
    maxFlowLengthRatio: number;
    injectionPressureMpa: number;
  };
  cycle: {
    fill: number;
    pack: number;
    cool: number;
    overhead: number;
    total: number;
  };
  partWeightG: number;
  shotWeightG: number;
  requiredShotVolumeCm3: number;
  warnings: Array<{
    kind: string;
    severity: WarningSeverity;
    message: string;
    remediation?: string;
  }>;
  machines: Array<{
    id: string;
    name: string;
    tonnage: number;
    maxShotVolumeCm3: number;
    suitability: MachineSuitability;
    tonnageRatio: number;
    shotVolumeUtilizationPercent: number;
    notes: string[];
  }>;
  accuracyNote: string;
};

export type AnalysisReport = CustomerReport | DesignerReport;

// Display precision. Engine values are never rounded.
const tons = (value: number) => roundTo(value, 1);
const seconds = (value: number) => roundTo(value, 1);
const grams = (value: number) => roundTo(value, 2);
const mm = (value: number) => roundTo(value, 2);
const oneDp = (value: number) => roundTo(value, 1);

export const toCustomerReport = (subject: ReportSubject): CustomerReport => {
  const { result } = subject;
  const considerations = result.warnings.map((w) => w.customerMessage);
  return {
    audience: 'customer',
    analysisId: subject.id,
    createdAt: subject.createdAt,
    materialName: result.materialName,
    geometryLabel: result.geometryLabel,
    status: result.feasibility.status,
    statusMessage: result.feasibility.statusMessage,
    recommendedTonnage: tons(result.tonnage.recommended),
    cycleTimeS: seconds(result.cycle.total),
    partWeightG: grams(result.partWeightG),
    considerations:
      considerations.length > 0 ? considerations : [NO_CONCERNS_MESSAGE],
    machines: result.recommendedMachines
      .slice(0, CUSTOMER_MACHINE_LIMIT)
      .map((r) => ({
        name: r.machine.name,
        tonnage: r.machine.tonnage,
        suitability: r.suitability,
      })),
    accuracyNote: ACCURACY_NOTE,
  };
};

export const toDesignerReport = (subject: ReportSubject): DesignerReport => {
  const { result } = subject;
  const { flow, cycle, tonnage, feasibility } = result;
  return {
    audience: 'designer',
    analysisId: subject.id,
    createdAt: subject.createdAt,
    partId: result.partId,
    materialId: result.materialId,
    materialName: result.materialName,
    morphology: result.morphology,
    geometryLabel: result.geometryLabel,
    config: result.config,
    ruleSetVersion: result.ruleSetVersion,
    feasibility: {
      status: feasibility.status,
      score: feasibility.score,
      statusMessage: feasibility.statusMessage,
      warningCount: feasibility.warningCount,
      highSeverityCount: feasibility.highSeverityCount,
    },
    tonnage: {
      minimum: tons(tonnage.minimum),
      recommended: tons(tonnage.recommended),
      conservative: tons(tonnage.conservative),
      clampForceKn: oneDp(tonnage.clampForceKn),
      cavityPressureMpa: oneDp(tonnage.cavityPressureMpa),
    },
    flow: {
      gateDiameterMm: mm(flow.gateDiameterMm),
      gateDiameterSource: flow.gateDiameterSource,
      runnerDiameterMm: mm(flow.runnerDiameterMm),
      runnerDiameterSource: flow.runnerDiameterSource,
      flowRateCm3PerS: oneDp(flow.flowRateCm3PerS),
      fillTimeS: seconds(flow.fillTimeS),
      flowLengthMm: oneDp(flow.flowLengthMm),
      flowRatio: oneDp(flow.flowRatio),
      flowLengthStatus: flow.flowLengthRisk.status,
      flowLengthUtilizationPercent: oneDp(
        flow.flowLengthRisk.utilizationPercent,
      ),
      maxFlowLengthRatio: flow.flowLengthRisk.maxFlowLengthRatio,
      injectionPressureMpa: oneDp(flow.injectionPressureMpa),
    },
    cycle: {
      fill: seconds(cycle.fill),
      pack: seconds(cycle.pack),
      cool: seconds(cycle.cool),
      overhead: seconds(cycle.overhead),
      total: seconds(cycle.total),
    },
    partWeightG: grams(result.partWeightG),
    shotWeightG: grams(result.shotWeightG),
    requiredShotVolumeCm3: oneDp(result.requiredShotVolumeCm3),
    warnings: result.warnings.map((w) => ({
      kind: w.kind,
      severity: w.severity,
      message: w.designerMessage,
      ...(w.remediation ? { remediation: w.remediation } : {}),
    })),
    machines: result.recommendedMachines.map((r) => ({
      id: r.machine.id,
      name: r.machine.name,
      tonnage: r.machine.tonnage,
      maxShotVolumeCm3: r.machine.maxShotVolumeCm3,
      suitability: r.suitability,
      tonnageRatio: roundTo(r.tonnageRatio, 2),
      shotVolumeUtilizationPercent: oneDp(r.shotVolumeUtilization * 100),
      notes: [...r.notes],
    })),
    accuracyNote: ACCURACY_NOTE,
  };
};

/** Both audiences project the same stored result; nothing is recomputed. */
export const buildReport = (
  subject: ReportSubject,
  audience: ReportAudience,
): AnalysisReport =>
  audience === 'customer'
    ? toCustomerReport(subject)
    : toDesignerReport(subject);
