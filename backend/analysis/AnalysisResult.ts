import type { CycleTimeBreakdown } from '../calculations/CycleTimeCalculator';
import type { FlowFillResult } from '../calculations/FlowFillCalculator';
import type { TonnageRange } from '../calculations/TonnageCalculator';
import type {
  GeometryProvenance,
  GeometrySummary,
} from '../domain/GeometrySummary';
import type { MachineSpec } from '../domain/MachineSpec';
import type {
  MaterialMorphology,
  MaterialProperties,
} from '../domain/MaterialProperties';
import type { ProcessConfig } from '../domain/ProcessConfig';
import type { AnalysisWarning } from '../feasibility/AnalysisWarning';
import type { FeasibilitySummary } from '../feasibility/FeasibilityEvaluator';
import type { MachineRecommendation } from '../machines/MachineRecommender';

/** Everything one engine run needs; catalogs arrive as read-only snapshots. */
export type AnalysisInput = {
  partId: string;
  geometry: GeometrySummary;
  material: MaterialProperties;
  machines: readonly MachineSpec[];
  config: ProcessConfig;
};

/**
 * AnalysisResult (immutable).
 *
 * Produced exactly once per engine run and deeply frozen. Contains no id and
 * no timestamp; the persistence layer assigns both when it stores the result.
 */
export type AnalysisResult = {
  readonly partId: string;
  readonly materialId: string;
  readonly materialName: string;
  readonly config: ProcessConfig;
  readonly geometryProvenance: GeometryProvenance;
  readonly geometryLabel: string;
  readonly ruleSetVersion: number;

  readonly tonnage: Readonly<TonnageRange & { cavityPressureMpa: number }>;
  readonly flow: Readonly<FlowFillResult>;
  readonly cycle: Readonly<CycleTimeBreakdown>;
  readonly morphology: MaterialMorphology;
  readonly partWeightG: number;
  readonly shotWeightG: number;
  readonly requiredShotVolumeCm3: number;

  readonly feasibility: Readonly<FeasibilitySummary>;
  /** Evaluation order. */
  readonly warnings: readonly AnalysisWarning[];
  /** Best first; at most MAX_MACHINE_RECOMMENDATIONS entries. */
  readonly recommendedMachines: readonly MachineRecommendation[];
};
