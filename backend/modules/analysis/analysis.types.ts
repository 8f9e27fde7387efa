import type { GateLocation, GateType } from '../../domain/ProcessConfig';

/** Process settings as requested; unset fields take the service defaults. */
export type ProcessConfigRequest = {
  cavityCount?: number;
  gateType?: GateType;
  safetyFactor?: number;
  gateDiameterMm?: number;
  runnerDiameterMm?: number;
  gateLocationMm?: GateLocation;
};

export type CreateAnalysisRequest = ProcessConfigRequest & {
  partId: string;
  materialId: string;
  /** Restricts the recommender to these catalog machines. */
  machineIds?: string[];
};

/** Fields left out keep the values of the analysis being recalculated. */
export type RecalculateAnalysisRequest = ProcessConfigRequest & {
  materialId?: string;
  machineIds?: string[];
};
