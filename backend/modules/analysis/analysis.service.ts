import type { AnalysisError } from '../../analysis/AnalysisError';
import { runAnalysis } from '../../analysis/AnalysisOrchestrator';
import type { CatalogSnapshot } from '../../catalog/CatalogSnapshot';
import { getCatalog } from '../../catalog/CatalogStore';
import type { MachineSpec } from '../../domain/MachineSpec';
import {
  DEFAULT_SAFETY_FACTOR,
  type GateType,
  type ProcessConfig,
} from '../../domain/ProcessConfig';
import {
  analysisStore,
  type StoredAnalysis,
} from '../../persistence/AnalysisStore';
import { partStore } from '../../persistence/PartStore';
import {
  DomainError,
  notFoundError,
  validationError,
} from '../../reliability/DomainError';
import {
  type AnalysisReport,
  buildReport,
  type ReportAudience,
} from '../../reports/AnalysisReportView';
import { telemetry } from '../../telemetry/Telemetry';
import { markProjectAnalyzed } from '../projects/projects.service';
import type {
  CreateAnalysisRequest,
  ProcessConfigRequest,
  RecalculateAnalysisRequest,
} from './analysis.types';

export const DEFAULT_CAVITY_COUNT = 1;
export const DEFAULT_GATE_TYPE: GateType = 'edge';

const defaults = { safetyFactor: DEFAULT_SAFETY_FACTOR };

/** Applies the configured default safety factor to later requests. */
export function configureAnalysisDefaults(args: { safetyFactor: number }) {
  defaults.safetyFactor = args.safetyFactor;
}

const toDomainError = (error: AnalysisError): DomainError =>
  new DomainError({
    code:
      error.kind === 'ComputationOverflow'
        ? 'COMPUTATION_ERROR'
        : 'VALIDATION_ERROR',
    message: error.message,
    details: { field: error.field, kind: error.kind },
  });

const resolveConfig = (
  request: ProcessConfigRequest,
  base?: ProcessConfig,
): ProcessConfig => ({
  cavityCount:
    request.cavityCount ?? base?.cavityCount ?? DEFAULT_CAVITY_COUNT,
  gateType: request.gateType ?? base?.gateType ?? DEFAULT_GATE_TYPE,
  safetyFactor:
    request.safetyFactor ?? base?.safetyFactor ?? defaults.safetyFactor,
  gateDiameterMm: request.gateDiameterMm ?? base?.gateDiameterMm,
  runnerDiameterMm: request.runnerDiameterMm ?? base?.runnerDiameterMm,
  gateLocationMm: request.gateLocationMm ?? base?.gateLocationMm,
});

const selectMachines = (
  snapshot: CatalogSnapshot,
  machineIds: readonly string[] | undefined,
): readonly MachineSpec[] => {
  if (!machineIds) return snapshot.machines();
  return machineIds.map((id) => {
    const machine = snapshot.getMachine(id);
    if (!machine) {
      throw validationError('machineIds', `Unknown machine id: ${id}`);
    }
    return machine;
  });
};

const execute = (args: {
  operation: 'create' | 'recalculate';
  partId: string;
  materialId: string;
  config: ProcessConfig;
  machineIds?: readonly string[];
  recalculatedFrom?: string;
}): StoredAnalysis => {
  const part = partStore.get(args.partId);
  if (!part) throw notFoundError('Part', args.partId);

  const snapshot = getCatalog().snapshot();
  const material = snapshot.getMaterial(args.materialId);
  if (!material) throw notFoundError('Material', args.materialId);
  const machineIds = args.machineIds && [...new Set(args.machineIds)];
  const machines = selectMachines(snapshot, machineIds);

  const startedAt = telemetry.nowMs();
  const outcome = runAnalysis({
    partId: part.id,
    geometry: part.geometry,
    material,
    machines,
    config: args.config,
  });
  const durationMs = telemetry.nowMs() - startedAt;

  if (!outcome.ok) {
    telemetry.record({
      name: 'analysis.run',
      durationMs,
      tags: {
        operation: args.operation,
        status: 'rejected',
        errorKind: outcome.error.kind,
        field: outcome.error.field,
      },
      metrics: {},
    });
    throw toDomainError(outcome.error);
  }

  const result = outcome.value;
  telemetry.record({
    name: 'analysis.run',
    durationMs,
    tags: {
      operation: args.operation,
      status: 'completed',
      feasibility: result.feasibility.status,
      partId: part.id,
      materialId: material.id,
    },
    metrics: {
      score: result.feasibility.score,
      warningCount: result.feasibility.warningCount,
      recommendedTonnage: result.tonnage.recommended,
      cycleTimeS: result.cycle.total,
      machineCount: result.recommendedMachines.length,
    },
  });

  const stored = analysisStore.save(result, {
    recalculatedFrom: args.recalculatedFrom,
    machineIds,
  });
  if (part.projectId) markProjectAnalyzed(part.projectId);
  return stored;
};

export function createAnalysis(request: CreateAnalysisRequest): StoredAnalysis {
  return execute({
    operation: 'create',
    partId: request.partId,
    materialId: request.materialId,
    config: resolveConfig(request),
    machineIds: request.machineIds,
  });
}

export function getAnalysis(id: string): StoredAnalysis {
  const stored = analysisStore.get(id);
  if (!stored) throw notFoundError('Analysis', id);
  return stored;
}

/**
 * Runs the engine again for a stored analysis with optional changes. The
 * stored analysis is left untouched; the new result gets its own id.
 */
export function recalculateAnalysis(
  id: string,
  request: RecalculateAnalysisRequest,
): StoredAnalysis {
  const previous = getAnalysis(id);
  return execute({
    operation: 'recalculate',
    partId: previous.result.partId,
    materialId: request.materialId ?? previous.result.materialId,
    config: resolveConfig(request, previous.result.config),
    machineIds: request.machineIds ?? previous.machineIds,
    recalculatedFrom: previous.id,
  });
}

export function getAnalysisReport(
  id: string,
  audience: ReportAudience,
): AnalysisReport {
  return buildReport(getAnalysis(id), audience);
}

export function listAnalysesForPart(partId: string): StoredAnalysis[] {
  return analysisStore.listForPart(partId);
}
