import { validateGeometry } from '../../analysis/InputValidation';
import type { GeometrySummary } from '../../domain/GeometrySummary';
import {
  estimateManualGeometry,
  estimateThicknessFromVolume,
} from '../../geometry/ManualGeometryEstimator';
import { partStore, type StoredPart } from '../../persistence/PartStore';
import {
  notFoundError,
  validationError,
} from '../../reliability/DomainError';
import { getProject } from '../projects/projects.service';
import type { CadPartRequest, ManualPartRequest } from './parts.types';

const requireValidGeometry = (geometry: GeometrySummary): GeometrySummary => {
  const result = validateGeometry(geometry);
  if (!result.ok) {
    throw validationError(
      `geometry.${result.error.field}`,
      result.error.message,
    );
  }
  return result.value;
};

const owningProjectId = (projectId: string | undefined) =>
  projectId === undefined ? undefined : getProject(projectId).id;

export function createCadPart(request: CadPartRequest): StoredPart {
  const projectId = owningProjectId(request.projectId);
  const geometry = requireValidGeometry({
    volumeCm3: request.volumeCm3,
    projectedAreaCm2: request.projectedAreaCm2,
    surfaceAreaCm2: request.surfaceAreaCm2,
    wallThicknessMm:
      request.wallThicknessMm ??
      estimateThicknessFromVolume(request.volumeCm3, request.surfaceAreaCm2),
    boundingBoxMm: request.boundingBoxMm,
    provenance: 'from-cad',
  });
  return partStore.create({ name: request.name, projectId, geometry });
}

export function createManualPart(request: ManualPartRequest): StoredPart {
  const projectId = owningProjectId(request.projectId);
  const dimensions = {
    lengthMm: request.lengthMm,
    widthMm: request.widthMm,
    heightMm: request.heightMm,
    avgThicknessMm: request.avgThicknessMm,
  };
  const estimate = estimateManualGeometry(dimensions);
  if (!estimate.ok) {
    throw validationError(estimate.error.field, estimate.error.message);
  }
  return partStore.create({
    name: request.name,
    projectId,
    geometry: requireValidGeometry(estimate.value),
    manualDimensions: dimensions,
  });
}

export function getPart(id: string): StoredPart {
  const part = partStore.get(id);
  if (!part) throw notFoundError('Part', id);
  return part;
}
