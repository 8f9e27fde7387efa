import type { BoundingBox, ThicknessRange } from '../../domain/GeometrySummary';
import type { ManualDimensions } from '../../geometry/ManualGeometryEstimator';

/** Summary posted by the external CAD geometry processor. */
export type CadPartRequest = {
  name: string;
  /** Project to file the part under; must exist. */
  projectId?: string;
  volumeCm3: number;
  projectedAreaCm2: number;
  surfaceAreaCm2?: number;
  /** Estimated from the volume/surface ratio when absent. */
  wallThicknessMm?: ThicknessRange;
  boundingBoxMm: BoundingBox;
};

export type ManualPartRequest = ManualDimensions & {
  name: string;
  projectId?: string;
};
