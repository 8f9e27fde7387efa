export type GeometryProvenance = 'from-cad' | 'manual-estimate';

export type ThicknessRange = {
  min: number;
  avg: number;
  max: number;
};

export type BoundingBox = {
  x: number;
  y: number;
  z: number;
};

/**
 * GeometrySummary (domain model).
 *
 * Reduced part geometry produced by the geometry processor (CAD upload) or by
 * the manual estimator. The analysis engine only ever consumes this summary.
 *
 * Units:
 * - volume: cm³
 * - projected / surface area: cm²
 * - thickness and bounding box: mm
 */
export type GeometrySummary = {
  readonly volumeCm3: number;
  /** Area projected onto the parting plane; drives clamp tonnage. */
  readonly projectedAreaCm2: number;
  readonly surfaceAreaCm2?: number;
  readonly wallThicknessMm: Readonly<ThicknessRange>;
  readonly boundingBoxMm: Readonly<BoundingBox>;
  readonly provenance: GeometryProvenance;
};

export const MANUAL_ESTIMATE_LABEL = 'Estimated – No CAD';

export const provenanceLabel = (provenance: GeometryProvenance): string =>
  provenance === 'manual-estimate' ? MANUAL_ESTIMATE_LABEL : 'From CAD';
