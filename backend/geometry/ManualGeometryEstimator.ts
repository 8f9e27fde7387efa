import {
  type EngineResult,
  fail,
  isPositiveFinite,
  succeed,
} from '../analysis/AnalysisError';
import {
  cm2ToMm2,
  MM3_PER_CM3,
  mm2ToCm2,
  mm3ToCm3,
} from '../calculations/Units';
import type {
  GeometrySummary,
  ThicknessRange,
} from '../domain/GeometrySummary';

export type ManualDimensions = {
  lengthMm: number;
  widthMm: number;
  heightMm: number;
  avgThicknessMm: number;
};

export const MANUAL_MIN_THICKNESS_FACTOR = 0.8;
export const MANUAL_MAX_THICKNESS_FACTOR = 1.5;

/**
 * Geometry summary for a part described only by its outer dimensions and
 * nominal wall, modelled as a hollow box molded flat on its length × width
 * face. Results carry the `manual-estimate` provenance.
 */
export function estimateManualGeometry(
  dimensions: ManualDimensions,
): EngineResult<GeometrySummary> {
  const fields = [
    'lengthMm',
    'widthMm',
    'heightMm',
    'avgThicknessMm',
  ] as const;
  for (const field of fields) {
    if (!isPositiveFinite(dimensions[field])) {
      return fail(
        'InvalidGeometry',
        field,
        `${field} must be greater than 0 mm.`,
      );
    }
  }

  const { lengthMm: l, widthMm: w, heightMm: h, avgThicknessMm: t } =
    dimensions;
  const inner = (span: number) => Math.max(0, span - 2 * t);

  const outerVolumeMm3 = l * w * h;
  const innerVolumeMm3 = inner(l) * inner(w) * inner(h);

  return succeed({
    volumeCm3: mm3ToCm3(outerVolumeMm3 - innerVolumeMm3),
    projectedAreaCm2: mm2ToCm2(l * w),
    surfaceAreaCm2: mm2ToCm2(2 * (l * w + w * h + h * l)),
    wallThicknessMm: {
      min: t * MANUAL_MIN_THICKNESS_FACTOR,
      avg: t,
      max: t * MANUAL_MAX_THICKNESS_FACTOR,
    },
    boundingBoxMm: { x: l, y: w, z: h },
    provenance: 'manual-estimate',
  });
}

export const FALLBACK_AVG_THICKNESS_MM = 2.0;
export const FALLBACK_MIN_THICKNESS_FLOOR_MM = 0.8;
export const FALLBACK_MAX_THICKNESS_CAP_MM = 15.0;

/**
 * Wall-thickness range from the volume/surface ratio, for CAD summaries that
 * arrive without a thickness analysis.
 *
 * t_avg ≈ 2V / A, then min = max(0.8, 0.6 t), max = min(15, 1.8 t).
 */
export const estimateThicknessFromVolume = (
  volumeCm3: number,
  surfaceAreaCm2: number | undefined,
): ThicknessRange => {
  const raw =
    surfaceAreaCm2 !== undefined && surfaceAreaCm2 > 0
      ? (2 * volumeCm3 * MM3_PER_CM3) / cm2ToMm2(surfaceAreaCm2)
      : FALLBACK_AVG_THICKNESS_MM;

  const min = Math.max(FALLBACK_MIN_THICKNESS_FLOOR_MM, raw * 0.6);
  const max = Math.min(FALLBACK_MAX_THICKNESS_CAP_MM, raw * 1.8);
  // Degenerate ratios can invert the band; keep min ≤ avg ≤ max.
  const upper = Math.max(min, max);
  return { min, avg: Math.min(Math.max(raw, min), upper), max: upper };
};
