export type GateType = 'edge' | 'pin' | 'fan' | 'submarine';

export const GATE_TYPES: readonly GateType[] = [
  'edge',
  'pin',
  'fan',
  'submarine',
];

export const isGateType = (value: unknown): value is GateType =>
  GATE_TYPES.some((gateType) => gateType === value);

export type GateLocation = {
  x: number;
  y: number;
  z: number;
};

/**
 * ProcessConfig: the molding setup chosen for one analysis run.
 *
 * Gate location is expressed in part coordinates, with the bounding box
 * spanning [0, x] × [0, y] × [0, z].
 */
export type ProcessConfig = {
  readonly cavityCount: number;
  readonly gateType: GateType;
  /** Dimensionless, typically 1.0–1.5. */
  readonly safetyFactor: number;
  readonly gateDiameterMm?: number;
  readonly runnerDiameterMm?: number;
  readonly gateLocationMm?: Readonly<GateLocation>;
};

export const DEFAULT_SAFETY_FACTOR = 1.15;
