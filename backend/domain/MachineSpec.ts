/**
 * MachineSpec (catalog record).
 *
 * Read-only to the analysis engine. Tonnage in metric tons, shot volume in
 * cm³, platen and tie-bar dimensions in mm.
 */
export type MachineSpec = {
  readonly id: string;
  readonly name: string;
  readonly manufacturer?: string;
  readonly tonnage: number;
  readonly maxShotVolumeCm3: number;
  readonly screwDiameterMm?: number;
  readonly platenMm: Readonly<{ width: number; height: number }>;
  readonly tieBarSpacingMm: Readonly<{ horizontal: number; vertical: number }>;
  readonly typicalUse?: string;
  readonly isCustom?: boolean;
};
