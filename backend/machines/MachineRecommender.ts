import type { MachineSpec } from '../domain/MachineSpec';

export type MachineSuitability = 'ideal' | 'acceptable' | 'borderline';

export type MachineRecommendation = {
  machine: MachineSpec;
  suitability: MachineSuitability;
  /** machine tonnage / required tonnage */
  tonnageRatio: number;
  /** required shot volume / machine max shot volume */
  shotVolumeUtilization: number;
  /** Advisory only; never changes the suitability band. */
  notes: string[];
};

/** Upper bound on the length of every recommendation list. */
export const MAX_MACHINE_RECOMMENDATIONS = 5;

export const IDEAL_MAX_TONNAGE_RATIO = 1.3;
export const ACCEPTABLE_MAX_TONNAGE_RATIO = 1.8;
export const ACCEPTABLE_MIN_TONNAGE_RATIO = 0.9;

/** Shot volume headroom below which a note is attached. */
export const SHOT_VOLUME_HEADROOM = 1.3;
/** Platen should be this much larger than the part footprint. */
export const PLATEN_TO_PART_RATIO = 1.5;

export type MachineRecommenderInput = {
  /** Recommended (safety-factored) clamp tonnage, metric tons. */
  requiredTonnage: number;
  requiredShotVolumeCm3: number;
  machines: readonly MachineSpec[];
  /** Largest bounding-box face of the part, mm. */
  partFootprintMm?: { width: number; height: number };
};

const SUITABILITY_RANK: Record<MachineSuitability, number> = {
  ideal: 0,
  acceptable: 1,
  borderline: 2,
};

const compareStrings = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

const fitsWithin = (
  footprint: { width: number; height: number },
  box: { width: number; height: number },
): boolean =>
  (footprint.width <= box.width && footprint.height <= box.height) ||
  (footprint.width <= box.height && footprint.height <= box.width);

/**
 * Suitability band for one machine, or `excluded` when its shot volume is
 * below the requirement (regardless of tonnage).
 *
 * Bands on the clamp tonnage t against the requirement r:
 * - ideal:      r ≤ t ≤ 1.3r
 * - acceptable: 1.3r < t ≤ 1.8r, or 0.9r ≤ t < r
 * - borderline: anything else
 */
export const classifyMachine = (
  machine: Pick<MachineSpec, 'tonnage' | 'maxShotVolumeCm3'>,
  requiredTonnage: number,
  requiredShotVolumeCm3: number,
): MachineSuitability | 'excluded' => {
  if (machine.maxShotVolumeCm3 < requiredShotVolumeCm3) return 'excluded';

  const t = machine.tonnage;
  const r = requiredTonnage;
  if (t >= r && t <= r * IDEAL_MAX_TONNAGE_RATIO) return 'ideal';
  if (t > r * IDEAL_MAX_TONNAGE_RATIO && t <= r * ACCEPTABLE_MAX_TONNAGE_RATIO)
    return 'acceptable';
  if (t >= r * ACCEPTABLE_MIN_TONNAGE_RATIO && t < r) return 'acceptable';
  return 'borderline';
};

const notesFor = (
  machine: MachineSpec,
  input: MachineRecommenderInput,
): string[] => {
  const notes: string[] = [];
  const required = input.requiredTonnage;

  if (machine.tonnage < required) {
    notes.push(
      `Tonnage ${machine.tonnage}T is below the recommended ${required.toFixed(0)}T.`,
    );
  } else if (machine.tonnage > required * ACCEPTABLE_MAX_TONNAGE_RATIO) {
    notes.push('Machine may be oversized for this part.');
  }

  if (
    machine.maxShotVolumeCm3 <
    input.requiredShotVolumeCm3 * SHOT_VOLUME_HEADROOM
  ) {
    notes.push(
      `Shot volume near limit (${input.requiredShotVolumeCm3.toFixed(1)} of ${machine.maxShotVolumeCm3} cm³).`,
    );
  }

  const footprint = input.partFootprintMm;
  if (footprint) {
    const moldFootprint = {
      width: footprint.width * PLATEN_TO_PART_RATIO,
      height: footprint.height * PLATEN_TO_PART_RATIO,
    };
    if (!fitsWithin(moldFootprint, machine.platenMm)) {
      notes.push('Platen size may be tight for the mold.');
    }
    const tieBars = {
      width: machine.tieBarSpacingMm.horizontal,
      height: machine.tieBarSpacingMm.vertical,
    };
    if (!fitsWithin(footprint, tieBars)) {
      notes.push('Part footprint exceeds tie-bar spacing.');
    }
  }

  if (notes.length === 0) {
    notes.push('Good match for tonnage, shot volume, and platen size.');
  }
  return notes;
};

/**
 * Machine ranking.
 *
 * Responsibilities:
 * - Drop machines whose shot volume is below the requirement, and repeats
 *   of an id already seen.
 * - Sort by: (1) band ideal → acceptable → borderline, (2) tonnage asc
 *   (smallest adequate machine first), (3) id, (4) catalog position.
 * - Return at most MAX_MACHINE_RECOMMENDATIONS entries.
 *
 * Non-responsibilities:
 * - No catalog lookups; the caller passes a snapshot in any order.
 */
export class MachineRecommender {
  recommend(input: MachineRecommenderInput): MachineRecommendation[] {
    const seen = new Set<string>();
    const decorated = input.machines
      .filter(({ id }) => {
        if (seen.has(id)) return false;
        seen.add(id);
        return true;
      })
      .map((machine, originalIndex) => ({
        machine,
        originalIndex,
        suitability: classifyMachine(
          machine,
          input.requiredTonnage,
          input.requiredShotVolumeCm3,
        ),
      }))
      .flatMap((entry) =>
        entry.suitability === 'excluded'
          ? []
          : [{ ...entry, suitability: entry.suitability }],
      );

    decorated.sort((a, b) => {
      const rankDelta =
        SUITABILITY_RANK[a.suitability] - SUITABILITY_RANK[b.suitability];
      if (rankDelta !== 0) return rankDelta;
      if (a.machine.tonnage !== b.machine.tonnage)
        return a.machine.tonnage - b.machine.tonnage;
      const byId = compareStrings(a.machine.id, b.machine.id);
      if (byId !== 0) return byId;
      return a.originalIndex - b.originalIndex;
    });

    return decorated
      .slice(0, MAX_MACHINE_RECOMMENDATIONS)
      .map(({ machine, suitability }) => ({
        machine,
        suitability,
        tonnageRatio: machine.tonnage / input.requiredTonnage,
        shotVolumeUtilization:
          input.requiredShotVolumeCm3 / machine.maxShotVolumeCm3,
        notes: notesFor(machine, input),
      }));
  }
}

export const machineRecommender = new MachineRecommender();
