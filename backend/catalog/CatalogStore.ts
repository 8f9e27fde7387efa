import { validateMachine, validateMaterial } from '../analysis/InputValidation';
import { resolveMorphology } from '../calculations/CycleTimeCalculator';
import type { MachineSpec } from '../domain/MachineSpec';
import type { MaterialProperties } from '../domain/MaterialProperties';
import { DomainError } from '../reliability/DomainError';
import { requireArray } from '../validation/RecordParsing';

import { parseMachineRecord, parseMaterialRecord } from './CatalogRecords';
import { CatalogSnapshot } from './CatalogSnapshot';
import machinesSeed from './data/machines.json';
import materialsSeed from './data/materials.json';

export type CatalogResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; field: string };

/**
 * In-memory material and machine catalogs.
 *
 * - Seeded from the bundled datasheet tables on first use.
 * - Custom records are validated with the same rules the engine applies.
 * - Readers never see the live maps; they get a CatalogSnapshot.
 */
export class CatalogRepository {
  private readonly materials = new Map<string, MaterialProperties>();
  private readonly machines = new Map<string, MachineSpec>();
  private revision = 0;
  private cachedSnapshot: {
    revision: number;
    snapshot: CatalogSnapshot;
  } | null = null;

  addMaterial(
    material: MaterialProperties,
  ): CatalogResult<MaterialProperties> {
    if (this.materials.has(material.id)) {
      return {
        ok: false,
        error: `Duplicate material id: ${material.id}`,
        field: 'id',
      };
    }
    const valid = validateMaterial(material);
    if (!valid.ok) {
      return {
        ok: false,
        error: valid.error.message,
        field: valid.error.field,
      };
    }
    const morphology = resolveMorphology(material);
    if (!morphology.ok) {
      return {
        ok: false,
        error: morphology.error.message,
        field: morphology.error.field,
      };
    }

    this.materials.set(material.id, material);
    this.revision += 1;
    return { ok: true, value: material };
  }

  addMachine(machine: MachineSpec): CatalogResult<MachineSpec> {
    if (this.machines.has(machine.id)) {
      return {
        ok: false,
        error: `Duplicate machine id: ${machine.id}`,
        field: 'id',
      };
    }
    const valid = validateMachine(machine, this.machines.size);
    if (!valid.ok) {
      return {
        ok: false,
        error: valid.error.message,
        field: valid.error.field.replace(/^machines\[\d+\]\./, ''),
      };
    }

    this.machines.set(machine.id, machine);
    this.revision += 1;
    return { ok: true, value: machine };
  }

  snapshot(): CatalogSnapshot {
    const cached = this.cachedSnapshot;
    if (cached && cached.revision === this.revision) return cached.snapshot;

    const snapshot = new CatalogSnapshot({
      materials: Array.from(this.materials.values()),
      machines: Array.from(this.machines.values()),
    });
    this.cachedSnapshot = { revision: this.revision, snapshot };
    return snapshot;
  }
}

const seedFailure = (catalog: string, index: number, message: string) =>
  new DomainError({
    code: 'DATA_INTEGRITY_ERROR',
    message: `Invalid ${catalog} seed record #${index}: ${message}`,
    details: { catalog, index },
  });

/** Builds a repository from raw seed JSON; any invalid record aborts the load. */
export function createSeededCatalog(seed: {
  materials: unknown;
  machines: unknown;
}): CatalogRepository {
  const repository = new CatalogRepository();

  requireArray(seed.materials, 'materials').forEach((raw, index) => {
    const result = repository.addMaterial(
      parseMaterialRecord(raw, `materials[${index}].`),
    );
    if (!result.ok) throw seedFailure('material', index, result.error);
  });

  requireArray(seed.machines, 'machines').forEach((raw, index) => {
    const result = repository.addMachine(
      parseMachineRecord(raw, `machines[${index}].`),
    );
    if (!result.ok) throw seedFailure('machine', index, result.error);
  });

  return repository;
}

let catalog: CatalogRepository | null = null;

/** Singleton catalog for the running process. Resets on restart. */
export function getCatalog(): CatalogRepository {
  if (!catalog) {
    catalog = createSeededCatalog({
      materials: materialsSeed,
      machines: machinesSeed,
    });
  }
  return catalog;
}

/** Drops custom records and reloads the seed on next access. */
export function resetCatalog(): void {
  catalog = null;
}
