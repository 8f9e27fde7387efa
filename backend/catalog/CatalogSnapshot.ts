import type { MachineSpec } from '../domain/MachineSpec';
import type { MaterialProperties } from '../domain/MaterialProperties';

const compareStrings = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

const freezeMaterial = (material: MaterialProperties): MaterialProperties =>
  Object.freeze({
    ...material,
    meltTempC: Object.freeze({ ...material.meltTempC }),
    moldTempC: Object.freeze({ ...material.moldTempC }),
    shrinkagePercent: Object.freeze({ ...material.shrinkagePercent }),
    cavityPressureMpa: Object.freeze({ ...material.cavityPressureMpa }),
  });

const freezeMachine = (machine: MachineSpec): MachineSpec =>
  Object.freeze({
    ...machine,
    platenMm: Object.freeze({ ...machine.platenMm }),
    tieBarSpacingMm: Object.freeze({ ...machine.tieBarSpacingMm }),
  });

/**
 * Read-only view over the material and machine catalogs.
 *
 * One snapshot is taken per analysis run, so later catalog edits never
 * change the inputs of a run in progress.
 */
export class CatalogSnapshot {
  private readonly materialsById: ReadonlyMap<string, MaterialProperties>;
  private readonly machinesById: ReadonlyMap<string, MachineSpec>;
  private readonly machineList: readonly MachineSpec[];

  constructor(args: {
    materials: readonly MaterialProperties[];
    machines: readonly MachineSpec[];
  }) {
    this.materialsById = new Map(
      args.materials.map((m) => [m.id, freezeMaterial(m)]),
    );
    this.machinesById = new Map(
      args.machines.map((m) => [m.id, freezeMachine(m)]),
    );
    this.machineList = Object.freeze(Array.from(this.machinesById.values()));
  }

  getMaterial(id: string): MaterialProperties | undefined {
    return this.materialsById.get(id);
  }

  getMachine(id: string): MachineSpec | undefined {
    return this.machinesById.get(id);
  }

  /** Ordered by category, then name. */
  listMaterials(filter?: { category?: string }): MaterialProperties[] {
    const category = filter?.category?.trim().toUpperCase();
    return Array.from(this.materialsById.values())
      .filter((m) => !category || m.category.toUpperCase() === category)
      .sort(
        (a, b) =>
          compareStrings(a.category, b.category) ||
          compareStrings(a.name, b.name),
      );
  }

  listMaterialCategories(): string[] {
    const categories = new Set(
      Array.from(this.materialsById.values(), (m) => m.category),
    );
    return Array.from(categories).sort(compareStrings);
  }

  /** Ordered by tonnage, then id. */
  listMachines(): MachineSpec[] {
    return [...this.machineList].sort(
      (a, b) => a.tonnage - b.tonnage || compareStrings(a.id, b.id),
    );
  }

  /** Catalog order, as handed to the recommender. */
  machines(): readonly MachineSpec[] {
    return this.machineList;
  }

  get materialCount(): number {
    return this.materialsById.size;
  }

  get machineCount(): number {
    return this.machinesById.size;
  }
}
