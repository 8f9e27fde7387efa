import { isPositiveFinite } from '../../analysis/AnalysisError';
import { getCatalog } from '../../catalog/CatalogStore';
import type { MachineSpec } from '../../domain/MachineSpec';
import type { MaterialProperties } from '../../domain/MaterialProperties';
import {
  type MachineRecommendation,
  machineRecommender,
} from '../../machines/MachineRecommender';
import {
  notFoundError,
  validationError,
} from '../../reliability/DomainError';
import type {
  MachineFilter,
  MachineRecommendationRequest,
  MaterialFilter,
  PageRequest,
  PaginatedResult,
} from './catalog.types';

const DEFAULT_PAGE_SIZE = 50;
const MAX_PAGE_SIZE = 200;

const paginate = <T>(items: T[], request: PageRequest): PaginatedResult<T> => {
  const page = Math.max(1, Math.floor(request.page ?? 1));
  const pageSize = Math.min(
    MAX_PAGE_SIZE,
    Math.max(1, Math.floor(request.pageSize ?? DEFAULT_PAGE_SIZE)),
  );
  const offset = (page - 1) * pageSize;
  return {
    items: items.slice(offset, offset + pageSize),
    total: items.length,
    page,
    pageSize,
  };
};

const matchesSearch = (material: MaterialProperties, search: string) => {
  const needle = search.toLowerCase();
  return [material.name, material.manufacturer, material.grade].some(
    (value) =>
      typeof value === 'string' && value.toLowerCase().includes(needle),
  );
};

export function queryMaterials(
  filter: MaterialFilter,
  page: PageRequest,
): PaginatedResult<MaterialProperties> {
  const items = getCatalog()
    .snapshot()
    .listMaterials({ category: filter.category })
    .filter(
      (m) =>
        !filter.viscosityClass || m.viscosityClass === filter.viscosityClass,
    )
    .filter((m) => !filter.search || matchesSearch(m, filter.search))
    .filter((m) => !filter.customOnly || m.isCustom === true);
  return paginate(items, page);
}

export function listMaterialCategories(): string[] {
  return getCatalog().snapshot().listMaterialCategories();
}

export function getMaterial(id: string): MaterialProperties {
  const material = getCatalog().snapshot().getMaterial(id);
  if (!material) throw notFoundError('Material', id);
  return material;
}

export function createCustomMaterial(
  material: MaterialProperties,
): MaterialProperties {
  const result = getCatalog().addMaterial({ ...material, isCustom: true });
  if (!result.ok) throw validationError(result.field, result.error);
  return result.value;
}

export function queryMachines(
  filter: MachineFilter,
  page: PageRequest,
): PaginatedResult<MachineSpec> {
  const items = getCatalog()
    .snapshot()
    .listMachines()
    .filter(
      (m) => filter.minTonnage === undefined || m.tonnage >= filter.minTonnage,
    )
    .filter(
      (m) => filter.maxTonnage === undefined || m.tonnage <= filter.maxTonnage,
    )
    .filter(
      (m) =>
        filter.minShotVolumeCm3 === undefined ||
        m.maxShotVolumeCm3 >= filter.minShotVolumeCm3,
    );
  return paginate(items, page);
}

export function getMachine(id: string): MachineSpec {
  const machine = getCatalog().snapshot().getMachine(id);
  if (!machine) throw notFoundError('Machine', id);
  return machine;
}

export function createCustomMachine(machine: MachineSpec): MachineSpec {
  const result = getCatalog().addMachine({ ...machine, isCustom: true });
  if (!result.ok) throw validationError(result.field, result.error);
  return result.value;
}

export function recommendMachines(
  request: MachineRecommendationRequest,
): MachineRecommendation[] {
  const { tonnage, shotVolumeCm3 = 0 } = request;
  if (tonnage === undefined) {
    throw validationError('tonnage', 'tonnage is required.');
  }
  if (!isPositiveFinite(tonnage)) {
    throw validationError('tonnage', 'tonnage must be greater than 0 T.');
  }
  if (!Number.isFinite(shotVolumeCm3) || shotVolumeCm3 < 0) {
    throw validationError(
      'shotVolumeCm3',
      'shotVolumeCm3 must be 0 cm³ or more.',
    );
  }
  return machineRecommender.recommend({
    requiredTonnage: tonnage,
    requiredShotVolumeCm3: shotVolumeCm3,
    machines: getCatalog().snapshot().listMachines(),
  });
}
