import type { ViscosityClass } from '../../domain/MaterialProperties';

export type MaterialFilter = {
  category?: string;
  viscosityClass?: ViscosityClass;
  /** Case-insensitive match on name, manufacturer or grade. */
  search?: string;
  customOnly?: boolean;
};

export type MachineFilter = {
  minTonnage?: number;
  maxTonnage?: number;
  minShotVolumeCm3?: number;
};

export type PageRequest = {
  page?: number;
  pageSize?: number;
};

export type PaginatedResult<T> = {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
};

/** Stand-alone sizing query, outside any part analysis. */
export type MachineRecommendationRequest = {
  /** Required clamp tonnage, metric tons. */
  tonnage?: number;
  /** Defaults to 0, which ranks on tonnage alone. */
  shotVolumeCm3?: number;
};
