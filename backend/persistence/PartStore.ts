import { v4 as uuid } from 'uuid';

import type { GeometrySummary } from '../domain/GeometrySummary';
import type { ManualDimensions } from '../geometry/ManualGeometryEstimator';

export type StoredPart = {
  readonly id: string;
  readonly name: string;
  /** Owning project, when the part was filed under one. */
  readonly projectId?: string;
  readonly createdAt: string;
  readonly geometry: GeometrySummary;
  /** Present for parts created from manual dimensions. */
  readonly manualDimensions?: ManualDimensions;
};

export type PartStoreOptions = {
  createId?: () => string;
  now?: () => Date;
};

/**
 * In-memory part registry.
 *
 * - Resets on server restart.
 * - Parts are immutable once stored; a changed geometry is a new part.
 */
export class PartStore {
  private readonly parts = new Map<string, StoredPart>();
  private readonly createId: () => string;
  private readonly now: () => Date;

  constructor(options: PartStoreOptions = {}) {
    this.createId = options.createId ?? (() => uuid());
    this.now = options.now ?? (() => new Date());
  }

  create(args: {
    name: string;
    projectId?: string;
    geometry: GeometrySummary;
    manualDimensions?: ManualDimensions;
  }): StoredPart {
    const part: StoredPart = Object.freeze({
      id: this.createId(),
      name: args.name,
      ...(args.projectId ? { projectId: args.projectId } : {}),
      createdAt: this.now().toISOString(),
      geometry: args.geometry,
      ...(args.manualDimensions
        ? { manualDimensions: args.manualDimensions }
        : {}),
    });
    this.parts.set(part.id, part);
    return part;
  }

  get(id: string): StoredPart | undefined {
    return this.parts.get(id);
  }

  list(): StoredPart[] {
    return Array.from(this.parts.values());
  }

  listForProject(projectId: string): StoredPart[] {
    return this.list().filter((part) => part.projectId === projectId);
  }

  /** Removes every part of the project and returns their ids. */
  deleteForProject(projectId: string): string[] {
    const ids = this.listForProject(projectId).map((part) => part.id);
    for (const id of ids) this.parts.delete(id);
    return ids;
  }

  reset(): void {
    this.parts.clear();
  }
}

export const partStore = new PartStore();
