import { v4 as uuid } from 'uuid';

import type { AnalysisResult } from '../analysis/AnalysisResult';

export type StoredAnalysis = {
  readonly id: string;
  readonly createdAt: string;
  readonly result: AnalysisResult;
  /** Id of the analysis this one was recalculated from. */
  readonly recalculatedFrom?: string;
  /** Machine subset the run was restricted to; absent means the catalog. */
  readonly machineIds?: readonly string[];
};

export type SaveOptions = {
  recalculatedFrom?: string;
  machineIds?: readonly string[];
};

export type AnalysisStoreOptions = {
  maxEntries?: number;
  createId?: () => string;
  now?: () => Date;
};

export const DEFAULT_MAX_STORED_ANALYSES = 500;

/**
 * In-memory analysis history.
 *
 * - Assigns the id and timestamp the engine leaves out.
 * - Never mutates a stored entry; recalculation stores a new one.
 * - Evicts the oldest entries beyond `maxEntries`.
 */
export class AnalysisStore {
  private readonly entries = new Map<string, StoredAnalysis>();
  private maxEntries: number;
  private readonly createId: () => string;
  private readonly now: () => Date;

  constructor(options: AnalysisStoreOptions = {}) {
    this.maxEntries = Math.max(
      1,
      Math.trunc(options.maxEntries ?? DEFAULT_MAX_STORED_ANALYSES),
    );
    this.createId = options.createId ?? (() => uuid());
    this.now = options.now ?? (() => new Date());
  }

  configure(args: { maxEntries: number }): void {
    this.maxEntries = Math.max(1, Math.trunc(args.maxEntries));
    this.evict();
  }

  save(result: AnalysisResult, options: SaveOptions = {}): StoredAnalysis {
    const stored: StoredAnalysis = Object.freeze({
      id: this.createId(),
      createdAt: this.now().toISOString(),
      result,
      ...(options.recalculatedFrom
        ? { recalculatedFrom: options.recalculatedFrom }
        : {}),
      ...(options.machineIds
        ? { machineIds: Object.freeze([...options.machineIds]) }
        : {}),
    });
    this.entries.set(stored.id, stored);
    this.evict();
    return stored;
  }

  get(id: string): StoredAnalysis | undefined {
    return this.entries.get(id);
  }

  /** Oldest first. */
  listForPart(partId: string): StoredAnalysis[] {
    return Array.from(this.entries.values()).filter(
      (entry) => entry.result.partId === partId,
    );
  }

  /** Removes the part's history and returns how many entries went. */
  deleteForPart(partId: string): number {
    const ids = this.listForPart(partId).map((entry) => entry.id);
    for (const id of ids) this.entries.delete(id);
    return ids.length;
  }

  get size(): number {
    return this.entries.size;
  }

  reset(): void {
    this.entries.clear();
  }

  private evict(): void {
    // Map iteration order is insertion order.
    for (const id of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) break;
      this.entries.delete(id);
    }
  }
}

export const analysisStore = new AnalysisStore();
