export type TelemetryTagValue = string | number | boolean | null | undefined;

export type TelemetryEvent = {
  ts: string;
  name: string;
  durationMs?: number;
  tags?: Record<string, TelemetryTagValue>;
  metrics?: Record<string, number | null | undefined>;
  message?: string;
};

export type TelemetryEventInput = Omit<TelemetryEvent, 'ts'> & { ts?: string };

export type TelemetrySnapshot = {
  generatedAt: string;
  durationsByName: Array<{
    name: string;
    count: number;
    avgMs: number;
    maxMs: number;
  }>;
  metricsByName: Array<{
    name: string;
    metric: string;
    count: number;
    avg: number;
    max: number;
  }>;
  /** Event counts per `status` tag, e.g. analysis.run completed / rejected. */
  statusCounts: Array<{ name: string; status: string; count: number }>;
  recentEvents: readonly TelemetryEvent[];
};

class RunningStat {
  count = 0;
  sum = 0;
  max = 0;

  add(value: number): void {
    this.count += 1;
    this.sum += value;
    this.max = Math.max(this.max, value);
  }

  get mean(): number {
    return this.count > 0 ? this.sum / this.count : 0;
  }
}

/** Two-level map: event name, then a sub key (metric name or status). */
type Nested<V> = Map<string, Map<string, V>>;

const byKey = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

const sortedEntries = <V>(map: Map<string, V>): Array<[string, V]> =>
  Array.from(map.entries()).sort(([a], [b]) => byKey(a, b));

const flatten = <V, R>(
  nested: Nested<V>,
  toRow: (name: string, key: string, value: V) => R,
): R[] =>
  sortedEntries(nested).flatMap(([name, inner]) =>
    sortedEntries(inner).map(([key, value]) => toRow(name, key, value)),
  );

const inner = <V>(nested: Nested<V>, name: string): Map<string, V> => {
  let map = nested.get(name);
  if (!map) {
    map = new Map();
    nested.set(name, map);
  }
  return map;
};

const finite = (value: number | null | undefined): value is number =>
  typeof value === 'number' && Number.isFinite(value);

/**
 * Bounded in-process event buffer with running aggregates.
 *
 * Aggregates survive buffer eviction; `reset` clears both.
 */
export class TelemetryStore {
  private readonly capacity: number;
  private readonly buffer: TelemetryEvent[] = [];

  private readonly durations = new Map<string, RunningStat>();
  private readonly metrics: Nested<RunningStat> = new Map();
  private readonly statuses: Nested<number> = new Map();

  constructor(args?: { maxEvents?: number }) {
    this.capacity = Math.max(100, Math.trunc(args?.maxEvents ?? 2000));
  }

  reset(): void {
    this.buffer.length = 0;
    this.durations.clear();
    this.metrics.clear();
    this.statuses.clear();
  }

  record(input: TelemetryEventInput): TelemetryEvent {
    const event: TelemetryEvent = {
      ...input,
      ts: input.ts ?? new Date().toISOString(),
    };

    this.buffer.push(event);
    const overflow = this.buffer.length - this.capacity;
    if (overflow > 0) this.buffer.splice(0, overflow);

    if (finite(event.durationMs)) {
      const stat = this.durations.get(event.name) ?? new RunningStat();
      stat.add(event.durationMs);
      this.durations.set(event.name, stat);
    }

    for (const [metric, value] of Object.entries(event.metrics ?? {})) {
      if (!finite(value)) continue;
      const perMetric = inner(this.metrics, event.name);
      const stat = perMetric.get(metric) ?? new RunningStat();
      stat.add(value);
      perMetric.set(metric, stat);
    }

    const status = event.tags?.status;
    if (status !== undefined && status !== null) {
      const perStatus = inner(this.statuses, event.name);
      const key = String(status);
      perStatus.set(key, (perStatus.get(key) ?? 0) + 1);
    }

    return event;
  }

  /** Newest `limit` events, oldest first. */
  listRecent(limit = 200): readonly TelemetryEvent[] {
    const n = Math.max(0, Math.trunc(limit));
    return n === 0 ? [] : this.buffer.slice(-n);
  }

  snapshot(recentLimit = 50): TelemetrySnapshot {
    return {
      generatedAt: new Date().toISOString(),
      durationsByName: sortedEntries(this.durations).map(([name, stat]) => ({
        name,
        count: stat.count,
        avgMs: stat.mean,
        maxMs: stat.max,
      })),
      metricsByName: flatten(this.metrics, (name, metric, stat) => ({
        name,
        metric,
        count: stat.count,
        avg: stat.mean,
        max: stat.max,
      })),
      statusCounts: flatten(this.statuses, (name, status, count) => ({
        name,
        status,
        count,
      })),
      recentEvents: this.listRecent(recentLimit),
    };
  }
}

export const telemetryStore = new TelemetryStore();
