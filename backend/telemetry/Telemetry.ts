import { performance } from 'node:perf_hooks';

import { type TelemetryEventInput, telemetryStore } from './TelemetryStore';

const envFlag = (name: string): string =>
  String(process.env[name] ?? '').trim();

const flagEnabled = (name: string): boolean => {
  const v = envFlag(name);
  if (!v) return true;
  return v === '1' || v.toLowerCase() === 'true' || v.toLowerCase() === 'yes';
};

const isEnabled = (): boolean => flagEnabled('MOLDCHECK_TELEMETRY');

const isStructuredLogsEnabled = (): boolean =>
  flagEnabled('MOLDCHECK_TELEMETRY_LOGS');

export const telemetry = {
  nowMs: (): number => performance.now(),

  record(event: TelemetryEventInput) {
    if (!isEnabled()) return;

    const stored = telemetryStore.record(event);

    if (isStructuredLogsEnabled()) {
      // One JSON object per line.
      // eslint-disable-next-line no-console
      console.info(
        JSON.stringify({
          type: 'moldcheck.telemetry',
          ts: stored.ts,
          name: stored.name,
          durationMs: stored.durationMs,
          tags: stored.tags,
          metrics: stored.metrics,
          message: stored.message,
        }),
      );
    }
  },
};
