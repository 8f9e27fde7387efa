import { DEFAULT_SAFETY_FACTOR } from '../domain/ProcessConfig';
import { DEFAULT_MAX_STORED_ANALYSES } from '../persistence/AnalysisStore';

export type ServerConfig = {
  port: number;
  requestTimeoutMs: number;
  jsonBodyLimit: string;
  defaultSafetyFactor: number;
  maxStoredAnalyses: number;
};

export const DEFAULT_SERVER_CONFIG: Readonly<ServerConfig> = Object.freeze({
  port: 3001,
  requestTimeoutMs: 15000,
  jsonBodyLimit: '1mb',
  defaultSafetyFactor: DEFAULT_SAFETY_FACTOR,
  maxStoredAnalyses: DEFAULT_MAX_STORED_ANALYSES,
});

type Env = Record<string, string | undefined>;

const positiveNumber = (raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : fallback;
};

const positiveInteger = (raw: string | undefined, fallback: number): number => {
  const value = positiveNumber(raw, fallback);
  return Number.isInteger(value) ? value : fallback;
};

/**
 * Reads server settings from the environment. Missing or invalid values
 * fall back to the defaults.
 */
export function loadServerConfig(env: Env = process.env): ServerConfig {
  const bodyLimit = env.JSON_BODY_LIMIT?.trim();
  return {
    port: positiveInteger(env.API_PORT, DEFAULT_SERVER_CONFIG.port),
    requestTimeoutMs: positiveInteger(
      env.API_TIMEOUT_MS,
      DEFAULT_SERVER_CONFIG.requestTimeoutMs,
    ),
    jsonBodyLimit: bodyLimit || DEFAULT_SERVER_CONFIG.jsonBodyLimit,
    defaultSafetyFactor: positiveNumber(
      env.DEFAULT_SAFETY_FACTOR,
      DEFAULT_SERVER_CONFIG.defaultSafetyFactor,
    ),
    maxStoredAnalyses: positiveInteger(
      env.MAX_STORED_ANALYSES,
      DEFAULT_SERVER_CONFIG.maxStoredAnalyses,
    ),
  };
}
