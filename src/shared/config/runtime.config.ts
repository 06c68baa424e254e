import {
  defaultIngestConfig,
  type IngestConfig,
  ingestCaps,
  validateIngestConfig
} from "../../application/ingest-comments/ingest.config";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 120000 },
  requestDelayMs: { min: 0, max: 60000 },
  maxRetries: { min: 1, max: 10 }
} as const;

export type ClientRuntimeConfig = {
  timeoutMs: number;
  requestDelayMs: number;
  maxRetries: number;
};

export type RuntimeConfig = {
  ingestConfig: IngestConfig;
  client: ClientRuntimeConfig;
};

export const defaultClientRuntimeConfig: ClientRuntimeConfig = {
  timeoutMs: 30000,
  requestDelayMs: 1000,
  maxRetries: 5
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseOptionalString = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const raw = env[name];
  return raw != null && raw.trim() !== "" ? raw.trim() : undefined;
};

/**
 * Reads and validates every ingest setting. Throws on the first bad value,
 * before anything connects to the store or the API.
 */
export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const ingestConfig: IngestConfig = {
    subreddit: parseOptionalString(env, "INGEST_SUBREDDIT") ?? defaultIngestConfig.subreddit,
    startDate: parseOptionalString(env, "INGEST_START_DATE") ?? defaultIngestConfig.startDate,
    endDate: parseOptionalString(env, "INGEST_END_DATE") ?? defaultIngestConfig.endDate,
    pageSize: parseOptionalIntInRange(env, "INGEST_PAGE_SIZE", ingestCaps.pageSize) ?? defaultIngestConfig.pageSize,
    checkpointInterval:
      parseOptionalIntInRange(env, "INGEST_CHECKPOINT_INTERVAL", ingestCaps.checkpointInterval) ??
      defaultIngestConfig.checkpointInterval,
    maxConsecutiveGaps:
      parseOptionalIntInRange(env, "INGEST_MAX_CONSECUTIVE_GAPS", ingestCaps.maxConsecutiveGaps) ??
      defaultIngestConfig.maxConsecutiveGaps
  };
  validateIngestConfig(ingestConfig);

  const client: ClientRuntimeConfig = {
    timeoutMs: parseOptionalIntInRange(env, "COMMENTS_API_TIMEOUT_MS", runtimeCaps.timeoutMs) ?? defaultClientRuntimeConfig.timeoutMs,
    requestDelayMs:
      parseOptionalIntInRange(env, "COMMENTS_API_REQUEST_DELAY_MS", runtimeCaps.requestDelayMs) ??
      defaultClientRuntimeConfig.requestDelayMs,
    maxRetries: parseOptionalIntInRange(env, "COMMENTS_API_MAX_RETRIES", runtimeCaps.maxRetries) ?? defaultClientRuntimeConfig.maxRetries
  };

  return { ingestConfig, client };
};
