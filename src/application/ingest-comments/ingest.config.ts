import { dateToEpoch } from "../../core/comments/epoch";

export type IngestConfig = {
  subreddit: string;
  startDate: string; // YYYY-MM-DD, UTC
  endDate: string;   // YYYY-MM-DD, UTC, exclusive
  pageSize: number;
  checkpointInterval: number;
  maxConsecutiveGaps: number;
};

export type IngestConfigInput = Partial<IngestConfig>;

export type ResolvedIngestConfig = IngestConfig & {
  startEpoch: number;
  endEpoch: number;
};

export const defaultIngestConfig: IngestConfig = {
  subreddit: "wallstreetbets",
  startDate: "2020-12-01",
  endDate: "2021-03-31",
  pageSize: 100,
  checkpointInterval: 10,
  maxConsecutiveGaps: 3
};

export const ingestCaps = {
  pageSize: { min: 1, max: 100 },
  checkpointInterval: { min: 1, max: 10000 },
  maxConsecutiveGaps: { min: 1, max: 100 }
} as const;

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateIngestConfig = (config: IngestConfig): ResolvedIngestConfig => {
  assertIntegerInRange("pageSize", config.pageSize, ingestCaps.pageSize.min, ingestCaps.pageSize.max);
  assertIntegerInRange(
    "checkpointInterval",
    config.checkpointInterval,
    ingestCaps.checkpointInterval.min,
    ingestCaps.checkpointInterval.max
  );
  assertIntegerInRange(
    "maxConsecutiveGaps",
    config.maxConsecutiveGaps,
    ingestCaps.maxConsecutiveGaps.min,
    ingestCaps.maxConsecutiveGaps.max
  );

  if (config.subreddit.trim() === "") {
    throw new Error("subreddit must not be empty");
  }

  const startEpoch = dateToEpoch(config.startDate);
  const endEpoch = dateToEpoch(config.endDate);
  if (endEpoch <= startEpoch) {
    throw new Error(`endDate=${config.endDate} must be after startDate=${config.startDate}`);
  }

  return { ...config, startEpoch, endEpoch };
};

const normalizeOptionalString = (value: string | undefined): string | undefined => {
  if (typeof value !== "string") return undefined;
  const normalized = value.trim();
  return normalized === "" ? undefined : normalized;
};

export const resolveIngestConfig = (input: IngestConfigInput = {}): ResolvedIngestConfig =>
  validateIngestConfig({
    ...defaultIngestConfig,
    ...input,
    subreddit: normalizeOptionalString(input.subreddit) ?? defaultIngestConfig.subreddit,
    startDate: normalizeOptionalString(input.startDate) ?? defaultIngestConfig.startDate,
    endDate: normalizeOptionalString(input.endDate) ?? defaultIngestConfig.endDate
  });
