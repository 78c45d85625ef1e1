import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { LogLevelSetting } from "../observability/types";
import type { AppConfig, ConfigOverrides, SinkType } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  listingUrl: "https://www.ats.aq/devAS/Meetings/SearchDocDatabase",
  documentBaseUrl: "https://documents.ats.aq",
  measureBaseUrl: "https://www.ats.aq/devAS/Meetings/Measure",
  userAgent: "ats-harvester/0.1 (+batch research crawler)",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 120_000,
  connectTimeoutMs: 2_000,
  readTimeoutMs: 5_000,
  downloadConcurrency: 4,
  measureConcurrency: 1,
  hostIntervalMs: 250,
  maxPages: 5_000,
  listingStartPage: 1,
  measureIdStart: 1,
  measureIdEnd: 999,
  metadataMaxAgeDays: 0,
  skipExisting: true,
  shuffleSeed: undefined,
  logLevel: "info",
  sinkType: "local_jsonl",
  outputDirs: {
    metadata: "data/raw",
    documents: "data/raw",
    measures: "data/raw/measures",
    manifests: "data/manifests",
    reconciled: "data/interim",
  },
};

const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;
const SINK_TYPES = ["local_jsonl", "none"] as const;

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const ConfigOverridesSchema = z.object({
  listingUrl: z.string().url().optional(),
  documentBaseUrl: z.string().url().optional(),
  measureBaseUrl: z.string().url().optional(),
  userAgent: z.string().min(1).optional(),
  ignoreHttpsErrors: z.boolean().optional(),
  requestTimeoutMs: positiveInt.optional(),
  connectTimeoutMs: positiveInt.optional(),
  readTimeoutMs: positiveInt.optional(),
  downloadConcurrency: positiveInt.optional(),
  measureConcurrency: positiveInt.optional(),
  hostIntervalMs: nonNegativeInt.optional(),
  maxPages: positiveInt.optional(),
  listingStartPage: positiveInt.optional(),
  measureIdStart: positiveInt.optional(),
  measureIdEnd: positiveInt.optional(),
  metadataMaxAgeDays: nonNegativeInt.optional(),
  skipExisting: z.boolean().optional(),
  shuffleSeed: z.number().int().optional(),
  logLevel: z.enum(LOG_LEVELS).optional(),
  sinkType: z.enum(SINK_TYPES).optional(),
  outputDirs: z
    .object({
      metadata: z.string().min(1).optional(),
      documents: z.string().min(1).optional(),
      measures: z.string().min(1).optional(),
      manifests: z.string().min(1).optional(),
      reconciled: z.string().min(1).optional(),
    })
    .optional(),
});

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed = ConfigOverridesSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid config file ${absolutePath}: ${issues}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toOptionalInt(value: string | undefined, fallback: number | undefined): number | undefined {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toLogLevel(value: string | undefined, fallback: LogLevelSetting): LogLevelSetting {
  const match = LOG_LEVELS.find((level) => level === value?.trim().toLowerCase());
  return match ?? fallback;
}

function toSinkType(value: string | undefined, fallback: SinkType): SinkType {
  const match = SINK_TYPES.find((type) => type === value?.trim().toLowerCase());
  return match ?? fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
  };

  const config: AppConfig = {
    ...merged,
    listingUrl: env.LISTING_URL ?? merged.listingUrl,
    documentBaseUrl: env.DOCUMENT_BASE_URL ?? merged.documentBaseUrl,
    measureBaseUrl: env.MEASURE_BASE_URL ?? merged.measureBaseUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    connectTimeoutMs: toInt(env.CONNECT_TIMEOUT_MS, merged.connectTimeoutMs),
    readTimeoutMs: toInt(env.READ_TIMEOUT_MS, merged.readTimeoutMs),
    downloadConcurrency: toInt(env.DOWNLOAD_CONCURRENCY, merged.downloadConcurrency),
    measureConcurrency: toInt(env.MEASURE_CONCURRENCY, merged.measureConcurrency),
    hostIntervalMs: toInt(env.HOST_INTERVAL_MS, merged.hostIntervalMs),
    maxPages: toInt(env.MAX_PAGES, merged.maxPages),
    listingStartPage: toInt(env.LISTING_START_PAGE, merged.listingStartPage),
    measureIdStart: toInt(env.MEASURE_ID_START, merged.measureIdStart),
    measureIdEnd: toInt(env.MEASURE_ID_END, merged.measureIdEnd),
    metadataMaxAgeDays: toInt(env.METADATA_MAX_AGE_DAYS, merged.metadataMaxAgeDays),
    skipExisting: toBool(env.SKIP_EXISTING, merged.skipExisting),
    shuffleSeed: toOptionalInt(env.SHUFFLE_SEED, merged.shuffleSeed),
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
    sinkType: toSinkType(env.SINK_TYPE, merged.sinkType),
    outputDirs: {
      metadata: env.OUTPUT_METADATA_DIR ?? merged.outputDirs.metadata,
      documents: env.OUTPUT_DOCUMENTS_DIR ?? merged.outputDirs.documents,
      measures: env.OUTPUT_MEASURES_DIR ?? merged.outputDirs.measures,
      manifests: env.OUTPUT_MANIFESTS_DIR ?? merged.outputDirs.manifests,
      reconciled: env.OUTPUT_RECONCILED_DIR ?? merged.outputDirs.reconciled,
    },
  };

  if (config.measureIdEnd < config.measureIdStart) {
    throw new Error(`measureIdEnd (${config.measureIdEnd}) is below measureIdStart (${config.measureIdStart})`);
  }

  return config;
}

export { DEFAULT_CONFIG };
