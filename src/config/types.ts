import type { LogLevelSetting } from "../observability/types";

export interface OutputDirs {
  metadata: string;
  documents: string;
  measures: string;
  manifests: string;
  reconciled: string;
}

export type SinkType = "local_jsonl" | "none";

export interface AppConfig {
  listingUrl: string;
  documentBaseUrl: string;
  measureBaseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  connectTimeoutMs: number;
  readTimeoutMs: number;
  downloadConcurrency: number;
  measureConcurrency: number;
  hostIntervalMs: number;
  maxPages: number;
  listingStartPage: number;
  measureIdStart: number;
  measureIdEnd: number;
  metadataMaxAgeDays: number;
  skipExisting: boolean;
  shuffleSeed?: number;
  logLevel: LogLevelSetting;
  sinkType: SinkType;
  outputDirs: OutputDirs;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs">> & {
  outputDirs?: Partial<OutputDirs>;
};
