export * from "./logger";
export * from "./metrics";
export * from "./runId";
export type { LogFields, LogLevel, LogLevelSetting, MetricCounterName, MetricTimerName } from "./types";
