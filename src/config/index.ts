export * from "./loadConfig";
export type { AppConfig, ConfigOverrides, OutputDirs, SinkType } from "./types";
