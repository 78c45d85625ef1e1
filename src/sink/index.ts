import type { AppConfig } from "../config";
import { LocalJsonlSink } from "./localJsonlSink";
import { NoopSink } from "./noopSink";
import type { Sink } from "./types";

export function createSink(config: AppConfig, runId: string): Sink {
  switch (config.sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config, runId);
    case "none":
      return new NoopSink();
    default:
      throw new Error(`Unsupported sink type: ${String(config.sinkType)}`);
  }
}

export { LocalJsonlSink } from "./localJsonlSink";
export { NoopSink } from "./noopSink";
export type { Sink } from "./types";
