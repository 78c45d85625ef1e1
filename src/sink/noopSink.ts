import type { MeasureCrawlResult, RecordFetchResult } from "../types";
import type { Sink } from "./types";

export class NoopSink implements Sink {
  async publishFetchResults(_results: RecordFetchResult[]): Promise<void> {
    return;
  }

  async publishMeasureResults(_results: MeasureCrawlResult[]): Promise<void> {
    return;
  }
}
