import type { MeasureCrawlResult, RecordFetchResult } from "../types";

export interface Sink {
  publishFetchResults(results: RecordFetchResult[]): Promise<void>;
  publishMeasureResults(results: MeasureCrawlResult[]): Promise<void>;
}
