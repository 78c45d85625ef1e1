export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogLevelSetting = LogLevel | "silent";

export interface LogFields {
  paperId?: string;
  url?: string;
  filename?: string;
  measureNumber?: number;
  page?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "listing_pages_fetched"
  | "records_discovered"
  | "documents_written"
  | "documents_skipped"
  | "documents_not_found"
  | "documents_timed_out"
  | "records_failed"
  | "measures_scraped"
  | "measures_missing"
  | "measures_failed"
  | "artifacts_matched"
  | "artifacts_unresolved";

export type MetricTimerName = "listing_page_ms" | "document_fetch_ms" | "measure_fetch_ms";
