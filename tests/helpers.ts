import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DEFAULT_CONFIG } from "../src/config";
import type { AppConfig } from "../src/config";
import type { FetchFn, HttpResponse } from "../src/core/fetch";
import { Logger, MetricsRegistry } from "../src/observability";
import type { Sink } from "../src/sink";
import type { CanonicalRecord, ListingRecord, MeasureCrawlResult, RecordFetchResult } from "../src/types";

export function makeWorkspace(): { root: string; config: AppConfig } {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "ats-harvester-"));
  const outputDirs = {
    metadata: path.join(root, "metadata"),
    documents: path.join(root, "documents"),
    measures: path.join(root, "measures"),
    manifests: path.join(root, "manifests"),
    reconciled: path.join(root, "interim"),
  };
  for (const dir of Object.values(outputDirs)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  return { root, config: testConfig(outputDirs) };
}

export function testConfig(outputDirs: AppConfig["outputDirs"], overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...DEFAULT_CONFIG,
    listingUrl: "https://listing.test/search",
    documentBaseUrl: "https://docs.test",
    measureBaseUrl: "https://measures.test/Measure",
    hostIntervalMs: 0,
    downloadConcurrency: 1,
    measureConcurrency: 1,
    logLevel: "silent",
    sinkType: "none",
    outputDirs,
    ...overrides,
  };
}

export function silentLogger(): Logger {
  return new Logger({ component: "test", runId: "test-run", level: "silent" });
}

export function testDeps(config: AppConfig): { config: AppConfig; logger: Logger; metrics: MetricsRegistry } {
  return { config, logger: silentLogger(), metrics: new MetricsRegistry() };
}

export function fakeFetch(handler: (url: string) => HttpResponse | Promise<HttpResponse>): {
  fetchFn: FetchFn;
  calls: string[];
} {
  const calls: string[] = [];
  const fetchFn: FetchFn = async (url) => {
    calls.push(url);
    return handler(url);
  };
  return { fetchFn, calls };
}

export function textResponse(body: string, status = 200): HttpResponse {
  return new Response(body, { status });
}

export function jsonResponse(value: unknown, status = 200): HttpResponse {
  return new Response(JSON.stringify(value), { status, headers: { "content-type": "application/json" } });
}

export class RecordingSink implements Sink {
  readonly fetchResults: RecordFetchResult[] = [];
  readonly measureResults: MeasureCrawlResult[] = [];

  async publishFetchResults(results: RecordFetchResult[]): Promise<void> {
    this.fetchResults.push(...results);
  }

  async publishMeasureResults(results: MeasureCrawlResult[]): Promise<void> {
    this.measureResults.push(...results);
  }
}

export function wireRecord(overrides: ListingRecord = {}): ListingRecord {
  return {
    Paper_id: 101,
    Meeting_type: "ATCM",
    Meeting_number: "44",
    Abbreviation: "WP",
    Number: 7,
    Revision: 0,
    Type: "pdf",
    Name: "Test paper",
    Meeting_year: 2022,
    Meeting_id: 90,
    Meeting_name: "ATCM XLIV",
    Pap_type_id: 1,
    Parties: [{ Name: "Chile" }, { Name: "Norway" }],
    ...overrides,
  };
}

export function paper(overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
  return {
    paperId: "p1",
    meetingType: "ATCM",
    meetingNumber: "44",
    abbreviation: "WP",
    number: 7,
    revision: 0,
    type: "pdf",
    parties: [],
    ...overrides,
  };
}
