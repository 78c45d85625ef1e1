import path from "node:path";
import type { AppConfig } from "../config";
import { processWithConcurrency } from "../core/concurrency";
import { defaultFetch, fetchPage } from "../core/fetch";
import type { FetchFn } from "../core/fetch";
import { HostRateLimiter } from "../core/rateLimiter";
import { errorMessage } from "../observability";
import type { Logger, MetricsRegistry } from "../observability";
import type { Sink } from "../sink";
import type { MeasureCrawlResult, MeasureRecord } from "../types";
import { assertDirectory, writeJsonAtomic } from "../utils/fs";
import { listMeasureArtifacts, measureArtifactFilename } from "./measureArtifacts";
import { parseMeasurePage } from "./measureParser";

export interface MeasureCrawlDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  fetchFn?: FetchFn;
  rateLimiter?: HostRateLimiter;
  now?: () => Date;
}

export interface MeasureCrawlOptions {
  startId?: number;
  endId?: number;
  force?: boolean;
}

export interface MeasureCrawlSummary {
  processed: number;
  scraped: number;
  missing: number;
  skipped: number;
  failed: number;
}

export function buildMeasureUrl(measureBaseUrl: string, measureNumber: number): string {
  return `${measureBaseUrl.replace(/\/+$/, "")}/${measureNumber}`;
}

/**
 * Scrapes one measure page. A non-2xx answer means there is no measure under
 * this id and yields undefined; transport errors propagate.
 */
export async function crawlMeasure(measureNumber: number, deps: MeasureCrawlDeps): Promise<MeasureRecord | undefined> {
  const { config, logger, metrics } = deps;
  const fetchFn = deps.fetchFn ?? defaultFetch;
  const now = deps.now ?? (() => new Date());
  const url = buildMeasureUrl(config.measureBaseUrl, measureNumber);

  await deps.rateLimiter?.acquire(url);
  const stopTimer = metrics.startTimer("measure_fetch_ms");
  const response = await fetchPage(url, { config, fetchFn, accept: "text/html,application/xhtml+xml" });
  const durationMs = stopTimer();
  logger.info("measure_page_fetched", { measureNumber, url, statusCode: response.status, durationMs });

  if (!response.ok) {
    return undefined;
  }

  return {
    measureNumber,
    ...parseMeasurePage(response.body),
    sourceUrl: url,
    scrapedAt: now().toISOString(),
  };
}

/**
 * Walks the measure id range and writes one JSON artifact per measure as soon
 * as it is scraped. Ids that already have an artifact are skipped unless
 * `force` is set.
 */
export async function runMeasureCrawler(
  deps: MeasureCrawlDeps,
  options: MeasureCrawlOptions = {},
): Promise<MeasureCrawlSummary> {
  const { config, logger, metrics, sink } = deps;
  const now = deps.now ?? (() => new Date());
  const dir = await assertDirectory(config.outputDirs.measures, "Measures");
  const startId = options.startId ?? config.measureIdStart;
  const endId = options.endId ?? config.measureIdEnd;
  const shared: MeasureCrawlDeps = {
    ...deps,
    rateLimiter: deps.rateLimiter ?? new HostRateLimiter(config.hostIntervalMs),
  };

  const existing = new Set((await listMeasureArtifacts(dir)).map((artifact) => artifact.measureNumber));
  const ids: number[] = [];
  for (let id = startId; id <= endId; id += 1) {
    ids.push(id);
  }

  const summary: MeasureCrawlSummary = { processed: 0, scraped: 0, missing: 0, skipped: 0, failed: 0 };
  logger.info("measures_crawl_start", { startId, endId, existing: existing.size, force: Boolean(options.force) });

  await processWithConcurrency(ids, config.measureConcurrency, async (measureNumber) => {
    let result: MeasureCrawlResult;
    if (!options.force && existing.has(measureNumber)) {
      result = { measureNumber, status: "skipped_existing", crawledAt: now().toISOString() };
      summary.skipped += 1;
    } else {
      try {
        const record = await crawlMeasure(measureNumber, shared);
        if (record) {
          const artifactPath = path.join(dir, measureArtifactFilename(measureNumber, now()));
          await writeJsonAtomic(artifactPath, record);
          metrics.incrementCounter("measures_scraped", 1);
          logger.info("measure_saved", { measureNumber, filename: artifactPath });
          result = { measureNumber, status: "scraped", artifactPath, crawledAt: record.scrapedAt };
          summary.scraped += 1;
        } else {
          metrics.incrementCounter("measures_missing", 1);
          result = { measureNumber, status: "missing", crawledAt: now().toISOString() };
          summary.missing += 1;
        }
      } catch (error) {
        metrics.incrementCounter("measures_failed", 1);
        logger.error("measure_crawl_failed", { measureNumber, error: errorMessage(error) });
        result = { measureNumber, status: "failed", error: errorMessage(error), crawledAt: now().toISOString() };
        summary.failed += 1;
      }
    }

    summary.processed += 1;
    try {
      await sink.publishMeasureResults([result]);
    } catch (error) {
      logger.error("manifest_publish_failed", { measureNumber, error: errorMessage(error) });
    }
  });

  logger.info("measures_crawl_complete", { ...summary });
  return summary;
}
