import type { ArtifactIndex } from "../artifacts/artifactIndex";
import type { AppConfig } from "../config";
import { processWithConcurrency } from "../core/concurrency";
import { defaultFetch, getDocumentDispatcher, isTimeoutError } from "../core/fetch";
import type { FetchFn } from "../core/fetch";
import { createRandom, shuffle } from "../core/random";
import type { RandomFn } from "../core/random";
import { HostRateLimiter } from "../core/rateLimiter";
import { errorMessage } from "../observability";
import type { Logger, MetricsRegistry } from "../observability";
import { outputFilenameFromUrl, resolveDocumentVariants } from "../resolve/urlResolver";
import type { Sink } from "../sink";
import type { CanonicalRecord, DocumentVariant, RecordFetchResult, VariantOutcome } from "../types";
import { writeFileAtomic } from "../utils/fs";

export interface DocumentFetcherDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  index: ArtifactIndex;
  fetchFn?: FetchFn;
  rateLimiter?: HostRateLimiter;
  random?: RandomFn;
}

export interface DocumentFetchSummary {
  records: number;
  ok: number;
  failed: number;
  written: number;
  skipped: number;
  inFlight: number;
  notFound: number;
  timedOut: number;
  results: RecordFetchResult[];
}

async function fetchVariant(
  variant: DocumentVariant,
  filename: string,
  deps: DocumentFetcherDeps,
  fetchFn: FetchFn,
  rateLimiter: HostRateLimiter,
): Promise<VariantOutcome> {
  const { config, logger, metrics, index } = deps;
  const base = { language: variant.language, filename, url: variant.url };

  await rateLimiter.acquire(variant.url);
  const stopTimer = metrics.startTimer("document_fetch_ms");
  try {
    const response = await fetchFn(variant.url, {
      headers: {
        "user-agent": config.userAgent,
        accept: "*/*",
      },
      dispatcher: getDocumentDispatcher(config),
    });

    if (!response.ok) {
      const durationMs = stopTimer();
      metrics.incrementCounter("documents_not_found", 1);
      logger.info("document_not_found", { url: variant.url, statusCode: response.status, durationMs });
      return { ...base, status: "not_found", statusCode: response.status };
    }

    const bytes = new Uint8Array(await response.arrayBuffer());
    await writeFileAtomic(index.pathFor(filename), bytes);
    index.commit(filename);
    const durationMs = stopTimer();
    metrics.incrementCounter("documents_written", 1);
    logger.info("document_written", { url: variant.url, filename, bytes: bytes.byteLength, durationMs });
    return { ...base, status: "written", statusCode: response.status, bytes: bytes.byteLength };
  } catch (error) {
    if (!isTimeoutError(error)) {
      throw error;
    }
    const durationMs = stopTimer();
    metrics.incrementCounter("documents_timed_out", 1);
    logger.warn("document_fetch_timeout", { url: variant.url, durationMs, error: errorMessage(error) });
    return { ...base, status: "timeout" };
  }
}

/** Raised when a record's fetch stops early; `outcomes` holds the variants settled before the error. */
export class RecordFetchError extends Error {
  readonly paperId: string;
  readonly outcomes: VariantOutcome[];

  constructor(paperId: string, outcomes: VariantOutcome[], cause: unknown) {
    super(errorMessage(cause), { cause });
    this.name = "RecordFetchError";
    this.paperId = paperId;
    this.outcomes = outcomes;
  }
}

/**
 * Fetches the language variants of one paper that are not on disk yet.
 * Timeouts and non-2xx answers become outcomes; any other transport error
 * is rethrown as a {@link RecordFetchError}.
 */
export async function fetchRecordDocuments(
  record: CanonicalRecord,
  deps: DocumentFetcherDeps,
): Promise<VariantOutcome[]> {
  const { config, logger, metrics, index } = deps;
  const fetchFn = deps.fetchFn ?? defaultFetch;
  const rateLimiter = deps.rateLimiter ?? new HostRateLimiter(config.hostIntervalMs);
  const outcomes: VariantOutcome[] = [];

  for (const variant of resolveDocumentVariants(record, config.documentBaseUrl)) {
    const filename = outputFilenameFromUrl(variant.url);
    const claim = index.claim(filename, !config.skipExisting);
    if (claim === "exists") {
      metrics.incrementCounter("documents_skipped", 1);
      logger.debug("document_skipped_existing", { paperId: record.paperId, filename });
      outcomes.push({ language: variant.language, filename, url: variant.url, status: "skipped_existing" });
      continue;
    }
    if (claim === "in_flight") {
      logger.debug("document_in_flight", { paperId: record.paperId, filename });
      outcomes.push({ language: variant.language, filename, url: variant.url, status: "in_flight" });
      continue;
    }

    try {
      outcomes.push(await fetchVariant(variant, filename, deps, fetchFn, rateLimiter));
    } catch (error) {
      throw new RecordFetchError(record.paperId, [...outcomes], error);
    } finally {
      index.release(filename);
    }
  }

  return outcomes;
}

/**
 * Fetches every record's documents in shuffled order. A record that throws
 * is logged and recorded as failed; the batch always runs to the end.
 */
export async function runDocumentFetcher(
  records: readonly CanonicalRecord[],
  deps: DocumentFetcherDeps,
  maxDocs?: number,
): Promise<DocumentFetchSummary> {
  const { config, logger, metrics, sink } = deps;
  const random = deps.random ?? createRandom(config.shuffleSeed);
  const shared: DocumentFetcherDeps = {
    ...deps,
    rateLimiter: deps.rateLimiter ?? new HostRateLimiter(config.hostIntervalMs),
  };
  const shuffled = shuffle(records, random);
  const ordered = maxDocs !== undefined ? shuffled.slice(0, Math.max(maxDocs, 0)) : shuffled;
  const summary: DocumentFetchSummary = {
    records: ordered.length,
    ok: 0,
    failed: 0,
    written: 0,
    skipped: 0,
    inFlight: 0,
    notFound: 0,
    timedOut: 0,
    results: [],
  };

  logger.info("documents_batch_start", {
    records: ordered.length,
    existingFiles: deps.index.size,
    concurrency: config.downloadConcurrency,
    skipExisting: config.skipExisting,
  });

  await processWithConcurrency(ordered, config.downloadConcurrency, async (record) => {
    let result: RecordFetchResult;
    try {
      const variants = await fetchRecordDocuments(record, shared);
      result = { paperId: record.paperId, status: "ok", variants, fetchedAt: new Date().toISOString() };
    } catch (error) {
      metrics.incrementCounter("records_failed", 1);
      logger.error("documents_record_failed", { paperId: record.paperId, error: errorMessage(error) });
      result = {
        paperId: record.paperId,
        status: "failed",
        variants: error instanceof RecordFetchError ? error.outcomes : [],
        error: errorMessage(error),
        fetchedAt: new Date().toISOString(),
      };
    }

    summary.results.push(result);
    if (result.status === "ok") {
      summary.ok += 1;
    } else {
      summary.failed += 1;
    }
    for (const variant of result.variants) {
      if (variant.status === "written") summary.written += 1;
      else if (variant.status === "skipped_existing") summary.skipped += 1;
      else if (variant.status === "in_flight") summary.inFlight += 1;
      else if (variant.status === "not_found") summary.notFound += 1;
      else summary.timedOut += 1;
    }

    try {
      await sink.publishFetchResults([result]);
    } catch (error) {
      logger.error("manifest_publish_failed", { paperId: record.paperId, error: errorMessage(error) });
    }
    logger.info("documents_record_complete", {
      paperId: record.paperId,
      status: result.status,
      processed: summary.results.length,
      total: ordered.length,
    });
  });

  return summary;
}
