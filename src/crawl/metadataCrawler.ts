import type { AppConfig } from "../config";
import { defaultFetch, fetchPage } from "../core/fetch";
import type { FetchFn } from "../core/fetch";
import { errorMessage } from "../observability";
import type { Logger, MetricsRegistry } from "../observability";
import type { CanonicalRecord, ListingRecord } from "../types";
import { assertDirectory } from "../utils/fs";
import { canonicalJson } from "../utils/json";
import { ListingPageSchema, parseListingRecord } from "./listingSchema";
import type { ListingPage } from "./listingSchema";
import { listSnapshots, readSnapshots, writeSnapshot } from "./snapshot";
import type { SnapshotFile } from "./snapshot";

export interface MetadataCrawlDeps {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchFn;
  now?: () => Date;
}

export interface MetadataCrawlOptions {
  startPage?: number;
  force?: boolean;
}

export interface MetadataCorpus {
  source: "snapshot" | "crawl";
  records: CanonicalRecord[];
  uniqueRawRecords: number;
  snapshotPaths: string[];
}

export interface ListingCursor {
  page: number;
  pagesVisited: number;
  done: boolean;
}

export function startListingCursor(startPage: number): ListingCursor {
  return { page: startPage, pagesVisited: 0, done: false };
}

/**
 * Moves past the page just processed. The crawl only continues when the
 * pager points strictly forward; an equal, smaller or absent `next` ends it.
 */
export function advanceListingCursor(cursor: ListingCursor, nextPage: number | null | undefined): ListingCursor {
  const pagesVisited = cursor.pagesVisited + 1;
  if (nextPage === null || nextPage === undefined || nextPage <= cursor.page) {
    return { page: cursor.page, pagesVisited, done: true };
  }
  return { page: nextPage, pagesVisited, done: false };
}

export function buildListingUrl(listingUrl: string, page: number): string {
  const url = new URL(listingUrl);
  url.searchParams.set("page", String(page));
  return url.toString();
}

async function fetchListingPage(url: string, config: AppConfig, fetchFn: FetchFn): Promise<ListingPage> {
  const response = await fetchPage(url, { config, fetchFn, accept: "application/json" });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} while fetching ${url}`);
  }

  const parsed = ListingPageSchema.safeParse(JSON.parse(response.body));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Malformed listing page ${url}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Walks the listing from `startPage` and returns every payload record in
 * page order. Any failure propagates, including running past `maxPages`;
 * nothing is persisted here.
 */
export async function collectListing(deps: MetadataCrawlDeps, startPage: number): Promise<ListingRecord[]> {
  const { config, logger, metrics } = deps;
  const fetchFn = deps.fetchFn ?? defaultFetch;
  const collected: ListingRecord[] = [];
  let cursor = startListingCursor(startPage);

  logger.info("listing_crawl_start", { page: startPage });
  while (!cursor.done) {
    if (cursor.pagesVisited >= config.maxPages) {
      logger.warn("listing_max_pages_reached", { maxPages: config.maxPages, page: cursor.page });
      throw new Error(`Listing exceeded maxPages=${config.maxPages} before page ${cursor.page}`);
    }

    const url = buildListingUrl(config.listingUrl, cursor.page);
    const stopTimer = metrics.startTimer("listing_page_ms");
    const listingPage = await fetchListingPage(url, config, fetchFn);
    const durationMs = stopTimer();

    collected.push(...listingPage.payload);
    metrics.incrementCounter("listing_pages_fetched", 1);
    logger.info("listing_page_complete", {
      page: cursor.page,
      url,
      recordsOnPage: listingPage.payload.length,
      total: collected.length,
      next: listingPage.pager.next,
      durationMs,
    });

    cursor = advanceListingCursor(cursor, listingPage.pager.next);
  }

  logger.info("listing_crawl_finished", { pagesVisited: cursor.pagesVisited, total: collected.length });
  return collected;
}

/** Keeps the first record of every distinct canonical serialization. */
export function dedupeListingRecords(records: ListingRecord[]): ListingRecord[] {
  const unique = new Map<string, ListingRecord>();
  for (const record of records) {
    const key = canonicalJson(record);
    if (!unique.has(key)) {
      unique.set(key, record);
    }
  }
  return [...unique.values()];
}

export function toCanonicalRecords(records: ListingRecord[], logger: Logger): CanonicalRecord[] {
  const typed: CanonicalRecord[] = [];
  for (const raw of records) {
    const parsed = parseListingRecord(raw);
    if (parsed.ok) {
      typed.push(parsed.record);
    } else {
      logger.warn("listing_record_invalid", { error: parsed.error, paperId: String(raw.Paper_id ?? "") });
    }
  }
  return typed;
}

export function isSnapshotStale(newest: SnapshotFile, maxAgeDays: number, now: Date): boolean {
  if (maxAgeDays <= 0) {
    return false;
  }
  return now.getTime() - newest.takenAt.getTime() > maxAgeDays * 24 * 60 * 60 * 1000;
}

/** Combined, deduplicated content of every snapshot in the metadata directory. */
export async function loadMetadataCorpus(deps: Pick<MetadataCrawlDeps, "config" | "logger">): Promise<MetadataCorpus> {
  const { config, logger } = deps;
  const dir = await assertDirectory(config.outputDirs.metadata, "Metadata");
  const snapshots = await listSnapshots(dir);
  const unique = dedupeListingRecords(await readSnapshots(snapshots));
  logger.info("metadata_snapshots_loaded", { snapshots: snapshots.length, uniqueRecords: unique.length });
  return {
    source: "snapshot",
    records: toCanonicalRecords(unique, logger),
    uniqueRawRecords: unique.length,
    snapshotPaths: snapshots.map((snapshot) => snapshot.path),
  };
}

/**
 * Returns the metadata corpus, crawling the listing only when no usable
 * snapshot exists (or `force` is set). A fresh crawl is persisted as a new
 * timestamped snapshot once it has completed.
 */
export async function loadOrCrawlMetadata(
  deps: MetadataCrawlDeps,
  options: MetadataCrawlOptions = {},
): Promise<MetadataCorpus> {
  const { config, logger, metrics } = deps;
  const now = deps.now ?? (() => new Date());
  const dir = await assertDirectory(config.outputDirs.metadata, "Metadata");

  if (!options.force) {
    const snapshots = await listSnapshots(dir);
    const newest = snapshots[snapshots.length - 1];
    if (newest && isSnapshotStale(newest, config.metadataMaxAgeDays, now())) {
      logger.info("metadata_snapshot_stale", {
        filename: newest.filename,
        takenAt: newest.takenAt.toISOString(),
        maxAgeDays: config.metadataMaxAgeDays,
      });
    } else if (newest) {
      const corpus = await loadMetadataCorpus(deps);
      if (corpus.uniqueRawRecords > 0) {
        logger.info("metadata_crawl_skipped", { snapshots: corpus.snapshotPaths.length });
        return corpus;
      }
      logger.warn("metadata_snapshots_empty", { snapshots: corpus.snapshotPaths.length });
    }
  }

  let collected: ListingRecord[];
  try {
    collected = await collectListing(deps, options.startPage ?? config.listingStartPage);
  } catch (error) {
    logger.error("listing_crawl_failed", { error: errorMessage(error) });
    throw error;
  }

  const unique = dedupeListingRecords(collected);
  metrics.incrementCounter("records_discovered", unique.length);
  const snapshotPath = await writeSnapshot(dir, unique, now());
  logger.info("metadata_snapshot_written", {
    filename: snapshotPath,
    collected: collected.length,
    uniqueRecords: unique.length,
  });

  return {
    source: "crawl",
    records: toCanonicalRecords(unique, logger),
    uniqueRawRecords: unique.length,
    snapshotPaths: [snapshotPath],
  };
}
