import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { parseListingRecord } from "../src/crawl/listingSchema";
import {
  advanceListingCursor,
  buildListingUrl,
  collectListing,
  dedupeListingRecords,
  loadOrCrawlMetadata,
  startListingCursor,
} from "../src/crawl/metadataCrawler";
import type { ListingRecord } from "../src/types";
import { fakeFetch, jsonResponse, makeWorkspace, testDeps, textResponse, wireRecord } from "./helpers";

const NOW = new Date("2024-05-01T13:45:09.000Z");

function pagedFetch(pages: Record<number, { payload: ListingRecord[]; next: number | null }>) {
  return fakeFetch((url) => {
    const page = Number(new URL(url).searchParams.get("page"));
    const body = pages[page];
    if (!body) {
      return textResponse("missing", 404);
    }
    return jsonResponse({ payload: body.payload, pager: { next: body.next } });
  });
}

describe("listing cursor", () => {
  it("moves forward while the pager points ahead", () => {
    const cursor = advanceListingCursor(startListingCursor(1), 2);

    expect(cursor).toEqual({ page: 2, pagesVisited: 1, done: false });
  });

  it("stops on an equal, smaller or absent next page", () => {
    const atThree = { page: 3, pagesVisited: 2, done: false };

    expect(advanceListingCursor(atThree, 2)).toEqual({ page: 3, pagesVisited: 3, done: true });
    expect(advanceListingCursor(atThree, 3)).toEqual({ page: 3, pagesVisited: 3, done: true });
    expect(advanceListingCursor(atThree, null)).toEqual({ page: 3, pagesVisited: 3, done: true });
  });

  it("puts the page number in the query string", () => {
    expect(buildListingUrl("https://listing.test/search", 4)).toBe("https://listing.test/search?page=4");
  });
});

describe("collectListing", () => {
  it("stops after a page whose pager points backwards", async () => {
    const { config } = makeWorkspace();
    const { fetchFn, calls } = pagedFetch({
      1: { payload: [wireRecord({ Paper_id: 1 })], next: 2 },
      2: { payload: [wireRecord({ Paper_id: 2 })], next: 3 },
      3: { payload: [wireRecord({ Paper_id: 3 })], next: 2 },
    });

    const records = await collectListing({ ...testDeps(config), fetchFn }, 1);

    expect(calls).toEqual([
      "https://listing.test/search?page=1",
      "https://listing.test/search?page=2",
      "https://listing.test/search?page=3",
    ]);
    expect(records.map((record) => record.Paper_id)).toEqual([1, 2, 3]);
  });

  it("fails when the listing runs past the page ceiling", async () => {
    const { config } = makeWorkspace();
    const { fetchFn, calls } = fakeFetch((url) => {
      const page = Number(new URL(url).searchParams.get("page"));
      return jsonResponse({ payload: [], pager: { next: page + 1 } });
    });

    await expect(collectListing({ ...testDeps({ ...config, maxPages: 3 }), fetchFn }, 1)).rejects.toThrow(
      "Listing exceeded maxPages=3 before page 4",
    );
    expect(calls).toHaveLength(3);
  });

  it("rejects a page without a pager", async () => {
    const { config } = makeWorkspace();
    const { fetchFn } = fakeFetch(() => jsonResponse({ payload: [] }));

    await expect(collectListing({ ...testDeps(config), fetchFn }, 1)).rejects.toThrow(
      "Malformed listing page https://listing.test/search?page=1",
    );
  });
});

describe("dedupeListingRecords", () => {
  it("treats records with reordered keys as the same record", () => {
    const first = { Paper_id: 1, Name: "A", Parties: [{ Name: "Chile" }] };
    const reordered = { Parties: [{ Name: "Chile" }], Name: "A", Paper_id: 1 };
    const other = { Paper_id: 2, Name: "A", Parties: [{ Name: "Chile" }] };

    expect(dedupeListingRecords([first, reordered, other])).toEqual([first, other]);
  });
});

describe("parseListingRecord", () => {
  it("maps the wire record to a typed record", () => {
    const parsed = parseListingRecord(wireRecord());

    expect(parsed).toEqual({
      ok: true,
      record: {
        paperId: "101",
        meetingType: "ATCM",
        meetingNumber: "44",
        abbreviation: "WP",
        number: 7,
        revision: 0,
        type: "pdf",
        name: "Test paper",
        meetingYear: 2022,
        meetingId: "90",
        meetingName: "ATCM XLIV",
        paperTypeId: "1",
        parties: ["Chile", "Norway"],
      },
    });
  });

  it("accepts numeric strings and a null revision", () => {
    const parsed = parseListingRecord(wireRecord({ Number: "012", Revision: null, Meeting_number: 3 }));

    expect(parsed.ok && parsed.record.number).toBe(12);
    expect(parsed.ok && parsed.record.revision).toBe(0);
    expect(parsed.ok && parsed.record.meetingNumber).toBe("3");
  });

  it("reports records missing identifying fields", () => {
    expect(parseListingRecord(wireRecord({ Abbreviation: undefined })).ok).toBe(false);
    expect(parseListingRecord(wireRecord({ Number: "7a" })).ok).toBe(false);
  });
});

describe("loadOrCrawlMetadata", () => {
  it("crawls, deduplicates across pages and writes a timestamped snapshot", async () => {
    const { config } = makeWorkspace();
    const shared = wireRecord({ Paper_id: 2, Number: 8 });
    const { Name, ...sharedWithoutName } = shared;
    const { fetchFn } = pagedFetch({
      1: { payload: [wireRecord({ Paper_id: 1 }), shared], next: 2 },
      2: { payload: [{ Name, ...sharedWithoutName }, wireRecord({ Paper_id: 3, Number: 9 })], next: 2 },
    });

    const corpus = await loadOrCrawlMetadata({ ...testDeps(config), fetchFn, now: () => NOW });

    expect(corpus.source).toBe("crawl");
    expect(corpus.records.map((record) => record.paperId)).toEqual(["1", "2", "3"]);
    const snapshotPath = path.join(config.outputDirs.metadata, "2024-05-01-13-45-09_papers_metadata.json");
    expect(corpus.snapshotPaths).toEqual([snapshotPath]);
    const written: unknown = JSON.parse(fs.readFileSync(snapshotPath, "utf8"));
    expect(Array.isArray(written) && written.length).toBe(3);
  });

  it("loads existing snapshots instead of crawling", async () => {
    const { config } = makeWorkspace();
    fs.writeFileSync(
      path.join(config.outputDirs.metadata, "2024-01-01-00-00-00_papers_metadata.json"),
      JSON.stringify([wireRecord({ Paper_id: 1 }), wireRecord({ Paper_id: 2, Number: 8 })]),
    );
    fs.writeFileSync(
      path.join(config.outputDirs.metadata, "2024-02-01-00-00-00_papers_metadata.json"),
      JSON.stringify([wireRecord({ Paper_id: 2, Number: 8 }), wireRecord({ Paper_id: 3, Number: 9 })]),
    );
    const { fetchFn, calls } = fakeFetch(() => {
      throw new Error("listing must not be requested");
    });

    const corpus = await loadOrCrawlMetadata({ ...testDeps(config), fetchFn, now: () => NOW });

    expect(calls).toEqual([]);
    expect(corpus.source).toBe("snapshot");
    expect(corpus.records.map((record) => record.paperId)).toEqual(["1", "2", "3"]);
    expect(corpus.snapshotPaths).toHaveLength(2);
  });

  it("crawls when every snapshot is empty", async () => {
    const { config } = makeWorkspace();
    fs.writeFileSync(path.join(config.outputDirs.metadata, "2024-01-01-00-00-00_papers_metadata.json"), "[]");
    const { fetchFn, calls } = pagedFetch({ 1: { payload: [wireRecord()], next: null } });

    const corpus = await loadOrCrawlMetadata({ ...testDeps(config), fetchFn, now: () => NOW });

    expect(calls).toHaveLength(1);
    expect(corpus.source).toBe("crawl");
  });

  it("crawls when the newest snapshot is older than the configured age", async () => {
    const { config } = makeWorkspace();
    fs.writeFileSync(
      path.join(config.outputDirs.metadata, "2024-01-01-00-00-00_papers_metadata.json"),
      JSON.stringify([wireRecord()]),
    );
    const { fetchFn, calls } = pagedFetch({ 1: { payload: [wireRecord()], next: null } });
    const deps = { ...testDeps({ ...config, metadataMaxAgeDays: 30 }), fetchFn };

    const fresh = await loadOrCrawlMetadata({ ...deps, now: () => new Date("2024-01-20T00:00:00.000Z") });
    const stale = await loadOrCrawlMetadata({ ...deps, now: () => new Date("2024-03-01T00:00:00.000Z") });

    expect(fresh.source).toBe("snapshot");
    expect(stale.source).toBe("crawl");
    expect(calls).toHaveLength(1);
  });

  it("crawls when forced even though a snapshot exists", async () => {
    const { config } = makeWorkspace();
    fs.writeFileSync(
      path.join(config.outputDirs.metadata, "2024-01-01-00-00-00_papers_metadata.json"),
      JSON.stringify([wireRecord()]),
    );
    const { fetchFn, calls } = pagedFetch({ 1: { payload: [wireRecord({ Paper_id: 9 })], next: null } });

    const corpus = await loadOrCrawlMetadata({ ...testDeps(config), fetchFn, now: () => NOW }, { force: true });

    expect(calls).toHaveLength(1);
    expect(corpus.source).toBe("crawl");
    expect(corpus.records.map((record) => record.paperId)).toEqual(["9"]);
    expect(fs.readdirSync(config.outputDirs.metadata).sort()).toEqual([
      "2024-01-01-00-00-00_papers_metadata.json",
      "2024-05-01-13-45-09_papers_metadata.json",
    ]);
  });

  it("writes no snapshot for a crawl cut short by the page ceiling", async () => {
    const { config } = makeWorkspace();
    const pages: Record<number, { payload: ListingRecord[]; next: number | null }> = {};
    for (let page = 1; page <= 5; page += 1) {
      pages[page] = { payload: [wireRecord({ Paper_id: page, Number: page })], next: page < 5 ? page + 1 : null };
    }
    const { fetchFn } = pagedFetch(pages);

    await expect(
      loadOrCrawlMetadata({ ...testDeps({ ...config, maxPages: 2 }), fetchFn, now: () => NOW }),
    ).rejects.toThrow("Listing exceeded maxPages=2 before page 3");
    expect(fs.readdirSync(config.outputDirs.metadata)).toEqual([]);

    const corpus = await loadOrCrawlMetadata({ ...testDeps(config), fetchFn, now: () => NOW });
    expect(corpus.source).toBe("crawl");
    expect(corpus.records).toHaveLength(5);
  });

  it("writes no snapshot when a listing request fails", async () => {
    const { config } = makeWorkspace();
    const { fetchFn } = pagedFetch({ 1: { payload: [wireRecord()], next: 2 } });

    await expect(loadOrCrawlMetadata({ ...testDeps(config), fetchFn, now: () => NOW })).rejects.toThrow(
      "HTTP 404 while fetching https://listing.test/search?page=2",
    );
    expect(fs.readdirSync(config.outputDirs.metadata)).toEqual([]);
  });

  it("keeps invalid records in the snapshot but out of the typed corpus", async () => {
    const { config } = makeWorkspace();
    const { fetchFn } = pagedFetch({
      1: { payload: [wireRecord(), wireRecord({ Paper_id: 5, Abbreviation: "" })], next: null },
    });

    const corpus = await loadOrCrawlMetadata({ ...testDeps(config), fetchFn, now: () => NOW });

    expect(corpus.uniqueRawRecords).toBe(2);
    expect(corpus.records.map((record) => record.paperId)).toEqual(["101"]);
  });

  it("fails fast when the metadata directory is missing", async () => {
    const { config, root } = makeWorkspace();
    const missing = { ...config, outputDirs: { ...config.outputDirs, metadata: path.join(root, "absent") } };
    const { fetchFn, calls } = pagedFetch({});

    await expect(loadOrCrawlMetadata({ ...testDeps(missing), fetchFn })).rejects.toThrow("Metadata directory not found");
    expect(calls).toEqual([]);
  });
});
