import { ArtifactIndex } from "../artifacts/artifactIndex";
import type { AppConfig, OutputDirs } from "../config";
import { latestMeasureArtifacts, listMeasureArtifacts } from "../crawl/measureArtifacts";
import { runMeasureCrawler } from "../crawl/measureCrawler";
import { loadMetadataCorpus, loadOrCrawlMetadata } from "../crawl/metadataCrawler";
import type { MetadataCorpus } from "../crawl/metadataCrawler";
import { runDocumentFetcher } from "../download/documentFetcher";
import type { Logger, MetricsRegistry } from "../observability";
import { listRawDocuments, reconcileArtifacts, writeReconciledTable } from "../reconcile/reconciler";
import type { ReconcileSummary } from "../reconcile/reconciler";
import type { Sink } from "../sink";
import { assertDirectory } from "../utils/fs";
import type { FetchFn } from "./fetch";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  sink: Sink;
  fetchFn?: FetchFn;
}

export interface CommandOptions {
  force?: boolean;
  startPage?: number;
  maxDocs?: number;
}

const DIR_LABELS: Record<keyof OutputDirs, string> = {
  metadata: "Metadata",
  documents: "Documents",
  measures: "Measures",
  manifests: "Manifests",
  reconciled: "Reconciled",
};

/** Checked before any request is made, so a bad path fails the command up front. */
export async function assertOutputDirs(config: AppConfig, keys: Array<keyof OutputDirs>): Promise<void> {
  for (const key of keys) {
    await assertDirectory(config.outputDirs[key], DIR_LABELS[key]);
  }
}

export async function runMetadata(ctx: CommandContext, options: CommandOptions = {}): Promise<MetadataCorpus> {
  await assertOutputDirs(ctx.config, ["metadata"]);
  ctx.logger.info("metadata_start", { force: Boolean(options.force), startPage: options.startPage });
  const corpus = await loadOrCrawlMetadata(
    { config: ctx.config, logger: ctx.logger, metrics: ctx.metrics, fetchFn: ctx.fetchFn },
    { startPage: options.startPage, force: options.force },
  );
  ctx.logger.info("metadata_complete", {
    source: corpus.source,
    records: corpus.records.length,
    uniqueRawRecords: corpus.uniqueRawRecords,
  });
  return corpus;
}

export async function runDocuments(
  ctx: CommandContext,
  options: CommandOptions = {},
  preloaded?: MetadataCorpus,
): Promise<void> {
  await assertOutputDirs(ctx.config, ["metadata", "documents"]);
  const config: AppConfig = options.force ? { ...ctx.config, skipExisting: false } : ctx.config;
  const corpus = preloaded ?? (await runMetadata(ctx, { startPage: options.startPage }));

  ctx.logger.info("documents_start", { records: corpus.records.length, maxDocs: options.maxDocs });
  const index = await ArtifactIndex.open(config.outputDirs.documents);
  const { results, ...summary } = await runDocumentFetcher(
    corpus.records,
    {
      config,
      logger: ctx.logger,
      metrics: ctx.metrics,
      sink: ctx.sink,
      index,
      fetchFn: ctx.fetchFn,
    },
    options.maxDocs,
  );
  ctx.logger.info("documents_complete", { ...summary, resultCount: results.length });
}

export async function runMeasures(ctx: CommandContext, options: CommandOptions = {}): Promise<void> {
  await assertOutputDirs(ctx.config, ["measures"]);
  ctx.logger.info("measures_start", { force: Boolean(options.force) });
  const summary = await runMeasureCrawler(
    { config: ctx.config, logger: ctx.logger, metrics: ctx.metrics, sink: ctx.sink, fetchFn: ctx.fetchFn },
    { force: options.force },
  );
  ctx.logger.info("measures_complete", { ...summary });
}

export async function runReconcile(ctx: CommandContext): Promise<ReconcileSummary> {
  await assertOutputDirs(ctx.config, ["metadata", "documents", "reconciled"]);
  const corpus = await loadMetadataCorpus({ config: ctx.config, logger: ctx.logger });
  if (corpus.records.length === 0) {
    throw new Error(`No metadata records found in ${ctx.config.outputDirs.metadata}; run the metadata command first`);
  }

  const documentsDir = await assertDirectory(ctx.config.outputDirs.documents, "Documents");
  const filenames = await listRawDocuments(documentsDir);
  ctx.logger.info("reconcile_start", { artifacts: filenames.length, records: corpus.records.length });

  const reconciled = reconcileArtifacts(filenames, corpus.records, ctx.logger);
  const outputDir = await assertDirectory(ctx.config.outputDirs.reconciled, "Reconciled");
  const summary = await writeReconciledTable(reconciled, outputDir, { logger: ctx.logger, metrics: ctx.metrics });
  ctx.logger.info("reconcile_complete", { ...summary });
  return summary;
}

export async function runPipeline(ctx: CommandContext, options: CommandOptions = {}): Promise<void> {
  await assertOutputDirs(ctx.config, ["metadata", "documents", "reconciled"]);
  ctx.logger.info("pipeline_start", { force: Boolean(options.force), maxDocs: options.maxDocs });

  const corpus = await runMetadata(ctx, { force: options.force, startPage: options.startPage });
  await runDocuments(ctx, { maxDocs: options.maxDocs }, corpus);
  await runReconcile(ctx);

  ctx.logger.info("pipeline_complete", { maxDocs: options.maxDocs });
}

export async function runStatus(ctx: CommandContext): Promise<void> {
  await assertOutputDirs(ctx.config, ["metadata", "documents", "measures"]);
  ctx.logger.info("status_start");

  const corpus = await loadMetadataCorpus({ config: ctx.config, logger: ctx.logger });
  const documents = await listRawDocuments(ctx.config.outputDirs.documents);
  const measureFiles = await listMeasureArtifacts(ctx.config.outputDirs.measures);

  ctx.logger.info("status_complete", {
    snapshots: corpus.snapshotPaths.length,
    metadataRecords: corpus.records.length,
    rawDocuments: documents.length,
    measureArtifacts: measureFiles.length,
    uniqueMeasures: latestMeasureArtifacts(measureFiles).length,
  });
}
