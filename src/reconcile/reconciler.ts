import path from "node:path";
import type { Logger, MetricsRegistry } from "../observability";
import { buildDocumentFilenames, parseArtifactFilename } from "../resolve/urlResolver";
import type { CanonicalRecord, RawArtifact, ReconciledMetadata, ReconciledRecord } from "../types";
import { listFileNames, writeJsonLinesAtomic } from "../utils/fs";

interface MatchStage {
  name: string;
  keep(record: CanonicalRecord, artifact: RawArtifact): boolean;
}

// Conjunctive; the order only shapes the per-stage counts in the debug log.
const MATCH_STAGES: readonly MatchStage[] = [
  { name: "extension", keep: (record, artifact) => record.type === artifact.extension },
  { name: "abbreviation", keep: (record, artifact) => record.abbreviation === artifact.abbreviation },
  { name: "number", keep: (record, artifact) => record.number === Number.parseInt(artifact.paperNumber, 10) },
  { name: "meeting_type", keep: (record, artifact) => artifact.meeting.includes(record.meetingType) },
  { name: "revision", keep: (record, artifact) => record.revision === artifact.revision },
  { name: "filename", keep: (record, artifact) => buildDocumentFilenames(record).includes(artifact.filename) },
];

export interface StageCount {
  stage: string;
  remaining: number;
}

export type MatchResult =
  | { status: "matched"; record: CanonicalRecord; stages: StageCount[] }
  | { status: "no_match" | "ambiguous"; candidates: CanonicalRecord[]; stages: StageCount[] };

/**
 * Narrows the corpus to the records that could own `artifact`. Only a single
 * survivor counts as a match; several survivors are reported as ambiguous
 * and none of them is picked.
 */
export function matchArtifact(artifact: RawArtifact, corpus: readonly CanonicalRecord[]): MatchResult {
  let candidates: CanonicalRecord[] = [...corpus];
  const stages: StageCount[] = [];
  for (const stage of MATCH_STAGES) {
    candidates = candidates.filter((record) => stage.keep(record, artifact));
    stages.push({ stage: stage.name, remaining: candidates.length });
  }

  if (candidates.length === 1) {
    return { status: "matched", record: candidates[0], stages };
  }
  return { status: candidates.length === 0 ? "no_match" : "ambiguous", candidates, stages };
}

function toReconciledMetadata(record: CanonicalRecord): ReconciledMetadata {
  return {
    paperId: record.paperId,
    paperName: record.name,
    paperTypeId: record.paperTypeId,
    meetingType: record.meetingType,
    meetingNumber: record.meetingNumber,
    meetingId: record.meetingId,
    meetingName: record.meetingName,
    meetingYear: record.meetingYear,
    parties: record.parties.join(", "),
  };
}

export function reconcileArtifact(
  filename: string,
  corpus: readonly CanonicalRecord[],
  logger?: Logger,
): ReconciledRecord {
  const artifact = parseArtifactFilename(filename);
  if (!artifact) {
    logger?.warn("reconcile_unparseable_filename", { filename });
    return { filename, status: "unresolved", reason: "unparseable_filename", candidates: 0, needsReview: true };
  }

  const result = matchArtifact(artifact, corpus);
  logger?.debug("reconcile_stages", { filename, stages: result.stages });
  if (result.status === "matched") {
    return { ...artifact, ...toReconciledMetadata(result.record), status: "matched", candidates: 1, needsReview: false };
  }

  logger?.warn("reconcile_unresolved", {
    filename,
    reason: result.status,
    candidates: result.candidates.length,
    paperIds: result.candidates.map((record) => record.paperId),
  });
  return {
    ...artifact,
    status: "unresolved",
    reason: result.status,
    candidates: result.candidates.length,
    needsReview: true,
  };
}

export function reconcileArtifacts(
  filenames: readonly string[],
  corpus: readonly CanonicalRecord[],
  logger?: Logger,
): ReconciledRecord[] {
  return filenames.map((filename) => reconcileArtifact(filename, corpus, logger));
}

/** Raw documents in `dir`: every file whose name follows the document naming scheme. */
export async function listRawDocuments(dir: string): Promise<string[]> {
  return (await listFileNames(dir)).filter((filename) => parseArtifactFilename(filename) !== undefined);
}

export interface ReconcileSummary {
  artifacts: number;
  matched: number;
  unresolved: number;
  ambiguous: number;
  outputPath: string;
}

export const RECONCILED_FILENAME = "reconciled_documents.jsonl";

export async function writeReconciledTable(
  records: readonly ReconciledRecord[],
  outputDir: string,
  deps: { logger: Logger; metrics: MetricsRegistry },
): Promise<ReconcileSummary> {
  const outputPath = path.join(outputDir, RECONCILED_FILENAME);
  await writeJsonLinesAtomic(outputPath, [...records]);

  const matched = records.filter((record) => record.status === "matched").length;
  const ambiguous = records.filter((record) => record.status === "unresolved" && record.reason === "ambiguous").length;
  deps.metrics.incrementCounter("artifacts_matched", matched);
  deps.metrics.incrementCounter("artifacts_unresolved", records.length - matched);

  const summary = { artifacts: records.length, matched, unresolved: records.length - matched, ambiguous, outputPath };
  deps.logger.info("reconcile_table_written", { ...summary });
  return summary;
}
