import path from "node:path";
import { listFileNames } from "../utils/fs";
import { formatFileTimestamp, parseFileTimestamp } from "../utils/time";

const MEASURE_FILENAME = /^(\d{4}-\d{2}-\d{2}-\d{2}-\d{2}-\d{2})_measure_(\d+)\.json$/;

export interface MeasureArtifactFile {
  filename: string;
  path: string;
  measureNumber: number;
  scrapedAt: Date;
}

export function measureArtifactFilename(measureNumber: number, date: Date): string {
  return `${formatFileTimestamp(date)}_measure_${measureNumber}.json`;
}

export function parseMeasureArtifactFilename(filename: string): { measureNumber: number; scrapedAt: Date } | undefined {
  const match = MEASURE_FILENAME.exec(filename);
  const scrapedAt = match ? parseFileTimestamp(match[1]) : undefined;
  if (!match || !scrapedAt) {
    return undefined;
  }
  return { measureNumber: Number.parseInt(match[2], 10), scrapedAt };
}

export async function listMeasureArtifacts(dir: string): Promise<MeasureArtifactFile[]> {
  const artifacts: MeasureArtifactFile[] = [];
  for (const filename of await listFileNames(dir)) {
    const parsed = parseMeasureArtifactFilename(filename);
    if (parsed) {
      artifacts.push({ filename, path: path.join(dir, filename), ...parsed });
    }
  }
  return artifacts;
}

/** One artifact per measure, preferring the most recent scrape. */
export function latestMeasureArtifacts(artifacts: MeasureArtifactFile[]): MeasureArtifactFile[] {
  const latest = new Map<number, MeasureArtifactFile>();
  for (const artifact of artifacts) {
    const current = latest.get(artifact.measureNumber);
    if (!current || artifact.scrapedAt.getTime() > current.scrapedAt.getTime()) {
      latest.set(artifact.measureNumber, artifact);
    }
  }
  return [...latest.values()].sort((a, b) => a.measureNumber - b.measureNumber);
}
