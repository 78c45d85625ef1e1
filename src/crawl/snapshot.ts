import path from "node:path";
import { z } from "zod";
import type { ListingRecord } from "../types";
import { listFileNames, readJson, writeJsonAtomic } from "../utils/fs";
import { formatFileTimestamp, parseFileTimestamp } from "../utils/time";

const SNAPSHOT_FILENAME = /^(\d{4}-\d{2}-\d{2}-\d{2}-\d{2}-\d{2})_papers_metadata\.json$/;

const SnapshotSchema = z.array(z.record(z.string(), z.unknown()));

export interface SnapshotFile {
  filename: string;
  path: string;
  takenAt: Date;
}

export function snapshotFilename(date: Date): string {
  return `${formatFileTimestamp(date)}_papers_metadata.json`;
}

/** Recognized metadata snapshots in `dir`, oldest first. */
export async function listSnapshots(dir: string): Promise<SnapshotFile[]> {
  const snapshots: SnapshotFile[] = [];
  for (const filename of await listFileNames(dir)) {
    const match = SNAPSHOT_FILENAME.exec(filename);
    const takenAt = match ? parseFileTimestamp(match[1]) : undefined;
    if (takenAt) {
      snapshots.push({ filename, path: path.join(dir, filename), takenAt });
    }
  }
  return snapshots.sort((a, b) => a.takenAt.getTime() - b.takenAt.getTime());
}

export async function readSnapshot(filePath: string): Promise<ListingRecord[]> {
  const parsed = SnapshotSchema.safeParse(await readJson(filePath));
  if (!parsed.success) {
    throw new Error(`Metadata snapshot is not an array of records: ${filePath}`);
  }
  return parsed.data;
}

export async function readSnapshots(files: SnapshotFile[]): Promise<ListingRecord[]> {
  const records: ListingRecord[] = [];
  for (const file of files) {
    records.push(...(await readSnapshot(file.path)));
  }
  return records;
}

export async function writeSnapshot(dir: string, records: ListingRecord[], takenAt: Date): Promise<string> {
  const filePath = path.join(dir, snapshotFilename(takenAt));
  await writeJsonAtomic(filePath, records);
  return filePath;
}
