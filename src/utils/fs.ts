import fs from "node:fs";
import path from "node:path";

export const PART_SUFFIX = ".part";

/** Fails fast when a directory the command writes into is missing. */
export async function assertDirectory(dirPath: string, label: string): Promise<string> {
  const absolute = path.resolve(dirPath);
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(absolute);
  } catch {
    throw new Error(`${label} directory not found: ${absolute}`);
  }
  if (!stats.isDirectory()) {
    throw new Error(`${label} path is not a directory: ${absolute}`);
  }
  return absolute;
}

/**
 * Writes to `<file>.part` and renames into place, so a reader never sees a
 * half-written file under the final name.
 */
export async function writeFileAtomic(filePath: string, data: string | Uint8Array): Promise<void> {
  const tempPath = `${filePath}${PART_SUFFIX}`;
  try {
    await fs.promises.writeFile(tempPath, data, { flag: "w" });
    await fs.promises.rename(tempPath, filePath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

export async function writeJsonAtomic(filePath: string, data: unknown): Promise<void> {
  await writeFileAtomic(filePath, JSON.stringify(data, null, 2));
}

export async function writeJsonLinesAtomic(filePath: string, records: unknown[]): Promise<void> {
  const content = records.map((record) => JSON.stringify(record)).join("\n");
  await writeFileAtomic(filePath, content + (records.length ? "\n" : ""));
}

export async function readJson(filePath: string): Promise<unknown> {
  const content = await fs.promises.readFile(filePath, "utf8");
  return JSON.parse(content);
}

export async function listFileNames(dirPath: string): Promise<string[]> {
  const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && !entry.name.endsWith(PART_SUFFIX))
    .map((entry) => entry.name)
    .sort();
}
