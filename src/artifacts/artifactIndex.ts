import path from "node:path";
import { listFileNames } from "../utils/fs";

/** `exists`: already on disk; `in_flight`: another writer holds the claim. */
export type ClaimResult = "claimed" | "exists" | "in_flight";

/**
 * Tracks which output filenames already exist in one directory. The listing
 * is read once on {@link ArtifactIndex.open}; files written afterwards are
 * registered through {@link ArtifactIndex.commit}.
 *
 * `claim` reserves a filename for a single in-flight writer so that workers
 * sharing the index never fetch the same path twice.
 */
export class ArtifactIndex {
  readonly directory: string;
  private readonly existing: Set<string>;
  private readonly inFlight = new Set<string>();

  private constructor(directory: string, existing: Set<string>) {
    this.directory = directory;
    this.existing = existing;
  }

  static async open(directory: string): Promise<ArtifactIndex> {
    const absolute = path.resolve(directory);
    return new ArtifactIndex(absolute, new Set(await listFileNames(absolute)));
  }

  get size(): number {
    return this.existing.size;
  }

  has(filename: string): boolean {
    return this.existing.has(filename);
  }

  pathFor(filename: string): string {
    return path.join(this.directory, filename);
  }

  claim(filename: string, allowExisting = false): ClaimResult {
    if (this.inFlight.has(filename)) {
      return "in_flight";
    }
    if (!allowExisting && this.existing.has(filename)) {
      return "exists";
    }
    this.inFlight.add(filename);
    return "claimed";
  }

  commit(filename: string): void {
    this.inFlight.delete(filename);
    this.existing.add(filename);
  }

  release(filename: string): void {
    this.inFlight.delete(filename);
  }

  list(predicate?: (filename: string) => boolean): string[] {
    const names = [...this.existing].sort();
    return predicate ? names.filter(predicate) : names;
  }
}
