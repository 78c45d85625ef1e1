import fs from "node:fs";
import path from "node:path";
import type { AppConfig } from "../config";
import type { MeasureCrawlResult, RecordFetchResult } from "../types";
import type { Sink } from "./types";

export class LocalJsonlSink implements Sink {
  private readonly fetchesPath: string;
  private readonly measuresPath: string;
  private readonly runId: string;

  constructor(config: AppConfig, runId: string) {
    const manifestsDir = path.resolve(config.outputDirs.manifests);
    fs.mkdirSync(manifestsDir, { recursive: true });
    this.fetchesPath = path.join(manifestsDir, "document_fetches.jsonl");
    this.measuresPath = path.join(manifestsDir, "measure_crawls.jsonl");
    this.runId = runId;
  }

  async publishFetchResults(results: RecordFetchResult[]): Promise<void> {
    await this.appendLines(
      this.fetchesPath,
      results.map((result) => ({
        runId: this.runId,
        ...result,
      })),
    );
  }

  async publishMeasureResults(results: MeasureCrawlResult[]): Promise<void> {
    await this.appendLines(
      this.measuresPath,
      results.map((result) => ({
        runId: this.runId,
        ...result,
      })),
    );
  }

  private async appendLines(filePath: string, records: unknown[]): Promise<void> {
    if (records.length === 0) {
      return;
    }

    const content = records.map((record) => JSON.stringify(record)).join("\n") + "\n";
    await fs.promises.appendFile(filePath, content, "utf-8");
  }
}
