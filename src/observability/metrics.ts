import type { MetricCounterName, MetricTimerName } from "./types";

interface HistogramSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      listing_pages_fetched: this.getCounter("listing_pages_fetched"),
      records_discovered: this.getCounter("records_discovered"),
      documents_written: this.getCounter("documents_written"),
      documents_skipped: this.getCounter("documents_skipped"),
      documents_not_found: this.getCounter("documents_not_found"),
      documents_timed_out: this.getCounter("documents_timed_out"),
      records_failed: this.getCounter("records_failed"),
      measures_scraped: this.getCounter("measures_scraped"),
      measures_missing: this.getCounter("measures_missing"),
      measures_failed: this.getCounter("measures_failed"),
      artifacts_matched: this.getCounter("artifacts_matched"),
      artifacts_unresolved: this.getCounter("artifacts_unresolved"),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, HistogramSummary> {
    return {
      listing_page_ms: this.summarize("listing_page_ms"),
      document_fetch_ms: this.summarize("document_fetch_ms"),
      measure_fetch_ms: this.summarize("measure_fetch_ms"),
    };
  }

  printSummary(): void {
    console.log(
      JSON.stringify(
        {
          ts: new Date().toISOString(),
          level: "info",
          msg: "metrics_summary",
          counters: this.getCounters(),
          timers: this.getTimerSummaries(),
        },
        null,
        2,
      ),
    );
  }

  private summarize(name: MetricTimerName): HistogramSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }

    let total = 0;
    let min = values[0];
    let max = values[0];
    for (const value of values) {
      total += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    return {
      count: values.length,
      min,
      max,
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}
