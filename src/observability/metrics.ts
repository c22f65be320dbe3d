import { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export interface MetricsSnapshot {
  counters: Record<MetricCounterName, number>;
  timers: Record<MetricTimerName, TimerSummary>;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, this.getCounter(name) + value);
  }

  getCounter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
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

  snapshot(): MetricsSnapshot {
    return {
      counters: {
        catalog_files: this.getCounter("catalog_files"),
        files_matched: this.getCounter("files_matched"),
        downloads_ok: this.getCounter("downloads_ok"),
        downloads_skipped: this.getCounter("downloads_skipped"),
        checksum_mismatches: this.getCounter("checksum_mismatches"),
        checksums_unavailable: this.getCounter("checksums_unavailable"),
        checksum_errors: this.getCounter("checksum_errors"),
        entries_pruned: this.getCounter("entries_pruned"),
        prune_failures: this.getCounter("prune_failures"),
      },
      timers: {
        catalog_fetch_ms: summarize(this.timers.get("catalog_fetch_ms") ?? []),
        download_ms: summarize(this.timers.get("download_ms") ?? []),
        checksum_ms: summarize(this.timers.get("checksum_ms") ?? []),
      },
    };
  }

  printSummary(): void {
    console.log(
      JSON.stringify(
        {
          ts: new Date().toISOString(),
          level: "info",
          msg: "metrics_summary",
          ...this.snapshot(),
        },
        null,
        2,
      ),
    );
  }
}

function summarize(values: number[]): TimerSummary {
  if (values.length === 0) {
    return { count: 0, min: 0, max: 0, avg: 0 };
  }

  const total = values.reduce((sum, value) => sum + value, 0);
  return {
    count: values.length,
    min: Math.min(...values),
    max: Math.max(...values),
    avg: Number((total / values.length).toFixed(2)),
  };
}
