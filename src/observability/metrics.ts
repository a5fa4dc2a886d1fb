import { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export class MetricsRegistry {
  private readonly counters: Record<MetricCounterName, number> = {
    pages_crawled: 0,
    records_extracted: 0,
    collections_crawled: 0,
    toc_downloads_ok: 0,
    toc_downloads_failed: 0,
    toc_rows_written: 0,
  };

  private readonly timings: Record<MetricTimerName, number[]> = {
    page_fetch_ms: [],
    toc_download_ms: [],
  };

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters[name] += value;
  }

  getCounter(name: MetricCounterName): number {
    return this.counters[name];
  }

  getCounters(): Record<MetricCounterName, number> {
    return { ...this.counters };
  }

  /** Returns a stop function that records and returns the elapsed milliseconds. */
  startTimer(name: MetricTimerName, clock: () => number = Date.now): () => number {
    const startedAt = clock();
    return () => {
      const elapsedMs = clock() - startedAt;
      this.timings[name].push(elapsedMs);
      return elapsedMs;
    };
  }

  getTimerSummaries(): Record<MetricTimerName, TimerSummary> {
    return {
      page_fetch_ms: summarizeTimings(this.timings.page_fetch_ms),
      toc_download_ms: summarizeTimings(this.timings.toc_download_ms),
    };
  }

  printSummary(runId: string, write: (line: string) => void = console.log): void {
    const summary = {
      ts: new Date().toISOString(),
      level: "info",
      msg: "metrics_summary",
      runId,
      counters: this.getCounters(),
      timers: this.getTimerSummaries(),
    };
    write(JSON.stringify(summary, null, 2));
  }
}

export function summarizeTimings(values: readonly number[]): TimerSummary {
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
