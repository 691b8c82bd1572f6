/**
 * In-process metrics for tool calls
 * Call counts, errors, and latency histograms
 */

interface Histogram {
  values: number[];
  sum: number;
  count: number;
}

export interface HistogramSummary {
  count: number;
  sum: number;
  p50: number;
  p95: number;
  p99: number;
}

const MAX_SAMPLES = 1000;

export class MetricsRegistry {
  #counters: Map<string, number> = new Map();
  #histograms: Map<string, Histogram> = new Map();

  inc(name: string, labels: Record<string, string> = {}): void {
    const key = makeKey(name, labels);
    this.#counters.set(key, (this.#counters.get(key) ?? 0) + 1);
  }

  observe(name: string, value: number, labels: Record<string, string> = {}): void {
    const key = makeKey(name, labels);
    const histogram = this.#histograms.get(key) ?? { values: [], sum: 0, count: 0 };
    histogram.values.push(value);
    histogram.sum += value;
    histogram.count++;

    if (histogram.values.length > MAX_SAMPLES) {
      const removed = histogram.values.shift();
      if (removed !== undefined) {
        histogram.sum -= removed;
      }
      histogram.count = histogram.values.length;
    }

    this.#histograms.set(key, histogram);
  }

  getCounter(name: string, labels: Record<string, string> = {}): number {
    return this.#counters.get(makeKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels: Record<string, string> = {}): HistogramSummary | null {
    return summarize(this.#histograms.get(makeKey(name, labels)));
  }

  getAllMetrics(): {
    counters: Record<string, number>;
    histograms: Record<string, HistogramSummary>;
  } {
    const counters: Record<string, number> = Object.fromEntries(this.#counters);
    const histograms: Record<string, HistogramSummary> = {};
    for (const [key, histogram] of this.#histograms) {
      const summary = summarize(histogram);
      if (summary) {
        histograms[key] = summary;
      }
    }
    return { counters, histograms };
  }

  reset(): void {
    this.#counters.clear();
    this.#histograms.clear();
  }
}

function makeKey(name: string, labels: Record<string, string>): string {
  const labelStr = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${v}"`)
    .join(",");
  return labelStr ? `${name}{${labelStr}}` : name;
}

function summarize(histogram: Histogram | undefined): HistogramSummary | null {
  if (!histogram || histogram.values.length === 0) {
    return null;
  }

  const sorted = [...histogram.values].sort((a, b) => a - b);
  const percentile = (p: number): number => {
    const index = Math.ceil((p / 100) * sorted.length) - 1;
    return sorted[Math.max(0, index)] ?? 0;
  };

  return {
    count: histogram.count,
    sum: histogram.sum,
    p50: percentile(50),
    p95: percentile(95),
    p99: percentile(99),
  };
}

export const metrics = new MetricsRegistry();

export function recordToolExecution(
  tool: string,
  duration_ms: number,
  success: boolean,
  errCode?: string
): void {
  metrics.inc("ctxrules.tool.calls_total", { tool });

  if (!success) {
    metrics.inc("ctxrules.tool.errors_total", { tool, err_code: errCode ?? "UNKNOWN" });
  }

  metrics.observe("ctxrules.tool.latency_ms", duration_ms, { tool });
}
