/**
 * In-process counters and duration samples, served by GET /api/metrics.
 * Counter names may carry labels, rendered as name{key="value"}.
 */

export const TournamentMetric = {
  CREATED: 'tournaments_created_total',
  RESULTS_RECORDED: 'tournament_results_recorded_total',
  BYES_RECORDED: 'tournament_byes_recorded_total',
  ROUNDS_ADVANCED: 'tournament_rounds_advanced_total',
  PLAYOFFS_STARTED: 'playoffs_started_total',
  PLAYOFFS_SKIPPED: 'playoffs_skipped_total',
  PLAYOFF_RESULTS_RECORDED: 'playoff_results_recorded_total',
  CHAMPIONS_DECIDED: 'playoff_champions_total',
} as const;

export type MetricLabels = Record<string, string | number>;

const MAX_SAMPLES = 1000;

function metricKey(name: string, labels?: MetricLabels): string {
  if (!labels) return name;
  const parts = Object.keys(labels)
    .sort()
    .map((key) => `${key}="${labels[key]}"`);
  return parts.length === 0 ? name : `${name}{${parts.join(',')}}`;
}

function percentile(sorted: readonly number[], fraction: number): number {
  return sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * fraction))] ?? 0;
}

class MetricsService {
  private counters = new Map<string, number>();
  private samples = new Map<string, number[]>();

  increment(name: string, labels?: MetricLabels, value = 1): void {
    const key = metricKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  count(name: string, labels?: MetricLabels): number {
    return this.counters.get(metricKey(name, labels)) ?? 0;
  }

  recordDuration(name: string, ms: number): void {
    const values = this.samples.get(name) ?? [];
    values.push(ms);
    if (values.length > MAX_SAMPLES) values.shift();
    this.samples.set(name, values);
  }

  getMetrics(): Record<string, number> {
    const result: Record<string, number> = Object.fromEntries(this.counters);

    for (const [name, values] of this.samples) {
      if (values.length === 0) continue;
      const sorted = [...values].sort((a, b) => a - b);
      result[`${name}_count`] = sorted.length;
      result[`${name}_p50`] = percentile(sorted, 0.5);
      result[`${name}_p95`] = percentile(sorted, 0.95);
    }
    return result;
  }

  reset(): void {
    this.counters.clear();
    this.samples.clear();
  }
}

export const metrics = new MetricsService();
