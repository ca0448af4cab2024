import { formatFixed } from './formatNumber';
import { errorsPerSecond } from './QueryEvaluator';
import {
  BASELINE_REQUESTS_PER_SECOND,
  ERROR_METRIC,
  JOB_LABEL,
  LATENCY_METRIC,
  MetricValues,
  UP_METRIC,
} from './types';

export const EXPOSITION_CONTENT_TYPE = 'text/plain; version=0.0.4';

/** Upper bounds in seconds, ascending. */
export const HISTOGRAM_BOUNDARIES: readonly number[] = [
  0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10,
];

const MIN_LATENCY_SECONDS = 0.001;

export interface HistogramBucket {
  le: number;
  count: number;
}

export function latencySeconds(latencyMs: number): number {
  return Math.max(latencyMs / 1000, MIN_LATENCY_SECONDS);
}

/**
 * Synthesize cumulative bucket counts around a single latency value. Buckets at
 * or above the latency hold every request; below it the count follows a
 * square-root curve, which is non-decreasing in the boundary.
 */
export function histogramBuckets(latencyMs: number): HistogramBucket[] {
  const latency = latencySeconds(latencyMs);
  const total = BASELINE_REQUESTS_PER_SECOND;

  return HISTOGRAM_BOUNDARIES.map((le) => ({
    le,
    count: le >= latency ? total : total * Math.sqrt(le / latency),
  }));
}

function labels(extra = ''): string {
  return `{job="${JOB_LABEL}"${extra}}`;
}

/**
 * Render current values in the Prometheus text exposition format.
 */
export function renderExposition(metrics: MetricValues): string {
  const lines: string[] = [];

  lines.push(`# HELP ${ERROR_METRIC} Total number of HTTP request errors`);
  lines.push(`# TYPE ${ERROR_METRIC} counter`);
  lines.push(`${ERROR_METRIC}${labels()} ${formatFixed(errorsPerSecond(metrics), 2)}`);
  lines.push('');

  const latency = latencySeconds(metrics.latency);
  const total = BASELINE_REQUESTS_PER_SECOND;

  lines.push(`# HELP ${LATENCY_METRIC} HTTP request latency`);
  lines.push(`# TYPE ${LATENCY_METRIC} histogram`);
  for (const bucket of histogramBuckets(metrics.latency)) {
    lines.push(
      `${LATENCY_METRIC}_bucket${labels(`,le="${formatFixed(bucket.le, 3)}"`)} ${formatFixed(bucket.count, 0)}`
    );
  }
  lines.push(`${LATENCY_METRIC}_bucket${labels(',le="+Inf"')} ${formatFixed(total, 0)}`);
  lines.push(`${LATENCY_METRIC}_sum${labels()} ${formatFixed(latency * total, 3)}`);
  lines.push(`${LATENCY_METRIC}_count${labels()} ${formatFixed(total, 0)}`);
  lines.push('');

  lines.push(`# HELP ${UP_METRIC} Service is up`);
  lines.push(`# TYPE ${UP_METRIC} gauge`);
  lines.push(`${UP_METRIC}${labels()} ${formatFixed(metrics.up, 0)}`);

  return lines.join('\n') + '\n';
}
