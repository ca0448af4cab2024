export type ScenarioName =
  | 'healthy'
  | 'high-errors'
  | 'latency-spike'
  | 'gradual-degradation';

/**
 * A named degradation profile. Rates are percentages (0-100), latencies are
 * milliseconds, durations are milliseconds. A duration of 0 holds the start value.
 */
export interface Scenario {
  readonly name: ScenarioName;
  readonly description: string;
  readonly errorRateStart: number;
  readonly errorRateEnd: number;
  readonly errorRateDurationMs: number;
  readonly latencyStart: number;
  readonly latencyEnd: number;
  readonly latencyDurationMs: number;
  readonly up: 0 | 1;
}

export interface MetricValues {
  /** Percentage, 0-100 */
  errorRate: number;
  /** Milliseconds */
  latency: number;
  up: number;
}

export interface ScenarioStatus {
  name: ScenarioName;
  description: string;
  /** ISO-8601 */
  startTime: string;
  elapsed: string;
  metrics: MetricValues;
}

export interface ScenarioSummary {
  name: ScenarioName;
  description: string;
}

export const ERROR_METRIC = 'http_requests_errors_total';
export const LATENCY_METRIC = 'http_request_duration_seconds';
export const UP_METRIC = 'up';

export const JOB_LABEL = 'demo-app';

/** Assumed traffic volume used to turn an error percentage into a per-second count. */
export const BASELINE_REQUESTS_PER_SECOND = 100;
