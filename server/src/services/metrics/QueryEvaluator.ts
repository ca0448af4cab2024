import { Clock, systemClock } from '../../utils/clock';
import { formatFixed } from './formatNumber';
import {
  BASELINE_REQUESTS_PER_SECOND,
  ERROR_METRIC,
  JOB_LABEL,
  LATENCY_METRIC,
  MetricValues,
  UP_METRIC,
} from './types';

export type QueryErrorKind = 'bad_query_syntax' | 'unknown_metric' | 'invalid_quantile';

export interface QueryError {
  kind: QueryErrorKind;
  message: string;
}

export type ParsedQuery =
  | { kind: 'rate'; metric: string }
  | { kind: 'histogram_quantile'; quantile: number }
  | { kind: 'direct'; metric: typeof ERROR_METRIC | typeof LATENCY_METRIC | typeof UP_METRIC };

export type ParseResult = { ok: true; query: ParsedQuery } | { ok: false; error: QueryError };

export type QueryResult =
  | { ok: true; value: number; timestamp: number }
  | { ok: false; error: QueryError };

/** Anything that can supply current metric values, normally the ScenarioEngine. */
export interface MetricSource {
  getCurrentMetrics(): MetricValues;
}

const RATE_PATTERN = /rate\(([^[]+)\[/;
const HISTOGRAM_PATTERN = /histogram_quantile\(([\d.]+),/;

function fail(kind: QueryErrorKind, message: string): { ok: false; error: QueryError } {
  return { ok: false, error: { kind, message } };
}

function parseRate(query: string): ParseResult {
  const match = RATE_PATTERN.exec(query);
  if (!match) {
    return fail('bad_query_syntax', 'invalid rate query format');
  }
  return { ok: true, query: { kind: 'rate', metric: match[1].trim() } };
}

function parseHistogramQuantile(query: string): ParseResult {
  const match = HISTOGRAM_PATTERN.exec(query);
  if (!match) {
    return fail('bad_query_syntax', 'invalid histogram_quantile format');
  }

  const quantile = Number(match[1]);
  if (Number.isNaN(quantile)) {
    return fail('invalid_quantile', `invalid quantile value: ${match[1]}`);
  }
  if (quantile < 0 || quantile > 1) {
    return fail('invalid_quantile', `quantile must be between 0 and 1, got: ${quantile}`);
  }

  return { ok: true, query: { kind: 'histogram_quantile', quantile } };
}

function parseDirect(query: string): ParseResult {
  if (query.includes(ERROR_METRIC)) {
    return { ok: true, query: { kind: 'direct', metric: ERROR_METRIC } };
  }
  if (query.includes(LATENCY_METRIC)) {
    return { ok: true, query: { kind: 'direct', metric: LATENCY_METRIC } };
  }
  if (query.includes(UP_METRIC)) {
    return { ok: true, query: { kind: 'direct', metric: UP_METRIC } };
  }
  return fail('unknown_metric', `unsupported metric query: ${query}`);
}

/**
 * Classify a query. Function forms are matched by prefix before falling back
 * to bare metric-name containment.
 */
export function parseQuery(rawQuery: string): ParseResult {
  const query = rawQuery.trim();

  if (query.startsWith('rate(')) {
    return parseRate(query);
  }
  if (query.startsWith('histogram_quantile(')) {
    return parseHistogramQuantile(query);
  }
  return parseDirect(query);
}

export function errorsPerSecond(metrics: MetricValues): number {
  return (metrics.errorRate / 100) * BASELINE_REQUESTS_PER_SECOND;
}

/**
 * Multiplier applied to mean latency to estimate a quantile.
 * p50 ≈ 0.8x, p95 ≈ 1.5x, p99 and above 2.5x, linear in between.
 */
export function quantileMultiplier(quantile: number): number {
  if (quantile >= 0.99) {
    return 2.5;
  }
  if (quantile >= 0.95) {
    return 1.5 + ((quantile - 0.95) / (0.99 - 0.95)) * (2.5 - 1.5);
  }
  if (quantile >= 0.5) {
    return 0.8 + ((quantile - 0.5) / (0.95 - 0.5)) * (1.5 - 0.8);
  }
  return (quantile / 0.5) * 0.8;
}

export function evaluateParsedQuery(
  query: ParsedQuery,
  metrics: MetricValues
): { ok: true; value: number } | { ok: false; error: QueryError } {
  switch (query.kind) {
    case 'rate':
      if (query.metric.includes(ERROR_METRIC)) {
        return { ok: true, value: errorsPerSecond(metrics) };
      }
      // Not a real rate of change: the mock reports mean latency in seconds.
      if (query.metric.includes(LATENCY_METRIC)) {
        return { ok: true, value: metrics.latency / 1000 };
      }
      return fail('unknown_metric', `unknown metric in rate query: ${query.metric}`);

    case 'histogram_quantile':
      return { ok: true, value: (metrics.latency / 1000) * quantileMultiplier(query.quantile) };

    case 'direct':
      if (query.metric === ERROR_METRIC) {
        return { ok: true, value: errorsPerSecond(metrics) };
      }
      if (query.metric === LATENCY_METRIC) {
        return { ok: true, value: metrics.latency / 1000 };
      }
      return { ok: true, value: metrics.up };
  }
}

export class QueryEvaluator {
  constructor(
    private readonly source: MetricSource,
    private readonly clock: Clock = systemClock
  ) {}

  evaluate(query: string): QueryResult {
    const parsed = parseQuery(query);
    if (!parsed.ok) {
      return parsed;
    }

    const result = evaluateParsedQuery(parsed.query, this.source.getCurrentMetrics());
    if (!result.ok) {
      return result;
    }

    return {
      ok: true,
      value: result.value,
      timestamp: Math.floor(this.clock.now().getTime() / 1000),
    };
  }
}

export interface PrometheusSample {
  metric: Record<string, string>;
  value: [number, string];
}

export type PrometheusResponse =
  | {
      status: 'success';
      data: { resultType: 'vector'; result: PrometheusSample[] };
    }
  | {
      status: 'error';
      errorType: 'bad_data';
      errorKind?: QueryErrorKind;
      error: string;
    };

/**
 * Shape a result as the `/api/v1/query` payload. Sample values are strings,
 * as the emulated API serializes them.
 */
export function toPrometheusResponse(result: QueryResult): PrometheusResponse {
  if (!result.ok) {
    return {
      status: 'error',
      errorType: 'bad_data',
      errorKind: result.error.kind,
      error: result.error.message,
    };
  }

  return {
    status: 'success',
    data: {
      resultType: 'vector',
      result: [
        {
          metric: { job: JOB_LABEL },
          value: [result.timestamp, formatFixed(result.value, 6)],
        },
      ],
    },
  };
}
