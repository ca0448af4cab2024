import { Scenario, ScenarioName, ScenarioSummary } from './types';

const MINUTE_MS = 60_000;

const SCENARIOS: readonly Scenario[] = Object.freeze([
  Object.freeze<Scenario>({
    name: 'healthy',
    description: 'Healthy application with minimal errors and low latency',
    errorRateStart: 0.1,
    errorRateEnd: 0.1,
    errorRateDurationMs: 0,
    latencyStart: 100,
    latencyEnd: 100,
    latencyDurationMs: 0,
    up: 1,
  }),
  Object.freeze<Scenario>({
    name: 'high-errors',
    description: 'High error rate that progressively increases',
    errorRateStart: 5,
    errorRateEnd: 25,
    errorRateDurationMs: 5 * MINUTE_MS,
    latencyStart: 200,
    latencyEnd: 200,
    latencyDurationMs: 0,
    up: 1,
  }),
  Object.freeze<Scenario>({
    name: 'latency-spike',
    description: 'Latency spike with gradual increase',
    errorRateStart: 0.5,
    errorRateEnd: 0.5,
    errorRateDurationMs: 0,
    latencyStart: 150,
    latencyEnd: 2000,
    latencyDurationMs: 3 * MINUTE_MS,
    up: 1,
  }),
  Object.freeze<Scenario>({
    name: 'gradual-degradation',
    description: 'Both errors and latency degrade over time',
    errorRateStart: 0.5,
    errorRateEnd: 15,
    errorRateDurationMs: 10 * MINUTE_MS,
    latencyStart: 120,
    latencyEnd: 800,
    latencyDurationMs: 10 * MINUTE_MS,
    up: 1,
  }),
]);

const DEFAULT_SCENARIO: ScenarioName = 'healthy';

export function isScenarioName(value: unknown): value is ScenarioName {
  return typeof value === 'string' && SCENARIOS.some((s) => s.name === value);
}

/**
 * Look up a scenario by name. Unknown names resolve to the healthy scenario.
 */
export function getScenario(name: string): Scenario {
  const found = SCENARIOS.find((s) => s.name === name);
  if (found) return found;
  return getScenario(DEFAULT_SCENARIO);
}

export function listScenarios(): readonly Scenario[] {
  return SCENARIOS;
}

export function listScenarioSummaries(): ScenarioSummary[] {
  return SCENARIOS.map(({ name, description }) => ({ name, description }));
}

export function validScenarioNames(): ScenarioName[] {
  return SCENARIOS.map((s) => s.name);
}

function progressOf(elapsedMs: number, durationMs: number): number {
  return Math.max(elapsedMs, 0) / durationMs;
}

/**
 * Linear ramp from start to end over the error-rate duration.
 */
export function calculateErrorRate(scenario: Scenario, elapsedMs: number): number {
  if (scenario.errorRateDurationMs === 0) {
    return scenario.errorRateStart;
  }

  const progress = progressOf(elapsedMs, scenario.errorRateDurationMs);
  if (progress >= 1) {
    return scenario.errorRateEnd;
  }

  return scenario.errorRateStart + (scenario.errorRateEnd - scenario.errorRateStart) * progress;
}

/**
 * Quadratic ramp: slow at first, accelerating towards the end value.
 */
export function calculateLatency(scenario: Scenario, elapsedMs: number): number {
  if (scenario.latencyDurationMs === 0) {
    return scenario.latencyStart;
  }

  const progress = progressOf(elapsedMs, scenario.latencyDurationMs);
  if (progress >= 1) {
    return scenario.latencyEnd;
  }

  return scenario.latencyStart + (scenario.latencyEnd - scenario.latencyStart) * progress ** 2;
}

export function calculateUp(scenario: Scenario): number {
  return scenario.up;
}
