import type { Logger } from 'pino';
import defaultLogger from '../../utils/logger';
import { Clock, systemClock } from '../../utils/clock';
import { formatDuration } from './formatDuration';
import {
  calculateErrorRate,
  calculateLatency,
  calculateUp,
  getScenario,
  isScenarioName,
  listScenarioSummaries,
} from './scenarios';
import { MetricValues, Scenario, ScenarioStatus, ScenarioSummary } from './types';

export interface ScenarioEngineOptions {
  initialScenario: string;
  clock?: Clock;
  logger?: Logger;
}

/**
 * The active scenario and the moment it became active. Always replaced as a
 * whole; never mutated in place.
 */
interface EngineState {
  readonly scenario: Scenario;
  readonly startTime: Date;
}

function computeMetrics(state: EngineState, now: Date): MetricValues {
  const elapsedMs = now.getTime() - state.startTime.getTime();
  return {
    errorRate: calculateErrorRate(state.scenario, elapsedMs),
    latency: calculateLatency(state.scenario, elapsedMs),
    up: calculateUp(state.scenario),
  };
}

/**
 * Owns the (scenario, startTime) pair and derives live metric values from it.
 *
 * Every operation is synchronous, and each one reads or replaces `state`
 * exactly once, so a caller can never observe a scenario paired with another
 * scenario's start time.
 */
export class ScenarioEngine {
  private state: EngineState;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: ScenarioEngineOptions) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;
    this.state = this.freshState(options.initialScenario);

    this.logger.info(
      { scenario: this.state.scenario.name, description: this.state.scenario.description },
      'metrics engine initialized'
    );
  }

  private freshState(name: string): EngineState {
    if (!isScenarioName(name)) {
      this.logger.warn({ requested: name }, 'unknown scenario, falling back to healthy');
    }
    return Object.freeze({ scenario: getScenario(name), startTime: this.clock.now() });
  }

  getCurrentMetrics(): MetricValues {
    return computeMetrics(this.state, this.clock.now());
  }

  getStatus(): ScenarioStatus {
    const state = this.state;
    const now = this.clock.now();

    return {
      name: state.scenario.name,
      description: state.scenario.description,
      startTime: state.startTime.toISOString(),
      elapsed: formatDuration(now.getTime() - state.startTime.getTime()),
      metrics: computeMetrics(state, now),
    };
  }

  /**
   * Switch scenarios and restart the progression timer. Unknown names select
   * the healthy scenario; callers wanting strict validation check
   * `isScenarioName` first.
   */
  setScenario(name: string): void {
    this.state = this.freshState(name);

    this.logger.info(
      { scenario: this.state.scenario.name, description: this.state.scenario.description },
      'scenario changed'
    );
  }

  resetTimer(): void {
    const { scenario } = this.state;
    this.state = Object.freeze({ scenario, startTime: this.clock.now() });

    this.logger.info({ scenario: scenario.name }, 'scenario timer reset');
  }

  listScenarios(): ScenarioSummary[] {
    return listScenarioSummaries();
  }

  /**
   * Nothing runs in the background, so this only records the stop.
   */
  shutdown(): void {
    this.logger.info('metrics engine stopped');
  }
}
