export { ScenarioEngine } from './ScenarioEngine';
export type { ScenarioEngineOptions } from './ScenarioEngine';
export {
  QueryEvaluator,
  parseQuery,
  evaluateParsedQuery,
  quantileMultiplier,
  toPrometheusResponse,
} from './QueryEvaluator';
export type {
  MetricSource,
  ParsedQuery,
  PrometheusResponse,
  QueryError,
  QueryErrorKind,
  QueryResult,
} from './QueryEvaluator';
export {
  EXPOSITION_CONTENT_TYPE,
  HISTOGRAM_BOUNDARIES,
  histogramBuckets,
  renderExposition,
} from './ExpositionFormatter';
export {
  calculateErrorRate,
  calculateLatency,
  calculateUp,
  getScenario,
  isScenarioName,
  listScenarios,
  listScenarioSummaries,
  validScenarioNames,
} from './scenarios';
export { formatDuration } from './formatDuration';
export { formatFixed } from './formatNumber';
export * from './types';
