export { TemporalPlanValidator, validate } from './temporal-plan-validator.js';
export { computeMetrics } from './metrics.js';
export type { MetricContext } from './metrics.js';
export type {
  Plan,
  ValidationStatus,
  Violation,
  ViolationKind,
  MetricValue,
  LogMessage,
  TraceEntry,
  ValidationResult,
  ValidatorOptions,
} from './types.js';
