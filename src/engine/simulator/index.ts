export { TemporalSimulator, InapplicableEventError } from './temporal-simulator.js';
export type {
  SimulatorOptions,
  SimulatedEffectProvider,
  SimulatedEffectRequest,
  Inapplicability,
  InapplicabilityKind,
  ApplyResult,
  ApplyOptions,
  TimedEffectActivity,
} from './temporal-simulator.js';
export { EVENT_KIND_ORDER, compareEvents, discreteEffects } from './events.js';
export type {
  Activity,
  EventKind,
  IntervalCondition,
  TemporalEvent,
  StartActionEvent,
  EndActionEvent,
  StartConditionEvent,
  EndConditionEvent,
} from './events.js';
export { history, isRunning } from './combined-state.js';
export type { CombinedState, AppliedEvent } from './combined-state.js';
