import type { FluentKey } from '../../types/index.js';
import type { Valuation } from '../evaluation/index.js';
import type { TemporalNetwork } from '../network/index.js';
import type { Activity, IntervalCondition, TemporalEvent } from './events.js';

/** The event that produced a state, with the fluents it read and wrote. */
export interface AppliedEvent {
  readonly event: TemporalEvent;
  readonly reads: ReadonlySet<FluentKey>;
  readonly writes: ReadonlySet<FluentKey>;
}

/**
 * Fluent valuation plus temporal bookkeeping. States are never modified after
 * creation; `TemporalSimulator.apply` returns a new one linked to its parent.
 */
export interface CombinedState {
  readonly valuation: Valuation;
  readonly network: TemporalNetwork<TemporalEvent>;
  /** Interval conditions opened and not yet closed, in opening order. */
  readonly openConditions: readonly IntervalCondition[];
  /** Remaining events of every running activity, in execution order. */
  readonly agenda: ReadonlyMap<Activity, readonly TemporalEvent[]>;
  readonly ended: ReadonlySet<Activity>;
  readonly lastEvent: AppliedEvent;
  readonly parent: CombinedState | undefined;
  /** Number of events applied since the initial state. */
  readonly depth: number;
}

export function isRunning(state: CombinedState, activity: Activity): boolean {
  return state.agenda.has(activity);
}

/** Applied events from the most recent back to plan start. */
export function* history(state: CombinedState): Generator<AppliedEvent> {
  for (let s: CombinedState | undefined = state; s; s = s.parent) {
    yield s.lastEvent;
  }
}
