import type { Rational } from '../../lib/rational.js';
import type {
  ContinuousEffect,
  Effect,
  Expression,
  SimulatedEffectDeclaration,
} from '../../types/index.js';
import type { Bindings } from '../evaluation/index.js';
import type { ActionInstance } from '../plans/index.js';

export type EventKind = 'start-action' | 'start-condition' | 'end-condition' | 'end-action';

/** Tie-break order of the events of one activity sharing an offset. */
export const EVENT_KIND_ORDER: Readonly<Record<EventKind, number>> = {
  'start-action': 0,
  'start-condition': 1,
  'end-condition': 2,
  'end-action': 3,
};

/**
 * One execution of an action instance, or of the plan itself (`instance`
 * undefined). The same instance scheduled twice yields two activities.
 */
export interface Activity {
  readonly id: number;
  readonly instance: ActionInstance | undefined;
  readonly label: string;
  readonly bindings: Bindings;
}

/**
 * Conditions sharing one interval of an activity, conjoined, with the
 * continuous effects declared over the same interval. Offsets are relative to
 * the activity's start, before any epsilon shift. `effects` and `simulated`
 * are the discrete effects at an intermediate instant; they only occur on a
 * closed point interval and are applied when it closes.
 */
export interface IntervalCondition {
  readonly activity: Activity;
  readonly condition: Expression;
  readonly lower: Rational;
  readonly upper: Rational;
  readonly leftOpen: boolean;
  readonly rightOpen: boolean;
  readonly continuousEffects: readonly ContinuousEffect[];
  readonly effects: readonly Effect[];
  readonly simulated: SimulatedEffectDeclaration | undefined;
  readonly label: string;
}

interface EventBase {
  readonly id: number;
  readonly activity: Activity;
  /**
   * Distance from the activity's start, or back from its end when
   * `fromEnd` is set (plan-level events anchored at global end).
   */
  readonly offset: Rational;
  readonly fromEnd: boolean;
  readonly label: string;
}

export interface StartActionEvent extends EventBase {
  readonly kind: 'start-action';
  readonly conditions: readonly Expression[];
  readonly effects: readonly Effect[];
  readonly simulated: SimulatedEffectDeclaration | undefined;
  readonly duration: Rational;
  /** The activity's other events, pinned relative to this one when it is applied. */
  readonly committed: readonly TemporalEvent[];
}

export interface EndActionEvent extends EventBase {
  readonly kind: 'end-action';
  readonly conditions: readonly Expression[];
  readonly effects: readonly Effect[];
  readonly simulated: SimulatedEffectDeclaration | undefined;
}

export interface StartConditionEvent extends EventBase {
  readonly kind: 'start-condition';
  readonly interval: IntervalCondition;
}

export interface EndConditionEvent extends EventBase {
  readonly kind: 'end-condition';
  readonly interval: IntervalCondition;
}

export type TemporalEvent = StartActionEvent | EndActionEvent | StartConditionEvent | EndConditionEvent;

export function compareEvents(a: TemporalEvent, b: TemporalEvent): number {
  return a.offset.compare(b.offset) || EVENT_KIND_ORDER[a.kind] - EVENT_KIND_ORDER[b.kind] || a.id - b.id;
}

/** Discrete effects an event applies, evaluated in its pre-state. */
export function discreteEffects(event: TemporalEvent): {
  effects: readonly Effect[];
  simulated: SimulatedEffectDeclaration | undefined;
} {
  switch (event.kind) {
    case 'start-action':
    case 'end-action':
      return { effects: event.effects, simulated: event.simulated };
    case 'end-condition':
      return { effects: event.interval.effects, simulated: event.interval.simulated };
    case 'start-condition':
      return { effects: [], simulated: undefined };
  }
}
