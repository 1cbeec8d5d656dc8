/**
 * Actions: the read-only declarative model the simulator executes.
 */

import type { Expression, FluentExpression } from './expression.js';
import type { DurationBounds, TimeInterval, Timing } from './timing.js';

export interface Parameter {
  readonly name: string;
  readonly type: string;
}

export type EffectKind = 'assign' | 'increase' | 'decrease';

export interface Effect {
  readonly kind: EffectKind;
  readonly fluent: FluentExpression;
  readonly value: Expression;
  /** Conditional effects only fire when this holds in the pre-state. */
  readonly condition?: Expression;
}

export interface TimedCondition {
  readonly interval: TimeInterval;
  readonly condition: Expression;
}

export interface TimedEffect {
  readonly timing: Timing;
  readonly effect: Effect;
}

/**
 * A numeric fluent that changes at `rate` per time unit over `interval`.
 * The accumulated change is applied when the interval closes.
 */
export interface ContinuousEffect {
  readonly kind: 'increase' | 'decrease';
  readonly interval: TimeInterval;
  readonly fluent: FluentExpression;
  readonly rate: Expression;
}

/**
 * Fluents whose new values are computed outside the model, by the
 * SimulatedEffectProvider handed to the simulator.
 */
export interface SimulatedEffectDeclaration {
  readonly timing: Timing;
  readonly fluents: readonly FluentExpression[];
}

export interface InstantaneousAction {
  readonly kind: 'instantaneous';
  readonly name: string;
  readonly parameters: readonly Parameter[];
  readonly preconditions: readonly Expression[];
  readonly effects: readonly Effect[];
  readonly simulatedEffect?: SimulatedEffectDeclaration;
}

export interface DurativeAction {
  readonly kind: 'durative';
  readonly name: string;
  readonly parameters: readonly Parameter[];
  readonly duration: DurationBounds;
  readonly conditions: readonly TimedCondition[];
  readonly effects: readonly TimedEffect[];
  readonly continuousEffects: readonly ContinuousEffect[];
  readonly simulatedEffects: readonly SimulatedEffectDeclaration[];
}

export type Action = InstantaneousAction | DurativeAction;
