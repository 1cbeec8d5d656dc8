/**
 * Problem: fluents, objects, actions, initial values and what a valid plan
 * must achieve.
 */

import type { Rational } from '../lib/rational.js';
import type { Action, TimedCondition, TimedEffect } from './action.js';
import type { FluentKey } from './branded.js';
import type { Expression, Value } from './expression.js';

export type FluentType = 'bool' | 'int' | 'real' | 'object';

export interface FluentDeclaration {
  readonly name: string;
  readonly type: FluentType;
  readonly parameters: readonly string[];
  /** Used for every grounding that has no explicit initial value. */
  readonly defaultValue?: Value;
}

export interface ObjectDeclaration {
  readonly name: string;
  readonly type: string;
}

export type QualityMetric =
  | { readonly kind: 'makespan' }
  | { readonly kind: 'plan-length' }
  | {
      readonly kind: 'action-costs';
      readonly costs: ReadonlyMap<string, Expression>;
      readonly defaultCost?: Expression;
    }
  | { readonly kind: 'minimize-expression'; readonly expression: Expression }
  | { readonly kind: 'maximize-expression'; readonly expression: Expression }
  | {
      readonly kind: 'oversubscription';
      readonly goals: readonly { readonly goal: Expression; readonly gain: Rational }[];
    };

/**
 * State-trajectory constraints over the sequence of states a plan visits.
 */
export type TrajectoryConstraint =
  | { readonly kind: 'always'; readonly condition: Expression }
  | { readonly kind: 'sometime'; readonly condition: Expression }
  | { readonly kind: 'at-most-once'; readonly condition: Expression };

export interface Problem {
  readonly name: string;
  readonly fluents: readonly FluentDeclaration[];
  readonly objects: readonly ObjectDeclaration[];
  readonly actions: readonly Action[];
  readonly initialValues: ReadonlyMap<FluentKey, Value>;
  readonly goals: readonly Expression[];
  /** Conditions over intervals anchored at `global-start` or `global-end`. */
  readonly timedGoals: readonly TimedCondition[];
  /** Effects at absolute times, anchored at `global-start`. */
  readonly timedEffects: readonly TimedEffect[];
  readonly trajectoryConstraints: readonly TrajectoryConstraint[];
  readonly qualityMetrics: readonly QualityMetric[];
}
