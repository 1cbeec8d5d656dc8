/**
 * Timing: where a condition or effect sits on an activity's (or the plan's)
 * own timeline.
 */

import type { Rational } from '../lib/rational.js';
import type { Expression } from './expression.js';

/**
 * `start`/`end` are relative to an action instance; `global-start`/`global-end`
 * are relative to the plan and only appear in problem-level timed goals and
 * timed effects. `end` and `global-end` count the delay backwards.
 */
export type TimingAnchor = 'start' | 'end' | 'global-start' | 'global-end';

export interface Timing {
  readonly anchor: TimingAnchor;
  readonly delay: Rational;
}

export interface TimeInterval {
  readonly lower: Timing;
  readonly upper: Timing;
  readonly leftOpen: boolean;
  readonly rightOpen: boolean;
}

/**
 * Admissible durations of a durative action. Bounds are evaluated in the state
 * where the action starts.
 */
export interface DurationBounds {
  readonly lower: Expression;
  readonly upper: Expression;
  readonly lowerOpen: boolean;
  readonly upperOpen: boolean;
}
