import type { Rational } from '../../lib/rational.js';
import type { ActionInstance } from './action-instance.js';

/** Totally ordered, untimed sequence of instantaneous actions. */
export interface SequentialPlan {
  readonly kind: 'sequential';
  readonly actions: readonly ActionInstance[];
}

export interface TimeTriggeredStep {
  readonly start: Rational;
  readonly instance: ActionInstance;
  /** Required for durative actions, absent for instantaneous ones. */
  readonly duration?: Rational;
}

export interface TimeTriggeredPlan {
  readonly kind: 'time-triggered';
  readonly steps: readonly TimeTriggeredStep[];
}
