import { Rational, type RationalLike } from '../../lib/rational.js';
import type { ActionInstance } from './action-instance.js';
import type { SequentialPlan, TimeTriggeredPlan } from './types.js';

export function sequentialPlan(actions: readonly ActionInstance[]): SequentialPlan {
  return { kind: 'sequential', actions: [...actions] };
}

export type TimeTriggeredEntry = readonly [RationalLike, ActionInstance, RationalLike?];

/**
 * `timeTriggeredPlan([[0, a], [0.5, b, 5]])`
 */
export function timeTriggeredPlan(entries: readonly TimeTriggeredEntry[]): TimeTriggeredPlan {
  return {
    kind: 'time-triggered',
    steps: entries.map(([start, instance, duration]) => ({
      start: Rational.from(start),
      instance,
      duration: duration === undefined ? undefined : Rational.from(duration),
    })),
  };
}
