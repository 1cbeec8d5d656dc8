import { pino } from 'pino';
import { Rational, type RationalLike } from '../lib/rational.js';
import {
  assign,
  atEnd,
  atStart,
  boolFluent,
  closedInterval,
  condition,
  durativeAction,
  fixedDuration,
  fluent,
  instantaneousAction,
  not,
  problem,
  timedEffect,
} from '../types/index.js';
import type { Action, DurativeAction, Problem } from '../types/index.js';

export const silentLogger = pino({ level: 'silent' });

export const r = (value: RationalLike): Rational => Rational.from(value);

export interface ResourceDomain {
  problem: Problem;
  /** Holds the resource for 6 time units. */
  hold: DurativeAction;
  /** Needs the resource over its whole 5-unit span, then marks `used`. */
  use: DurativeAction;
}

export function makeResourceDomain(): ResourceDomain {
  const holding = fluent('holding');
  const hold = durativeAction('hold', {
    duration: fixedDuration(6),
    effects: [timedEffect(atStart(), assign(holding, true)), timedEffect(atEnd(), assign(holding, false))],
  });
  const use = durativeAction('use', {
    duration: fixedDuration(5),
    conditions: [condition(closedInterval(atStart(), atEnd()), holding)],
    effects: [timedEffect(atEnd(), assign(fluent('used'), true))],
  });
  return {
    problem: problem('resource', {
      fluents: [boolFluent('holding', [], false), boolFluent('used', [], false)],
      actions: [hold, use],
      goals: [fluent('used')],
    }),
    hold,
    use,
  };
}

export interface SwitchDomain {
  problem: Problem;
  /** p := true */
  a: Action;
  /** requires p; q := true */
  b: Action;
  /** requires not p; r := true */
  c: Action;
}

export function makeSwitchDomain(goals = [fluent('q')]): SwitchDomain {
  const a = instantaneousAction('a', { effects: [assign(fluent('p'), true)] });
  const b = instantaneousAction('b', {
    preconditions: [fluent('p')],
    effects: [assign(fluent('q'), true)],
  });
  const c = instantaneousAction('c', {
    preconditions: [not(fluent('p'))],
    effects: [assign(fluent('r'), true)],
  });
  return {
    problem: problem('switch', {
      fluents: [boolFluent('p', [], false), boolFluent('q', [], false), boolFluent('r', [], false)],
      actions: [a, b, c],
      goals,
    }),
    a,
    b,
    c,
  };
}
