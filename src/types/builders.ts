/**
 * Builders for the model types. The collaborators that parse domain files
 * produce the same shapes; these helpers keep hand-written problems short.
 */

import { Rational, type RationalLike } from '../lib/rational.js';
import type {
  Action,
  ContinuousEffect,
  DurativeAction,
  Effect,
  InstantaneousAction,
  Parameter,
  SimulatedEffectDeclaration,
  TimedCondition,
  TimedEffect,
} from './action.js';
import type { FluentKey } from './branded.js';
import type { Expression, FluentExpression, Value } from './expression.js';
import type {
  FluentDeclaration,
  ObjectDeclaration,
  Problem,
  QualityMetric,
  TrajectoryConstraint,
} from './problem.js';
import type { DurationBounds, TimeInterval, Timing } from './timing.js';

// ---------------------------------------------------------------------------
// Keys
// ---------------------------------------------------------------------------

export function fluentKey(name: string, args: readonly string[] = []): FluentKey {
  return (args.length === 0 ? name : `${name}(${args.join(', ')})`) as FluentKey;
}

// ---------------------------------------------------------------------------
// Expressions
// ---------------------------------------------------------------------------

export const TRUE: Expression = { kind: 'bool', value: true };
export const FALSE: Expression = { kind: 'bool', value: false };

/** Numbers and booleans are lifted to constants. */
type Operand = Expression | RationalLike | boolean;

function operand(value: Operand): Expression {
  if (typeof value === 'boolean') return { kind: 'bool', value };
  if (typeof value === 'object' && !(value instanceof Rational)) return value;
  return { kind: 'number', value: Rational.from(value) };
}

export function num(value: RationalLike): Expression {
  return { kind: 'number', value: Rational.from(value) };
}

export function obj(name: string): Expression {
  return { kind: 'object', name };
}

export function param(name: string): Expression {
  return { kind: 'param', name };
}

/**
 * Fluent application. String arguments are object constants; pass `param('x')`
 * to refer to an action parameter.
 */
export function fluent(name: string, ...args: (Expression | string)[]): FluentExpression {
  return {
    kind: 'fluent',
    name,
    args: args.map((a) => (typeof a === 'string' ? obj(a) : a)),
  };
}

export function not(arg: Expression): Expression {
  return { kind: 'not', arg };
}

export function and(...args: Expression[]): Expression {
  return { kind: 'and', args };
}

export function or(...args: Expression[]): Expression {
  return { kind: 'or', args };
}

export function implies(left: Expression, right: Expression): Expression {
  return { kind: 'implies', left, right };
}

export function eq(left: Operand, right: Operand): Expression {
  return { kind: 'equals', left: operand(left), right: operand(right) };
}

export function lt(left: Operand, right: Operand): Expression {
  return { kind: 'lt', left: operand(left), right: operand(right) };
}

export function le(left: Operand, right: Operand): Expression {
  return { kind: 'le', left: operand(left), right: operand(right) };
}

export function gt(left: Operand, right: Operand): Expression {
  return lt(right, left);
}

export function ge(left: Operand, right: Operand): Expression {
  return le(right, left);
}

export function plus(...args: Operand[]): Expression {
  return { kind: 'plus', args: args.map(operand) };
}

export function minus(...args: Operand[]): Expression {
  return { kind: 'minus', args: args.map(operand) };
}

export function times(...args: Operand[]): Expression {
  return { kind: 'times', args: args.map(operand) };
}

export function div(...args: Operand[]): Expression {
  return { kind: 'div', args: args.map(operand) };
}

// ---------------------------------------------------------------------------
// Timings
// ---------------------------------------------------------------------------

export function atStart(delay: RationalLike = 0): Timing {
  return { anchor: 'start', delay: Rational.from(delay) };
}

export function atEnd(delay: RationalLike = 0): Timing {
  return { anchor: 'end', delay: Rational.from(delay) };
}

export function globalStart(delay: RationalLike = 0): Timing {
  return { anchor: 'global-start', delay: Rational.from(delay) };
}

export function globalEnd(delay: RationalLike = 0): Timing {
  return { anchor: 'global-end', delay: Rational.from(delay) };
}

export function closedInterval(lower: Timing, upper: Timing): TimeInterval {
  return { lower, upper, leftOpen: false, rightOpen: false };
}

export function openInterval(lower: Timing, upper: Timing): TimeInterval {
  return { lower, upper, leftOpen: true, rightOpen: true };
}

export function leftOpenInterval(lower: Timing, upper: Timing): TimeInterval {
  return { lower, upper, leftOpen: true, rightOpen: false };
}

export function rightOpenInterval(lower: Timing, upper: Timing): TimeInterval {
  return { lower, upper, leftOpen: false, rightOpen: true };
}

export function pointInterval(timing: Timing): TimeInterval {
  return closedInterval(timing, timing);
}

// ---------------------------------------------------------------------------
// Effects and conditions
// ---------------------------------------------------------------------------

/** A string value that does not look like a number names an object. */
export function assign(target: FluentExpression, value: Operand, condition?: Expression): Effect {
  const v = typeof value === 'string' && !/^[-+\d./]/.test(value) ? obj(value) : operand(value);
  return { kind: 'assign', fluent: target, value: v, condition };
}

export function increase(target: FluentExpression, value: Operand, condition?: Expression): Effect {
  return { kind: 'increase', fluent: target, value: operand(value), condition };
}

export function decrease(target: FluentExpression, value: Operand, condition?: Expression): Effect {
  return { kind: 'decrease', fluent: target, value: operand(value), condition };
}

export function condition(interval: TimeInterval, expression: Expression): TimedCondition {
  return { interval, condition: expression };
}

export function timedEffect(timing: Timing, effect: Effect): TimedEffect {
  return { timing, effect };
}

export function continuousEffect(
  kind: ContinuousEffect['kind'],
  interval: TimeInterval,
  target: FluentExpression,
  rate: Operand,
): ContinuousEffect {
  return { kind, interval, fluent: target, rate: operand(rate) };
}

// ---------------------------------------------------------------------------
// Actions and problems
// ---------------------------------------------------------------------------

export function fixedDuration(value: RationalLike): DurationBounds {
  const bound = num(value);
  return { lower: bound, upper: bound, lowerOpen: false, upperOpen: false };
}

export function durationBetween(
  lower: Operand,
  upper: Operand,
  { lowerOpen = false, upperOpen = false }: { lowerOpen?: boolean; upperOpen?: boolean } = {},
): DurationBounds {
  return { lower: operand(lower), upper: operand(upper), lowerOpen, upperOpen };
}

export function instantaneousAction(
  name: string,
  init: {
    parameters?: Parameter[];
    preconditions?: Expression[];
    effects?: Effect[];
    simulatedEffect?: SimulatedEffectDeclaration;
  } = {},
): InstantaneousAction {
  return {
    kind: 'instantaneous',
    name,
    parameters: init.parameters ?? [],
    preconditions: init.preconditions ?? [],
    effects: init.effects ?? [],
    simulatedEffect: init.simulatedEffect,
  };
}

export function durativeAction(
  name: string,
  init: {
    duration: DurationBounds;
    parameters?: Parameter[];
    conditions?: TimedCondition[];
    effects?: TimedEffect[];
    continuousEffects?: ContinuousEffect[];
    simulatedEffects?: SimulatedEffectDeclaration[];
  },
): DurativeAction {
  return {
    kind: 'durative',
    name,
    parameters: init.parameters ?? [],
    duration: init.duration,
    conditions: init.conditions ?? [],
    effects: init.effects ?? [],
    continuousEffects: init.continuousEffects ?? [],
    simulatedEffects: init.simulatedEffects ?? [],
  };
}

export function problem(
  name: string,
  init: {
    fluents?: FluentDeclaration[];
    objects?: ObjectDeclaration[];
    actions?: Action[];
    initialValues?: Iterable<readonly [FluentKey, Value]>;
    goals?: Expression[];
    timedGoals?: TimedCondition[];
    timedEffects?: TimedEffect[];
    trajectoryConstraints?: TrajectoryConstraint[];
    qualityMetrics?: QualityMetric[];
  } = {},
): Problem {
  return {
    name,
    fluents: init.fluents ?? [],
    objects: init.objects ?? [],
    actions: init.actions ?? [],
    initialValues: new Map(init.initialValues ?? []),
    goals: init.goals ?? [],
    timedGoals: init.timedGoals ?? [],
    timedEffects: init.timedEffects ?? [],
    trajectoryConstraints: init.trajectoryConstraints ?? [],
    qualityMetrics: init.qualityMetrics ?? [],
  };
}

export function boolFluent(name: string, parameters: string[] = [], defaultValue?: boolean): FluentDeclaration {
  return { name, type: 'bool', parameters, defaultValue };
}

export function realFluent(name: string, parameters: string[] = [], defaultValue?: RationalLike): FluentDeclaration {
  return {
    name,
    type: 'real',
    parameters,
    defaultValue: defaultValue === undefined ? undefined : Rational.from(defaultValue),
  };
}
