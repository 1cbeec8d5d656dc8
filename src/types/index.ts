/**
 * Planning model type system.
 *
 * Read-only inputs of the temporal engine: expressions, timings, actions and
 * problems. Builders live in ./builders.ts.
 */

// Branded IDs
export type { FluentKey } from './branded.js';

// Expressions
export type {
  Value,
  Expression,
  ExpressionKind,
  BoolConstant,
  NumberConstant,
  ObjectConstant,
  ParameterRef,
  FluentExpression,
  NotExpression,
  NaryBoolExpression,
  BinaryExpression,
  ArithmeticExpression,
} from './expression.js';

// Temporal
export type { Timing, TimingAnchor, TimeInterval, DurationBounds } from './timing.js';

// Actions
export type {
  Parameter,
  Effect,
  EffectKind,
  TimedCondition,
  TimedEffect,
  ContinuousEffect,
  SimulatedEffectDeclaration,
  InstantaneousAction,
  DurativeAction,
  Action,
} from './action.js';

// Problem
export type {
  FluentType,
  FluentDeclaration,
  ObjectDeclaration,
  QualityMetric,
  TrajectoryConstraint,
  Problem,
} from './problem.js';

export * from './builders.js';
