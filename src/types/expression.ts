/**
 * Expression: the condition, effect-value and metric language of the model.
 *
 * Expressions are lifted: they may mention action parameters, which are bound
 * to object names when an action instance is evaluated.
 */

import type { Rational } from '../lib/rational.js';

/** Object values are represented by the object's name. */
export type Value = boolean | Rational | string;

export interface BoolConstant {
  readonly kind: 'bool';
  readonly value: boolean;
}

export interface NumberConstant {
  readonly kind: 'number';
  readonly value: Rational;
}

export interface ObjectConstant {
  readonly kind: 'object';
  readonly name: string;
}

export interface ParameterRef {
  readonly kind: 'param';
  readonly name: string;
}

export interface FluentExpression {
  readonly kind: 'fluent';
  readonly name: string;
  readonly args: readonly Expression[];
}

export interface NotExpression {
  readonly kind: 'not';
  readonly arg: Expression;
}

export interface NaryBoolExpression {
  readonly kind: 'and' | 'or';
  readonly args: readonly Expression[];
}

export interface BinaryExpression {
  readonly kind: 'implies' | 'equals' | 'lt' | 'le';
  readonly left: Expression;
  readonly right: Expression;
}

export interface ArithmeticExpression {
  readonly kind: 'plus' | 'minus' | 'times' | 'div';
  readonly args: readonly Expression[];
}

export type Expression =
  | BoolConstant
  | NumberConstant
  | ObjectConstant
  | ParameterRef
  | FluentExpression
  | NotExpression
  | NaryBoolExpression
  | BinaryExpression
  | ArithmeticExpression;

export type ExpressionKind = Expression['kind'];
