import { describe, it, expect } from 'vitest';
import { EvaluationError, UndefinedFluentError } from '../lib/errors.js';
import { Rational } from '../lib/rational.js';
import { StateEvaluator, Valuation } from '../engine/evaluation/index.js';
import {
  and,
  boolFluent,
  div,
  eq,
  fluent,
  fluentKey,
  implies,
  lt,
  minus,
  not,
  num,
  or,
  param,
  plus,
  problem,
  realFluent,
  times,
} from '../types/index.js';
import type { FluentDeclaration, FluentKey, Value } from '../types/index.js';
import { r } from './fixtures.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeEvaluator(
  fluents: FluentDeclaration[],
  initialValues: [FluentKey, Value][] = [],
): { evaluator: StateEvaluator; valuation: Valuation } {
  const evaluator = new StateEvaluator(problem('eval', { fluents, initialValues }));
  return { evaluator, valuation: evaluator.initialValuation() };
}

// ---------------------------------------------------------------------------
// Valuation
// ---------------------------------------------------------------------------

describe('Valuation', () => {
  it('layers updates without touching the parent', () => {
    const base = new Valuation([[fluentKey('p'), true]]);
    const next = base.with(new Map([[fluentKey('q'), r(3)]]));
    expect(base.get(fluentKey('q'))).toBeUndefined();
    expect(next.get(fluentKey('p'))).toBe(true);
    expect(next.get(fluentKey('q'))?.toString()).toBe('3');
  });

  it('returns itself for an empty update', () => {
    const base = new Valuation();
    expect(base.with(new Map())).toBe(base);
  });

  it('keeps every value after many layers', () => {
    let valuation = new Valuation();
    for (let i = 0; i < 50; i++) {
      valuation = valuation.with(
        new Map<FluentKey, Value>([
          [fluentKey('count'), Rational.of(i)],
          [fluentKey(`seen${i}`), true],
        ]),
      );
    }
    const entries = valuation.entries();
    expect(entries.size).toBe(51);
    expect(entries.get(fluentKey('count'))?.toString()).toBe('49');
    expect(valuation.has(fluentKey('seen0'))).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// evaluate
// ---------------------------------------------------------------------------

describe('StateEvaluator.evaluate', () => {
  it('reads initial values and falls back to defaults', () => {
    const { evaluator, valuation } = makeEvaluator(
      [boolFluent('at', ['loc'], false), realFluent('fuel', [], 10)],
      [[fluentKey('at', ['home']), true]],
    );
    expect(evaluator.evaluate(fluent('at', 'home'), valuation)).toBe(true);
    expect(evaluator.evaluate(fluent('at', 'work'), valuation)).toBe(false);
    expect(evaluator.evaluateNumber(fluent('fuel'), valuation).toString()).toBe('10');
  });

  it('throws for a fluent without value or default', () => {
    const { evaluator, valuation } = makeEvaluator([boolFluent('p')]);
    expect(() => evaluator.evaluate(fluent('p'), valuation)).toThrow(UndefinedFluentError);
  });

  it('evaluates boolean connectives', () => {
    const { evaluator, valuation } = makeEvaluator(
      [boolFluent('p', [], true), boolFluent('q', [], false)],
    );
    const p = fluent('p');
    const q = fluent('q');
    expect(evaluator.evaluateBool(and(p, not(q)), valuation)).toBe(true);
    expect(evaluator.evaluateBool(or(q, not(p)), valuation)).toBe(false);
    expect(evaluator.evaluateBool(implies(q, p), valuation)).toBe(true);
    expect(evaluator.evaluateBool(implies(p, q), valuation)).toBe(false);
    expect(evaluator.evaluateBool(and(), valuation)).toBe(true);
    expect(evaluator.evaluateBool(or(), valuation)).toBe(false);
  });

  it('evaluates exact arithmetic', () => {
    const { evaluator, valuation } = makeEvaluator([realFluent('x', [], '1/3')]);
    const x = fluent('x');
    expect(evaluator.evaluateNumber(plus(x, x, x), valuation).toString()).toBe('1');
    expect(evaluator.evaluateNumber(minus(x), valuation).toString()).toBe('-1/3');
    expect(evaluator.evaluateNumber(minus(1, x), valuation).toString()).toBe('2/3');
    expect(evaluator.evaluateNumber(times(x, 6), valuation).toString()).toBe('2');
    expect(evaluator.evaluateNumber(div(1, x), valuation).toString()).toBe('3');
    expect(evaluator.evaluateNumber(plus(), valuation).toString()).toBe('0');
    expect(evaluator.evaluateNumber(times(), valuation).toString()).toBe('1');
    expect(evaluator.evaluateBool(lt(x, '0.34'), valuation)).toBe(true);
  });

  it('compares values of every type', () => {
    const { evaluator, valuation } = makeEvaluator([]);
    expect(evaluator.evaluateBool(eq(num('0.5'), '1/2'), valuation)).toBe(true);
    expect(evaluator.evaluateBool(eq(true, false), valuation)).toBe(false);
  });

  it('binds parameters to objects', () => {
    const { evaluator, valuation } = makeEvaluator(
      [boolFluent('at', ['loc'], false)],
      [[fluentKey('at', ['dock']), true]],
    );
    const bindings = new Map([['l', 'dock']]);
    expect(evaluator.evaluateBool(fluent('at', param('l')), valuation, bindings)).toBe(true);
    expect(() => evaluator.evaluate(param('missing'), valuation, bindings)).toThrow(EvaluationError);
  });

  it('rejects values of the wrong type', () => {
    const { evaluator, valuation } = makeEvaluator([realFluent('x', [], 1)]);
    expect(() => evaluator.evaluateBool(fluent('x'), valuation)).toThrow(EvaluationError);
    expect(() => evaluator.evaluateNumber(eq(1, 1), valuation)).toThrow(EvaluationError);
    expect(() => evaluator.evaluateNumber(div(1, 0), valuation)).toThrow(EvaluationError);
  });
});

// ---------------------------------------------------------------------------
// Grounding and literals
// ---------------------------------------------------------------------------

describe('StateEvaluator grounding', () => {
  it('grounds nested fluent arguments', () => {
    const { evaluator, valuation } = makeEvaluator(
      [boolFluent('at', ['loc'], false)],
      [[fluentKey('pos', ['robot']), 'dock']],
    );
    const nested = fluent('at', fluent('pos', 'robot'));
    expect(evaluator.groundFluent(nested, valuation)).toBe('at(dock)');
    expect([...evaluator.readFluents(nested, valuation)]).toEqual(['pos(robot)', 'at(dock)']);
  });

  it('extracts the literals of a conjunction', () => {
    const { evaluator, valuation } = makeEvaluator([]);
    const literals = evaluator.literals(
      and(fluent('p'), not(fluent('q', 'a')), or(fluent('r'), fluent('s')), lt(1, 2)),
      valuation,
    );
    expect(literals).toEqual([
      { fluent: 'p', positive: true },
      { fluent: 'q(a)', positive: false },
    ]);
  });
});
