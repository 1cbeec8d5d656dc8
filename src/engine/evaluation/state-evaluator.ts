import { EvaluationError, UndefinedFluentError } from '../../lib/errors.js';
import { Rational } from '../../lib/rational.js';
import { fluentKey } from '../../types/index.js';
import type { Expression, FluentExpression, FluentKey, Problem, Value } from '../../types/index.js';
import { Valuation } from './valuation.js';

/** Parameter name → object name. */
export type Bindings = ReadonlyMap<string, string>;

export interface Literal {
  readonly fluent: FluentKey;
  readonly positive: boolean;
}

const NO_BINDINGS: Bindings = new Map();

export function valueEquals(a: Value, b: Value): boolean {
  if (a instanceof Rational && b instanceof Rational) return a.equals(b);
  return a === b;
}

export function formatValue(value: Value): string {
  return value instanceof Rational ? value.toString() : String(value);
}

/**
 * Evaluates model expressions in a valuation. Fluents without an assigned
 * value fall back to their declaration's default.
 */
export class StateEvaluator {
  private defaults: Map<string, Value>;
  private initialValues: ReadonlyMap<FluentKey, Value>;

  constructor(problem: Problem) {
    this.defaults = new Map();
    for (const decl of problem.fluents) {
      if (decl.defaultValue !== undefined) {
        this.defaults.set(decl.name, decl.defaultValue);
      }
    }
    this.initialValues = problem.initialValues;
  }

  initialValuation(): Valuation {
    return new Valuation(this.initialValues);
  }

  evaluate(expr: Expression, valuation: Valuation, bindings: Bindings = NO_BINDINGS): Value {
    switch (expr.kind) {
      case 'bool':
        return expr.value;
      case 'number':
        return expr.value;
      case 'object':
        return expr.name;
      case 'param': {
        const bound = bindings.get(expr.name);
        if (bound === undefined) {
          throw new EvaluationError(`Parameter '${expr.name}' is not bound`, { parameter: expr.name });
        }
        return bound;
      }
      case 'fluent':
        return this.lookup(this.groundFluent(expr, valuation, bindings), expr.name, valuation);
      case 'not':
        return !this.evaluateBool(expr.arg, valuation, bindings);
      case 'and':
        return expr.args.every((a) => this.evaluateBool(a, valuation, bindings));
      case 'or':
        return expr.args.some((a) => this.evaluateBool(a, valuation, bindings));
      case 'implies':
        return (
          !this.evaluateBool(expr.left, valuation, bindings) ||
          this.evaluateBool(expr.right, valuation, bindings)
        );
      case 'equals':
        return valueEquals(
          this.evaluate(expr.left, valuation, bindings),
          this.evaluate(expr.right, valuation, bindings),
        );
      case 'lt':
        return this.evaluateNumber(expr.left, valuation, bindings).lt(
          this.evaluateNumber(expr.right, valuation, bindings),
        );
      case 'le':
        return this.evaluateNumber(expr.left, valuation, bindings).le(
          this.evaluateNumber(expr.right, valuation, bindings),
        );
      case 'plus':
      case 'minus':
      case 'times':
      case 'div': {
        const op = expr.kind;
        const values = expr.args.map((a) => this.evaluateNumber(a, valuation, bindings));
        const [first, ...rest] = values;
        if (first === undefined) {
          return op === 'times' ? Rational.ONE : Rational.ZERO;
        }
        if (op === 'minus' && rest.length === 0) return first.neg();
        return rest.reduce((acc, v) => {
          switch (op) {
            case 'plus':
              return acc.add(v);
            case 'minus':
              return acc.sub(v);
            case 'times':
              return acc.mul(v);
            case 'div':
              return acc.div(v);
          }
        }, first);
      }
    }
  }

  evaluateBool(expr: Expression, valuation: Valuation, bindings: Bindings = NO_BINDINGS): boolean {
    const value = this.evaluate(expr, valuation, bindings);
    if (typeof value !== 'boolean') {
      throw new EvaluationError(`Expected a boolean, got '${formatValue(value)}'`, { kind: expr.kind });
    }
    return value;
  }

  evaluateNumber(expr: Expression, valuation: Valuation, bindings: Bindings = NO_BINDINGS): Rational {
    const value = this.evaluate(expr, valuation, bindings);
    if (!(value instanceof Rational)) {
      throw new EvaluationError(`Expected a number, got '${String(value)}'`, { kind: expr.kind });
    }
    return value;
  }

  /** Grounds a fluent application: every argument must evaluate to an object. */
  groundFluent(expr: FluentExpression, valuation: Valuation, bindings: Bindings = NO_BINDINGS): FluentKey {
    const args = expr.args.map((arg) => {
      const value = this.evaluate(arg, valuation, bindings);
      if (typeof value !== 'string') {
        throw new EvaluationError(`Argument of '${expr.name}' is not an object: '${formatValue(value)}'`);
      }
      return value;
    });
    return fluentKey(expr.name, args);
  }

  /** Grounded fluents the expression reads, nested fluent arguments included. */
  readFluents(
    expr: Expression,
    valuation: Valuation,
    bindings: Bindings = NO_BINDINGS,
    into: Set<FluentKey> = new Set(),
  ): Set<FluentKey> {
    switch (expr.kind) {
      case 'bool':
      case 'number':
      case 'object':
      case 'param':
        break;
      case 'fluent':
        for (const arg of expr.args) this.readFluents(arg, valuation, bindings, into);
        into.add(this.groundFluent(expr, valuation, bindings));
        break;
      case 'not':
        this.readFluents(expr.arg, valuation, bindings, into);
        break;
      case 'implies':
      case 'equals':
      case 'lt':
      case 'le':
        this.readFluents(expr.left, valuation, bindings, into);
        this.readFluents(expr.right, valuation, bindings, into);
        break;
      case 'and':
      case 'or':
      case 'plus':
      case 'minus':
      case 'times':
      case 'div':
        for (const arg of expr.args) this.readFluents(arg, valuation, bindings, into);
        break;
    }
    return into;
  }

  /**
   * Boolean literals asserted by the top-level conjunction of `expr`. Other
   * conjuncts (disjunctions, comparisons) contribute nothing.
   */
  literals(expr: Expression, valuation: Valuation, bindings: Bindings = NO_BINDINGS): Literal[] {
    switch (expr.kind) {
      case 'fluent':
        return [{ fluent: this.groundFluent(expr, valuation, bindings), positive: true }];
      case 'not':
        return expr.arg.kind === 'fluent'
          ? [{ fluent: this.groundFluent(expr.arg, valuation, bindings), positive: false }]
          : [];
      case 'and':
        return expr.args.flatMap((a) => this.literals(a, valuation, bindings));
      default:
        return [];
    }
  }

  private lookup(key: FluentKey, name: string, valuation: Valuation): Value {
    const value = valuation.get(key) ?? this.defaults.get(name);
    if (value === undefined) {
      throw new UndefinedFluentError(key);
    }
    return value;
  }
}
