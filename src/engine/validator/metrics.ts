import { Rational } from '../../lib/rational.js';
import type { Problem, QualityMetric } from '../../types/index.js';
import type { StateEvaluator, Valuation } from '../evaluation/index.js';
import type { TimeTriggeredStep } from '../plans/index.js';
import type { MetricValue } from './types.js';

export interface MetricContext {
  readonly evaluator: StateEvaluator;
  readonly initial: Valuation;
  readonly final: Valuation;
  readonly makespan: Rational;
  readonly steps: readonly TimeTriggeredStep[];
}

function metricValue(metric: QualityMetric, ctx: MetricContext): Rational {
  switch (metric.kind) {
    case 'makespan':
      return ctx.makespan;
    case 'plan-length':
      return Rational.of(ctx.steps.length);
    case 'action-costs':
      // costs are read in the initial state
      return ctx.steps.reduce((total, step) => {
        const cost = metric.costs.get(step.instance.action.name) ?? metric.defaultCost;
        if (cost === undefined) return total;
        return total.add(ctx.evaluator.evaluateNumber(cost, ctx.initial, step.instance.bindings));
      }, Rational.ZERO);
    case 'minimize-expression':
    case 'maximize-expression':
      return ctx.evaluator.evaluateNumber(metric.expression, ctx.final);
    case 'oversubscription':
      return metric.goals.reduce(
        (total, { goal, gain }) => (ctx.evaluator.evaluateBool(goal, ctx.final) ? total.add(gain) : total),
        Rational.ZERO,
      );
  }
}

export function computeMetrics(problem: Problem, ctx: MetricContext): MetricValue[] {
  return problem.qualityMetrics.map((metric) => ({ metric, value: metricValue(metric, ctx) }));
}
