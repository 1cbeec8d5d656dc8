import { z } from 'zod';
import { getEngineConfig } from '../../lib/config/engine.js';
import { ValidationError } from '../../lib/errors.js';
import { childLogger, type Logger } from '../../lib/logger.js';
import { Rational } from '../../lib/rational.js';
import type { Expression, FluentKey, Problem, TrajectoryConstraint } from '../../types/index.js';
import type { Valuation } from '../evaluation/index.js';
import type { PartialOrderPlan, SequentialPlan, TimeTriggeredPlan } from '../plans/index.js';
import {
  EVENT_KIND_ORDER,
  TemporalSimulator,
  discreteEffects,
  type CombinedState,
  type SimulatedEffectProvider,
  type TemporalEvent,
} from '../simulator/index.js';
import type { STNPlan } from '../stn-plan/index.js';
import { computeMetrics } from './metrics.js';
import type {
  LogMessage,
  Plan,
  TraceEntry,
  ValidationResult,
  ValidatorOptions,
  Violation,
} from './types.js';

const rationalOption = z
  .union([z.custom<Rational>((v) => v instanceof Rational), z.string(), z.number(), z.bigint()])
  .transform((value, ctx) => {
    let parsed: Rational;
    try {
      parsed = Rational.from(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${String(value)}' is not a rational number` });
      return z.NEVER;
    }
    if (parsed.sign() <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be strictly positive' });
      return z.NEVER;
    }
    return parsed;
  });

const optionsSchema = z
  .object({
    epsilon: rationalOption.optional(),
    linearizationLimit: z.number().int().positive().optional(),
    simulatedEffects: z
      .custom<SimulatedEffectProvider>(
        (v) => typeof v === 'object' && v !== null && 'values' in v && typeof v.values === 'function',
        { message: 'must implement values()' },
      )
      .optional(),
    logger: z
      .custom<Logger>((v) => typeof v === 'object' && v !== null && 'info' in v && 'debug' in v, {
        message: 'must be a pino logger',
      })
      .optional(),
  })
  .strict();

interface ScheduledEvent {
  readonly event: TemporalEvent;
  readonly time: Rational;
  /** Position of the step in the plan; timed effects come first, timed goals last. */
  readonly order: number;
}

const TIMED_EFFECT_ORDER = -1;
const TIMED_GOAL_ORDER = Number.MAX_SAFE_INTEGER;

function compareScheduled(a: ScheduledEvent, b: ScheduledEvent): number {
  return (
    a.time.compare(b.time) ||
    Number(a.order === TIMED_GOAL_ORDER) - Number(b.order === TIMED_GOAL_ORDER) ||
    EVENT_KIND_ORDER[a.event.kind] - EVENT_KIND_ORDER[b.event.kind] ||
    a.order - b.order ||
    a.event.id - b.event.id
  );
}

/** Tracks `always`, `sometime` and `at-most-once` over the visited states. */
class TrajectoryMonitor {
  private seen: boolean[];
  private holding: boolean[];
  private occurrences: number[];

  constructor(
    private readonly constraints: readonly TrajectoryConstraint[],
    private readonly holds: (condition: Expression, valuation: Valuation) => boolean,
  ) {
    this.seen = constraints.map(() => false);
    this.holding = constraints.map(() => false);
    this.occurrences = constraints.map(() => 0);
  }

  visit(valuation: Valuation, time: Rational): Violation | undefined {
    for (const [i, constraint] of this.constraints.entries()) {
      const value = this.holds(constraint.condition, valuation);
      switch (constraint.kind) {
        case 'always':
          if (!value) {
            return { kind: 'trajectory-constraint', constraint, time, message: `'always' constraint violated at ${time}` };
          }
          break;
        case 'sometime':
          if (value) this.seen[i] = true;
          break;
        case 'at-most-once':
          if (value && !this.holding[i]) this.occurrences[i]++;
          this.holding[i] = value;
          if (this.occurrences[i] > 1) {
            return {
              kind: 'trajectory-constraint',
              constraint,
              time,
              message: `'at-most-once' constraint became true a second time at ${time}`,
            };
          }
          break;
      }
    }
    return undefined;
  }

  finish(): Violation | undefined {
    for (const [i, constraint] of this.constraints.entries()) {
      if (constraint.kind === 'sometime' && !this.seen[i]) {
        return {
          kind: 'trajectory-constraint',
          constraint,
          time: undefined,
          message: `'sometime' constraint never held`,
        };
      }
    }
    return undefined;
  }
}

/**
 * Validates plans of every kind against a problem by executing them on a
 * TemporalSimulator. Reports the first violation; infeasible plans are
 * results, not errors.
 */
export class TemporalPlanValidator {
  private epsilon: Rational | undefined;
  private linearizationLimit: number | undefined;
  private simulatedEffects: SimulatedEffectProvider | undefined;
  private logger: Logger;

  constructor(options: ValidatorOptions = {}) {
    const parsed = optionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new ValidationError('Invalid validator options', {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
    }
    this.epsilon = parsed.data.epsilon;
    this.linearizationLimit = parsed.data.linearizationLimit ?? getEngineConfig().linearizationLimit;
    this.simulatedEffects = parsed.data.simulatedEffects;
    this.logger = parsed.data.logger ?? childLogger('validator');
  }

  validate(problem: Problem, plan: Plan): ValidationResult {
    const result = this.dispatch(problem, plan);
    this.logger.info(
      { problem: problem.name, plan: plan.kind, status: result.status, violation: result.violation?.kind },
      'plan validated',
    );
    return result;
  }

  private dispatch(problem: Problem, plan: Plan): ValidationResult {
    switch (plan.kind) {
      case 'time-triggered':
        return this.validateTimeTriggered(problem, plan);
      case 'sequential':
        return this.validateSequential(problem, plan);
      case 'partial-order':
        return this.validatePartialOrder(problem, plan);
      case 'stn':
        return this.validateSTN(problem, plan);
    }
  }

  private validateSequential(problem: Problem, plan: SequentialPlan): ValidationResult {
    const durative = plan.actions.find((a) => a.action.kind === 'durative');
    if (durative) {
      throw new ValidationError(`Sequential plans cannot contain durative action '${durative.label}'`, {
        instance: durative.label,
      });
    }
    return this.validateTimeTriggered(problem, {
      kind: 'time-triggered',
      steps: plan.actions.map((instance, i) => ({ start: Rational.of(i), instance })),
    });
  }

  private validatePartialOrder(problem: Problem, plan: PartialOrderPlan): ValidationResult {
    let first: ValidationResult | undefined;
    let checked = 0;
    for (const linearization of plan.linearizations()) {
      if (this.linearizationLimit !== undefined && checked >= this.linearizationLimit) {
        break;
      }
      checked++;
      const result = this.validateSequential(problem, linearization);
      if (result.status === 'INVALID') {
        const order = linearization.actions.map((a) => a.label).join(', ');
        return {
          ...result,
          logs: [...result.logs, { level: 'error', message: `Linearization #${checked} is invalid: ${order}` }],
        };
      }
      first ??= result;
    }
    const summary: LogMessage = { level: 'info', message: `Checked ${checked} linearization(s)` };
    const result = first ?? this.validateSequential(problem, plan.toSequentialPlan());
    return { ...result, logs: [...result.logs, summary] };
  }

  private validateSTN(problem: Problem, plan: STNPlan): ValidationResult {
    const network = plan.toNetwork();
    if (!network.check()) {
      const pair = network.witness();
      const witness: readonly [string, string] | undefined = pair ? [pair[0].label, pair[1].label] : undefined;
      return {
        status: 'INVALID',
        violation: {
          kind: 'temporal-inconsistency',
          witness,
          message: witness
            ? `The STN plan is inconsistent (between ${witness[0]} and ${witness[1]})`
            : 'The STN plan is inconsistent',
        },
        unsatisfiedGoals: [],
        metricValues: [],
        logs: [{ level: 'error', message: 'Temporal constraints of the plan have no solution' }],
        trace: [],
      };
    }
    return this.validateTimeTriggered(problem, plan.toTimeTriggeredPlan());
  }

  private validateTimeTriggered(problem: Problem, plan: TimeTriggeredPlan): ValidationResult {
    const simulator = new TemporalSimulator(problem, {
      epsilon: this.epsilon,
      simulatedEffects: this.simulatedEffects,
      logger: this.logger,
    });
    const { evaluator } = simulator;

    const scheduled: ScheduledEvent[] = [];
    plan.steps.forEach((step, order) => {
      for (const event of simulator.getInstanceEvents(step.instance, step.duration)) {
        scheduled.push({ event, time: step.start.add(event.offset), order });
      }
    });
    for (const timed of simulator.getTimedEffectEvents()) {
      for (const event of timed.events) {
        scheduled.push({ event, time: timed.time.add(event.offset), order: TIMED_EFFECT_ORDER });
      }
    }
    // the plan lasts until its last event, timed goals anchored at start included
    const makespan = simulator
      .getPlanConditionEvents()
      .filter((event) => !event.fromEnd)
      .reduce(
        (max, event) => Rational.max(max, event.offset),
        scheduled.reduce((max, s) => Rational.max(max, s.time), Rational.ZERO),
      );
    for (const event of simulator.getPlanConditionEvents()) {
      const time = event.fromEnd ? makespan.sub(event.offset) : event.offset;
      scheduled.push({ event, time, order: TIMED_GOAL_ORDER });
    }
    scheduled.sort(compareScheduled);

    const logs: LogMessage[] = [];
    const trace: TraceEntry[] = [];
    const monitor = new TrajectoryMonitor(problem.trajectoryConstraints, (condition, valuation) =>
      evaluator.evaluateBool(condition, valuation),
    );

    let state = simulator.initialState();
    let violation = monitor.visit(state.valuation, Rational.ZERO);

    for (let i = 0; i < scheduled.length && !violation; ) {
      const time = scheduled[i].time;
      let j = i;
      while (j < scheduled.length && scheduled[j].time.equals(time)) j++;
      const group = scheduled.slice(i, j);
      i = j;

      violation = this.simultaneousWrites(simulator, state, group, time);
      for (const item of group) {
        if (violation) break;
        const result = simulator.tryApply(item.event, state, { at: item.time });
        if (!result.ok) {
          violation = {
            kind: 'inapplicable-event',
            time: item.time,
            reason: result.reason,
            message: `${item.event.label} at ${item.time}: ${result.reason.message}`,
          };
          break;
        }
        state = result.state;
        trace.push({ time: item.time, event: item.event.label });
        this.logger.debug({ time: item.time.toString(), event: item.event.label }, 'event applied');
        violation = monitor.visit(state.valuation, item.time);
      }
    }

    if (!violation) {
      violation = monitor.finish();
    }
    if (!violation) {
      const result = simulator.tryApply(simulator.getPlanEndEvent(), state, { at: makespan });
      if (result.ok) {
        state = result.state;
        trace.push({ time: makespan, event: simulator.getPlanEndEvent().label });
      } else {
        violation = {
          kind: 'inapplicable-event',
          time: makespan,
          reason: result.reason,
          message: `Plan cannot end at ${makespan}: ${result.reason.message}`,
        };
      }
    }

    const unsatisfiedGoals = simulator.getUnsatisfiedGoals(state);
    if (!violation && unsatisfiedGoals.length > 0) {
      violation = {
        kind: 'unsatisfied-goals',
        goals: unsatisfiedGoals,
        message: `${unsatisfiedGoals.length} goal(s) not satisfied at the end of the plan`,
      };
    }

    if (violation) {
      logs.push({ level: 'error', message: violation.message });
      return { status: 'INVALID', violation, unsatisfiedGoals, metricValues: [], logs, trace };
    }

    logs.push({ level: 'info', message: `Plan is valid with makespan ${makespan}` });
    const metricValues = computeMetrics(problem, {
      evaluator,
      initial: simulator.initialState().valuation,
      final: state.valuation,
      makespan,
      steps: plan.steps,
    });
    return { status: 'VALID', unsatisfiedGoals, metricValues, logs, trace };
  }

  /**
   * Two activities writing the same fluent at the same instant. Only effects
   * whose condition holds in the state before the instant count.
   */
  private simultaneousWrites(
    simulator: TemporalSimulator,
    state: CombinedState,
    group: readonly ScheduledEvent[],
    time: Rational,
  ): Violation | undefined {
    const { evaluator } = simulator;
    const writers = new Map<FluentKey, ScheduledEvent>();
    for (const item of group) {
      const { event } = item;
      const { bindings } = event.activity;
      const keys = new Set<FluentKey>();
      const { effects, simulated } = discreteEffects(event);
      for (const effect of effects) {
        if (effect.condition && !evaluator.evaluateBool(effect.condition, state.valuation, bindings)) continue;
        keys.add(evaluator.groundFluent(effect.fluent, state.valuation, bindings));
      }
      for (const f of simulated?.fluents ?? []) {
        keys.add(evaluator.groundFluent(f, state.valuation, bindings));
      }
      if (event.kind === 'end-condition') {
        for (const ce of event.interval.continuousEffects) {
          keys.add(evaluator.groundFluent(ce.fluent, state.valuation, bindings));
        }
      }

      for (const key of keys) {
        const other = writers.get(key);
        if (other && other.event.activity !== event.activity) {
          return {
            kind: 'conflicting-effects',
            time,
            events: [other.event.label, event.label],
            fluents: [key],
            message: `${other.event.label} and ${event.label} both write ${key} at ${time}`,
          };
        }
        writers.set(key, item);
      }
    }
    return undefined;
  }
}

export function validate(problem: Problem, plan: Plan, options: ValidatorOptions = {}): ValidationResult {
  return new TemporalPlanValidator(options).validate(problem, plan);
}
