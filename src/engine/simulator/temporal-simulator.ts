import {
  ActivityEndedError,
  ActivityNotStartedError,
  EngineError,
  EvaluationError,
  ForeignEventError,
  MissingCapabilityError,
  UnknownActionError,
  UnsupportedTimingError,
} from '../../lib/errors.js';
import { getEngineConfig } from '../../lib/config/engine.js';
import { childLogger, type Logger } from '../../lib/logger.js';
import { Rational, type RationalLike } from '../../lib/rational.js';
import { instantaneousAction } from '../../types/index.js';
import type {
  Action,
  Effect,
  Expression,
  FluentKey,
  Problem,
  SimulatedEffectDeclaration,
  Value,
} from '../../types/index.js';
import { StateEvaluator, Valuation, formatValue, valueEquals } from '../evaluation/index.js';
import { TemporalNetwork } from '../network/index.js';
import { ActionInstance } from '../plans/index.js';
import { history, type AppliedEvent, type CombinedState } from './combined-state.js';
import { buildActivityEvents, buildPlanEvents, type BuildContext } from './event-builder.js';
import {
  discreteEffects,
  type Activity,
  type EndActionEvent,
  type IntervalCondition,
  type StartActionEvent,
  type TemporalEvent,
} from './events.js';

export interface SimulatedEffectRequest {
  readonly declaration: SimulatedEffectDeclaration;
  readonly activity: Activity;
  /** Pre-state of the event carrying the simulated effect. */
  readonly valuation: Valuation;
  readonly evaluator: StateEvaluator;
}

/**
 * Computes the values of fluents the model cannot express. `values` must
 * return one value per fluent of `request.declaration`, in order.
 */
export interface SimulatedEffectProvider {
  values(request: SimulatedEffectRequest): readonly Value[];
}

export interface SimulatorOptions {
  /** Separation between mutex events; defaults to the configured epsilon. */
  epsilon?: Rational;
  simulatedEffects?: SimulatedEffectProvider;
  logger?: Logger;
}

export type InapplicabilityKind =
  | 'out-of-order'
  | 'unsatisfied-condition'
  | 'duration-out-of-bounds'
  | 'incompatible-open-condition'
  | 'pending-conditions'
  | 'conflicting-effects'
  | 'open-condition-violated'
  | 'temporal-inconsistency';

/** Why an event cannot be applied in a state. Ordinary data, never thrown. */
export interface Inapplicability {
  readonly kind: InapplicabilityKind;
  readonly event: TemporalEvent;
  readonly message: string;
  readonly condition?: Expression;
  readonly fluents?: readonly FluentKey[];
  /** For `temporal-inconsistency`: the pair whose constraint broke the network. */
  readonly witness?: readonly [TemporalEvent, TemporalEvent];
}

export type ApplyResult =
  | { readonly ok: true; readonly state: CombinedState }
  | { readonly ok: false; readonly reason: Inapplicability };

export interface ApplyOptions {
  /** Pins the event at this time after plan start. */
  at?: Rational;
}

export interface TimedEffectActivity {
  readonly time: Rational;
  readonly events: readonly TemporalEvent[];
}

export class InapplicableEventError extends EngineError {
  readonly reason: Inapplicability;

  constructor(reason: Inapplicability) {
    super('INAPPLICABLE_EVENT', `Event ${reason.event.label} is not applicable: ${reason.message}`, {
      event: reason.event.label,
      kind: reason.kind,
    });
    this.name = 'InapplicableEventError';
    this.reason = reason;
  }
}

interface EffectOutcome {
  readonly updates: Map<FluentKey, Value>;
  readonly reads: Set<FluentKey>;
  readonly conflicts: FluentKey[];
}

/**
 * Discrete-event executor of a problem's actions. Activities are decomposed
 * into point events; a state records which events have been applied and the
 * temporal network that orders them.
 */
export class TemporalSimulator {
  readonly problem: Problem;
  readonly epsilon: Rational;
  readonly evaluator: StateEvaluator;
  readonly planActivity: Activity;
  private provider: SimulatedEffectProvider | undefined;
  private logger: Logger;
  private known: WeakSet<TemporalEvent>;
  private nextEventId: number;
  private nextActivityId: number;
  private planStart: StartActionEvent;
  private planEnd: EndActionEvent;
  private planConditions: readonly TemporalEvent[];
  private timedEffects: TimedEffectActivity[] | undefined;

  constructor(problem: Problem, options: SimulatorOptions = {}) {
    this.problem = problem;
    this.epsilon = options.epsilon ?? getEngineConfig().epsilon;
    this.provider = options.simulatedEffects;
    this.logger = options.logger ?? childLogger('simulator');
    this.evaluator = new StateEvaluator(problem);
    this.known = new WeakSet();
    this.nextEventId = 0;
    this.nextActivityId = 0;
    this.timedEffects = undefined;

    this.planActivity = { id: this.nextActivityId++, instance: undefined, label: 'plan', bindings: new Map() };
    const planEvents = buildPlanEvents(this.planActivity, problem.timedGoals, this.context());
    this.planStart = planEvents.start;
    this.planEnd = planEvents.end;
    this.planConditions = planEvents.conditions;
    this.register([planEvents.start, planEvents.end, ...planEvents.conditions]);
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  /**
   * Events of a new execution of `action` applied to `args`. `action` may be
   * given by name.
   */
  getEvents(action: Action | string, args: readonly string[] = [], duration?: RationalLike): TemporalEvent[] {
    const resolved =
      typeof action === 'string' ? this.problem.actions.find((a) => a.name === action) : action;
    if (resolved === undefined) {
      throw new UnknownActionError(String(action), this.problem.name);
    }
    return this.getInstanceEvents(
      new ActionInstance(resolved, args),
      duration === undefined ? undefined : Rational.from(duration),
    );
  }

  /** Events of a new execution of `instance`, start-action first. */
  getInstanceEvents(instance: ActionInstance, duration?: Rational): TemporalEvent[] {
    if (!this.problem.actions.includes(instance.action)) {
      throw new UnknownActionError(instance.action.name, this.problem.name);
    }
    return this.createActivity(instance, duration);
  }

  getPlanStartEvent(): StartActionEvent {
    return this.planStart;
  }

  getPlanEndEvent(): EndActionEvent {
    return this.planEnd;
  }

  /** Open/close events of the problem's timed goals. */
  getPlanConditionEvents(): readonly TemporalEvent[] {
    return this.planConditions;
  }

  /**
   * The problem's timed effects as instantaneous activities, one per distinct
   * time, in time order. Built once per simulator.
   */
  getTimedEffectEvents(): readonly TimedEffectActivity[] {
    if (this.timedEffects) return this.timedEffects;

    const byTime = new Map<string, { time: Rational; effects: Effect[] }>();
    for (const timed of this.problem.timedEffects) {
      if (timed.timing.anchor !== 'global-start') {
        throw new UnsupportedTimingError(`Timed effects must be anchored at global start, not '${timed.timing.anchor}'`, {
          anchor: timed.timing.anchor,
        });
      }
      const key = timed.timing.delay.toString();
      const entry = byTime.get(key) ?? { time: timed.timing.delay, effects: [] };
      entry.effects.push(timed.effect);
      byTime.set(key, entry);
    }

    this.timedEffects = [...byTime.values()]
      .sort((a, b) => a.time.compare(b.time))
      .map(({ time, effects }) => {
        const action = instantaneousAction(`timed-effect@${time}`, { effects });
        return { time, events: this.createActivity(new ActionInstance(action), undefined) };
      });
    return this.timedEffects;
  }

  // ---------------------------------------------------------------------------
  // States
  // ---------------------------------------------------------------------------

  initialState(): CombinedState {
    const network = new TemporalNetwork<TemporalEvent>();
    network.addNode(this.planStart);
    network.add(this.planStart, this.planEnd, Rational.ZERO);
    for (const event of this.planConditions) {
      if (event.fromEnd) network.add(event, this.planEnd, event.offset, event.offset);
      else network.add(this.planStart, event, event.offset, event.offset);
    }
    for (const event of this.planConditions) {
      if (event.kind === 'end-condition') {
        const opening = this.planConditions.find(
          (e) => e.kind === 'start-condition' && e.interval === event.interval,
        );
        if (opening) network.add(opening, event, Rational.ZERO);
      }
    }

    return {
      valuation: this.evaluator.initialValuation(),
      network,
      openConditions: [],
      agenda: new Map([[this.planActivity, [...this.planConditions, this.planEnd]]]),
      ended: new Set(),
      lastEvent: { event: this.planStart, reads: new Set(), writes: new Set() },
      parent: undefined,
      depth: 0,
    };
  }

  isApplicable(event: TemporalEvent, state: CombinedState, options: ApplyOptions = {}): boolean {
    return this.explain(event, state, options) === undefined;
  }

  /** Why `event` cannot be applied in `state`, or undefined when it can. */
  explain(event: TemporalEvent, state: CombinedState, options: ApplyOptions = {}): Inapplicability | undefined {
    const result = this.transition(event, state, options);
    return result.ok ? undefined : result.reason;
  }

  tryApply(event: TemporalEvent, state: CombinedState, options: ApplyOptions = {}): ApplyResult {
    return this.transition(event, state, options);
  }

  /**
   * Applies `event` and returns the successor state; `state` is left
   * untouched. Throws InapplicableEventError when the event is not
   * applicable.
   */
  apply(event: TemporalEvent, state: CombinedState, options: ApplyOptions = {}): CombinedState {
    const result = this.transition(event, state, options);
    if (!result.ok) throw new InapplicableEventError(result.reason);
    return result.state;
  }

  getUnsatisfiedGoals(state: CombinedState): Expression[] {
    return this.problem.goals.filter((goal) => !this.evaluator.evaluateBool(goal, state.valuation));
  }

  /** Goals hold, nothing is running and the plan can be closed. */
  isGoal(state: CombinedState): boolean {
    return this.getUnsatisfiedGoals(state).length === 0 && this.isApplicable(this.planEnd, state);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private context(): BuildContext {
    return { epsilon: this.epsilon, nextId: () => this.nextEventId++ };
  }

  private register(events: readonly TemporalEvent[]): void {
    for (const event of events) this.known.add(event);
  }

  private createActivity(instance: ActionInstance, duration: Rational | undefined): TemporalEvent[] {
    const id = this.nextActivityId++;
    const activity: Activity = {
      id,
      instance,
      label: `${instance.label}#${id}`,
      bindings: instance.bindings,
    };
    const events = buildActivityEvents(activity, duration, this.context());
    this.register(events);
    return events;
  }

  private transition(event: TemporalEvent, state: CombinedState, options: ApplyOptions): ApplyResult {
    if (!this.known.has(event)) {
      throw new ForeignEventError(event.label);
    }
    const fail = (reason: Omit<Inapplicability, 'event'>): ApplyResult => {
      this.logger.debug({ event: event.label, reason: reason.kind }, reason.message);
      return { ok: false, reason: { event, ...reason } };
    };

    const { activity } = event;
    const { valuation } = state;
    const bindings = activity.bindings;

    // 1. Lifecycle of the activity
    const pending = state.agenda.get(activity);
    if (event.kind === 'start-action') {
      if (activity === this.planActivity || pending !== undefined) {
        return fail({ kind: 'out-of-order', message: `'${activity.label}' is already running` });
      }
      if (state.ended.has(activity)) {
        throw new ActivityEndedError(event.label, activity.label);
      }
    } else {
      if (pending === undefined) {
        if (state.ended.has(activity)) throw new ActivityEndedError(event.label, activity.label);
        throw new ActivityNotStartedError(event.label, activity.label);
      }
      if (activity === this.planActivity) {
        const order = this.checkPlanOrder(event, pending, state);
        if (order) return fail(order);
      } else if (pending[0] !== event) {
        return fail({
          kind: 'out-of-order',
          message: `'${activity.label}' expects ${pending[0]?.label ?? 'nothing'} next`,
        });
      }
      if (event.kind === 'end-action') {
        const stillOpen = state.openConditions.filter((c) => c.activity === activity);
        if (stillOpen.length > 0) {
          return fail({
            kind: 'pending-conditions',
            message: `'${activity.label}' still has open conditions ${stillOpen.map((c) => c.label).join(', ')}`,
          });
        }
      }
    }

    // 2. Conditions in the pre-state
    const reads = new Set<FluentKey>();
    const action = activity.instance?.action;
    if (event.kind === 'start-action' && action?.kind === 'durative') {
      const bounds = action.duration;
      this.evaluator.readFluents(bounds.lower, valuation, bindings, reads);
      this.evaluator.readFluents(bounds.upper, valuation, bindings, reads);
      const lower = this.evaluator.evaluateNumber(bounds.lower, valuation, bindings);
      const upper = this.evaluator.evaluateNumber(bounds.upper, valuation, bindings);
      const d = event.duration;
      const aboveLower = bounds.lowerOpen ? d.gt(lower) : d.ge(lower);
      const belowUpper = bounds.upperOpen ? d.lt(upper) : d.le(upper);
      if (!aboveLower || !belowUpper) {
        return fail({
          kind: 'duration-out-of-bounds',
          message: `Duration ${d} of '${activity.label}' is outside ${bounds.lowerOpen ? '(' : '['}${lower}, ${upper}${bounds.upperOpen ? ')' : ']'}`,
        });
      }
    }

    const pointConditions: readonly Expression[] =
      event.kind === 'start-action' || event.kind === 'end-action'
        ? event.conditions
        : (event.kind === 'start-condition' && !event.interval.leftOpen) ||
            (event.kind === 'end-condition' && !event.interval.rightOpen)
          ? [event.interval.condition]
          : [];
    for (const condition of pointConditions) {
      this.evaluator.readFluents(condition, valuation, bindings, reads);
      if (!this.evaluator.evaluateBool(condition, valuation, bindings)) {
        return fail({
          kind: 'unsatisfied-condition',
          message: `A condition of ${event.label} does not hold`,
          condition,
        });
      }
    }

    if (event.kind === 'start-condition') {
      this.evaluator.readFluents(event.interval.condition, valuation, bindings, reads);
      const clash = this.contradictedBy(event.interval, state);
      if (clash) {
        return fail({
          kind: 'incompatible-open-condition',
          message: `${event.interval.label} of '${activity.label}' contradicts open condition ${clash.label} of '${clash.activity.label}'`,
          condition: clash.condition,
        });
      }
    }

    // 3. Effects, evaluated in the pre-state
    const outcome = this.evaluateEffects(event, valuation, reads);
    if (outcome.conflicts.length > 0) {
      return fail({
        kind: 'conflicting-effects',
        message: `${event.label} writes ${outcome.conflicts.join(', ')} more than once`,
        fluents: outcome.conflicts,
      });
    }
    const nextValuation = valuation.with(outcome.updates);

    // 4. Open conditions after the event
    let openConditions = state.openConditions;
    if (event.kind === 'start-condition') {
      openConditions = [...openConditions, event.interval];
    } else if (event.kind === 'end-condition') {
      const index = openConditions.indexOf(event.interval);
      openConditions = openConditions.filter((_, i) => i !== index);
    }
    for (const open of openConditions) {
      if (!this.evaluator.evaluateBool(open.condition, nextValuation, open.activity.bindings)) {
        return fail({
          kind: 'open-condition-violated',
          message: `Open condition ${open.label} of '${open.activity.label}' is violated after ${event.label}`,
          condition: open.condition,
        });
      }
    }

    // 5. Temporal network
    const applied: AppliedEvent = { event, reads, writes: new Set(outcome.updates.keys()) };
    const network = state.network.copy();
    if (event.kind === 'start-action') {
      for (const next of event.committed) network.add(event, next, next.offset, next.offset);
    }
    network.add(state.lastEvent.event, event, Rational.ZERO);
    for (const past of history(state)) {
      const separation = this.separation(applied, past);
      if (separation) network.add(past.event, event, separation);
    }
    if (options.at !== undefined) {
      network.add(this.planStart, event, options.at, options.at);
    }
    if (!network.check()) {
      const witness = network.witness();
      return fail({
        kind: 'temporal-inconsistency',
        message: witness
          ? `Timing of ${event.label} is inconsistent (between ${witness[0].label} and ${witness[1].label})`
          : `Timing of ${event.label} is inconsistent`,
        witness,
      });
    }

    // 6. Bookkeeping
    const agenda = new Map(state.agenda);
    let ended = state.ended;
    if (event.kind === 'start-action') {
      agenda.set(activity, event.committed);
    } else if (event.kind === 'end-action') {
      agenda.delete(activity);
      ended = new Set(ended).add(activity);
    } else {
      agenda.set(
        activity,
        (pending ?? []).filter((e) => e !== event),
      );
    }

    return {
      ok: true,
      state: {
        valuation: nextValuation,
        network,
        openConditions,
        agenda,
        ended,
        lastEvent: applied,
        parent: state,
        depth: state.depth + 1,
      },
    };
  }

  /** Ordering checks for the plan's own events, which need not come in a fixed order. */
  private checkPlanOrder(
    event: TemporalEvent,
    pending: readonly TemporalEvent[],
    state: CombinedState,
  ): Omit<Inapplicability, 'event'> | undefined {
    if (!pending.includes(event)) {
      return { kind: 'out-of-order', message: `${event.label} was already applied` };
    }
    if (event.kind === 'end-condition' && !state.openConditions.includes(event.interval)) {
      return { kind: 'out-of-order', message: `${event.interval.label} has not been opened` };
    }
    if (event.kind === 'end-action') {
      const running = [...state.agenda.keys()].filter((a) => a !== this.planActivity);
      if (running.length > 0) {
        return {
          kind: 'out-of-order',
          message: `Cannot close the plan while ${running.map((a) => a.label).join(', ')} are running`,
        };
      }
      if (pending.length > 1) {
        return {
          kind: 'pending-conditions',
          message: `Timed goals ${pending.filter((e) => e !== event).map((e) => e.label).join(', ')} were not checked`,
        };
      }
    }
    return undefined;
  }

  /** First open condition whose literals contradict those of `interval`. */
  private contradictedBy(interval: IntervalCondition, state: CombinedState): IntervalCondition | undefined {
    const mine = this.evaluator.literals(interval.condition, state.valuation, interval.activity.bindings);
    if (mine.length === 0) return undefined;
    for (const open of state.openConditions) {
      const theirs = this.evaluator.literals(open.condition, state.valuation, open.activity.bindings);
      if (mine.some((m) => theirs.some((t) => t.fluent === m.fluent && t.positive !== m.positive))) {
        return open;
      }
    }
    return undefined;
  }

  private evaluateEffects(event: TemporalEvent, valuation: Valuation, reads: Set<FluentKey>): EffectOutcome {
    const { bindings } = event.activity;
    const assigned = new Map<FluentKey, Value>();
    const deltas = new Map<FluentKey, Rational>();
    const conflicts = new Set<FluentKey>();
    const current = new Map<FluentKey, Rational>();

    const addDelta = (key: FluentKey, base: Rational, delta: Rational): void => {
      if (assigned.has(key)) conflicts.add(key);
      current.set(key, base);
      deltas.set(key, (deltas.get(key) ?? Rational.ZERO).add(delta));
    };
    const assign = (key: FluentKey, value: Value): void => {
      const previous = assigned.get(key);
      if (deltas.has(key) || (previous !== undefined && !valueEquals(previous, value))) {
        conflicts.add(key);
      }
      assigned.set(key, value);
    };

    const { effects, simulated } = discreteEffects(event);
    for (const effect of effects) {
      if (effect.condition) {
        this.evaluator.readFluents(effect.condition, valuation, bindings, reads);
        if (!this.evaluator.evaluateBool(effect.condition, valuation, bindings)) continue;
      }
      this.evaluator.readFluents(effect.value, valuation, bindings, reads);
      for (const arg of effect.fluent.args) this.evaluator.readFluents(arg, valuation, bindings, reads);
      const key = this.evaluator.groundFluent(effect.fluent, valuation, bindings);
      const value = this.evaluator.evaluate(effect.value, valuation, bindings);
      if (effect.kind === 'assign') {
        assign(key, value);
        continue;
      }
      if (!(value instanceof Rational)) {
        throw new EvaluationError(`'${effect.kind}' of ${key} by non-numeric value '${formatValue(value)}'`);
      }
      reads.add(key);
      const base = this.evaluator.evaluateNumber(effect.fluent, valuation, bindings);
      addDelta(key, base, effect.kind === 'increase' ? value : value.neg());
    }

    if (event.kind === 'end-condition') {
      const { interval } = event;
      const elapsed = interval.upper.sub(interval.lower);
      for (const ce of interval.continuousEffects) {
        this.evaluator.readFluents(ce.rate, valuation, bindings, reads);
        const key = this.evaluator.groundFluent(ce.fluent, valuation, bindings);
        reads.add(key);
        const amount = this.evaluator.evaluateNumber(ce.rate, valuation, bindings).mul(elapsed);
        const base = this.evaluator.evaluateNumber(ce.fluent, valuation, bindings);
        addDelta(key, base, ce.kind === 'increase' ? amount : amount.neg());
      }
    }

    if (simulated) {
      if (!this.provider) {
        throw new MissingCapabilityError('SimulatedEffectProvider', event.activity.label);
      }
      const values = this.provider.values({
        declaration: simulated,
        activity: event.activity,
        valuation,
        evaluator: this.evaluator,
      });
      if (values.length !== simulated.fluents.length) {
        throw new EvaluationError(
          `Simulated effect of '${event.activity.label}' returned ${values.length} value(s) for ${simulated.fluents.length} fluent(s)`,
        );
      }
      simulated.fluents.forEach((f, i) => {
        const key = this.evaluator.groundFluent(f, valuation, bindings);
        if (assigned.has(key) || deltas.has(key)) conflicts.add(key);
        assigned.set(key, values[i]);
      });
    }

    const updates = new Map(assigned);
    for (const [key, delta] of deltas) {
      if (assigned.has(key)) continue;
      updates.set(key, (current.get(key) ?? Rational.ZERO).add(delta));
    }
    return { updates, reads, conflicts: [...conflicts] };
  }

  /**
   * Minimum delay between an earlier event and a new one: epsilon when one
   * writes a fluent the other reads or writes, zero when they only share
   * reads. Events of one activity at the same offset are a single instant.
   * Timed-goal checks only need to come after what they observe.
   */
  private separation(next: AppliedEvent, past: AppliedEvent): Rational | undefined {
    if (
      past.event.activity === next.event.activity &&
      past.event.fromEnd === next.event.fromEnd &&
      past.event.offset.equals(next.event.offset)
    ) {
      return undefined;
    }
    if (past.event.activity === this.planActivity || next.event.activity === this.planActivity) {
      return undefined;
    }
    const overlaps = (a: ReadonlySet<FluentKey>, b: ReadonlySet<FluentKey>): boolean => {
      for (const key of a) if (b.has(key)) return true;
      return false;
    };
    if (
      overlaps(next.writes, past.writes) ||
      overlaps(next.writes, past.reads) ||
      overlaps(next.reads, past.writes)
    ) {
      return this.epsilon;
    }
    if (overlaps(next.reads, past.reads)) return Rational.ZERO;
    return undefined;
  }
}
