import { InvalidDurationError, UnsupportedTimingError } from '../../lib/errors.js';
import { Rational } from '../../lib/rational.js';
import { TRUE, and } from '../../types/index.js';
import type {
  ContinuousEffect,
  DurativeAction,
  Effect,
  Expression,
  SimulatedEffectDeclaration,
  TimeInterval,
  TimedCondition,
  Timing,
} from '../../types/index.js';
import {
  compareEvents,
  type Activity,
  type EndActionEvent,
  type IntervalCondition,
  type StartActionEvent,
  type TemporalEvent,
} from './events.js';

type Place = 'start' | 'end' | 'inner';

/** Allocates event ids; the simulator owns one per instance. */
export type IdSource = () => number;

interface IntervalGroup {
  lower: Rational;
  upper: Rational;
  leftOpen: boolean;
  rightOpen: boolean;
  conditions: Expression[];
  continuousEffects: ContinuousEffect[];
  effects: Effect[];
  simulated: SimulatedEffectDeclaration | undefined;
}

function conjunction(conditions: readonly Expression[]): Expression {
  if (conditions.length === 0) return TRUE;
  if (conditions.length === 1) return conditions[0];
  return and(...conditions);
}

function intervalLabel(lower: Rational, upper: Rational, leftOpen: boolean, rightOpen: boolean): string {
  return `${leftOpen ? '(' : '['}${lower}, ${upper}${rightOpen ? ')' : ']'}`;
}

/**
 * Offsets of one durative action, checked against its duration.
 */
class ActionTimeline {
  constructor(
    private readonly action: DurativeAction,
    private readonly duration: Rational,
  ) {}

  offset(timing: Timing): Rational {
    let offset: Rational;
    switch (timing.anchor) {
      case 'start':
        offset = timing.delay;
        break;
      case 'end':
        offset = this.duration.sub(timing.delay);
        break;
      case 'global-start':
      case 'global-end':
        throw new UnsupportedTimingError(
          `Action '${this.action.name}' uses plan-level timing '${timing.anchor}'`,
          { action: this.action.name, anchor: timing.anchor },
        );
    }
    if (offset.sign() < 0 || offset.gt(this.duration)) {
      throw new UnsupportedTimingError(
        `Timing ${timing.anchor}+${timing.delay} of '${this.action.name}' lies outside its duration ${this.duration}`,
        { action: this.action.name, duration: this.duration.toString() },
      );
    }
    return offset;
  }

  place(timing: Timing): Place {
    const offset = this.offset(timing);
    if (timing.anchor === 'end' && offset.equals(this.duration)) return 'end';
    if (offset.isZero()) return 'start';
    if (offset.equals(this.duration)) return 'end';
    return 'inner';
  }

  isEmpty(interval: TimeInterval): boolean {
    const lower = this.offset(interval.lower);
    const upper = this.offset(interval.upper);
    return lower.gt(upper) || (lower.equals(upper) && (interval.leftOpen || interval.rightOpen));
  }
}

function groupKey(lower: Rational, upper: Rational, leftOpen: boolean, rightOpen: boolean): string {
  return `${lower}|${upper}|${leftOpen}|${rightOpen}`;
}

/**
 * Condition-event offsets for an interval, shifted inwards by epsilon on open
 * sides. When the interval is too short for both shifts the two events meet
 * at its midpoint.
 */
function shiftedOffsets(group: IntervalGroup, epsilon: Rational): [Rational, Rational] {
  const open = group.leftOpen ? group.lower.add(epsilon) : group.lower;
  const close = group.rightOpen ? group.upper.sub(epsilon) : group.upper;
  if (open.gt(close)) {
    const mid = group.lower.add(group.upper).div(2);
    return [mid, mid];
  }
  return [open, close];
}

export interface BuildContext {
  readonly epsilon: Rational;
  readonly nextId: IdSource;
}

/**
 * Events of one execution of an action, sorted into execution order: the
 * start-action first, the end-action last.
 */
export function buildActivityEvents(
  activity: Activity,
  duration: Rational | undefined,
  context: BuildContext,
): TemporalEvent[] {
  const instance = activity.instance;
  if (!instance) return [];
  const action = instance.action;

  if (action.kind === 'instantaneous') {
    if (duration !== undefined && !duration.isZero()) {
      throw new InvalidDurationError(`Instantaneous action '${action.name}' cannot take duration ${duration}`, {
        action: action.name,
      });
    }
    const committed: TemporalEvent[] = [];
    const start: StartActionEvent = {
      kind: 'start-action',
      id: context.nextId(),
      activity,
      offset: Rational.ZERO,
      fromEnd: false,
      label: `${activity.label}.start`,
      conditions: action.preconditions,
      effects: action.effects,
      simulated: action.simulatedEffect,
      duration: Rational.ZERO,
      committed,
    };
    const end: EndActionEvent = {
      kind: 'end-action',
      id: context.nextId(),
      activity,
      offset: Rational.ZERO,
      fromEnd: false,
      label: `${activity.label}.end`,
      conditions: [],
      effects: [],
      simulated: undefined,
    };
    committed.push(end);
    return [start, end];
  }

  if (duration === undefined) {
    throw new InvalidDurationError(`Durative action '${action.name}' needs a duration`, { action: action.name });
  }
  if (duration.sign() < 0) {
    throw new InvalidDurationError(`Durative action '${action.name}' cannot take negative duration ${duration}`, {
      action: action.name,
    });
  }

  const timeline = new ActionTimeline(action, duration);
  const startConditions: Expression[] = [];
  const endConditions: Expression[] = [];
  const startEffects: Effect[] = [];
  const endEffects: Effect[] = [];
  let startSimulated: SimulatedEffectDeclaration | undefined;
  let endSimulated: SimulatedEffectDeclaration | undefined;
  const groups = new Map<string, IntervalGroup>();

  const groupAt = (lower: Rational, upper: Rational, leftOpen: boolean, rightOpen: boolean): IntervalGroup => {
    const key = groupKey(lower, upper, leftOpen, rightOpen);
    let group = groups.get(key);
    if (!group) {
      group = {
        lower,
        upper,
        leftOpen,
        rightOpen,
        conditions: [],
        continuousEffects: [],
        effects: [],
        simulated: undefined,
      };
      groups.set(key, group);
    }
    return group;
  };
  const groupFor = (interval: TimeInterval): IntervalGroup =>
    groupAt(timeline.offset(interval.lower), timeline.offset(interval.upper), interval.leftOpen, interval.rightOpen);
  // effects strictly inside the action sit on a closed point interval at their offset
  const instantAt = (timing: Timing): IntervalGroup => {
    const offset = timeline.offset(timing);
    return groupAt(offset, offset, false, false);
  };

  for (const timed of action.conditions) {
    const { interval } = timed;
    if (timeline.isEmpty(interval)) continue;
    const lower = timeline.offset(interval.lower);
    const upper = timeline.offset(interval.upper);
    if (lower.equals(upper)) {
      const place = timeline.place(interval.lower);
      if (place === 'start') {
        startConditions.push(timed.condition);
        continue;
      }
      if (place === 'end') {
        endConditions.push(timed.condition);
        continue;
      }
    }
    // a closed lower end at the start must hold before the start effects
    if (!interval.leftOpen && lower.isZero()) {
      startConditions.push(timed.condition);
    }
    groupFor(interval).conditions.push(timed.condition);
  }

  for (const timed of action.effects) {
    switch (timeline.place(timed.timing)) {
      case 'start':
        startEffects.push(timed.effect);
        break;
      case 'end':
        endEffects.push(timed.effect);
        break;
      case 'inner':
        instantAt(timed.timing).effects.push(timed.effect);
        break;
    }
  }

  for (const declaration of action.simulatedEffects) {
    const place = timeline.place(declaration.timing);
    const existing =
      place === 'start' ? startSimulated : place === 'end' ? endSimulated : instantAt(declaration.timing).simulated;
    if (existing !== undefined) {
      throw new UnsupportedTimingError(
        `'${action.name}' declares two simulated effects at ${declaration.timing.anchor}+${declaration.timing.delay}`,
        { action: action.name },
      );
    }
    if (place === 'start') startSimulated = declaration;
    else if (place === 'end') endSimulated = declaration;
    else instantAt(declaration.timing).simulated = declaration;
  }

  for (const effect of action.continuousEffects) {
    if (timeline.isEmpty(effect.interval)) continue;
    groupFor(effect.interval).continuousEffects.push(effect);
  }

  const committed: TemporalEvent[] = [];
  const start: StartActionEvent = {
    kind: 'start-action',
    id: context.nextId(),
    activity,
    offset: Rational.ZERO,
    fromEnd: false,
    label: `${activity.label}.start`,
    conditions: startConditions,
    effects: startEffects,
    simulated: startSimulated,
    duration,
    committed,
  };

  for (const group of groups.values()) {
    const interval: IntervalCondition = {
      activity,
      condition: conjunction(group.conditions),
      lower: group.lower,
      upper: group.upper,
      leftOpen: group.leftOpen,
      rightOpen: group.rightOpen,
      continuousEffects: group.continuousEffects,
      effects: group.effects,
      simulated: group.simulated,
      label: intervalLabel(group.lower, group.upper, group.leftOpen, group.rightOpen),
    };
    const [open, close] = shiftedOffsets(group, context.epsilon);
    committed.push(
      {
        kind: 'start-condition',
        id: context.nextId(),
        activity,
        offset: open,
        fromEnd: false,
        label: `${activity.label}.open${interval.label}`,
        interval,
      },
      {
        kind: 'end-condition',
        id: context.nextId(),
        activity,
        offset: close,
        fromEnd: false,
        label: `${activity.label}.close${interval.label}`,
        interval,
      },
    );
  }

  committed.push({
    kind: 'end-action',
    id: context.nextId(),
    activity,
    offset: duration,
    fromEnd: false,
    label: `${activity.label}.end`,
    conditions: endConditions,
    effects: endEffects,
    simulated: endSimulated,
  });
  committed.sort(compareEvents);
  return [start, ...committed];
}

export interface PlanEvents {
  readonly start: StartActionEvent;
  readonly end: EndActionEvent;
  /** Condition events of the problem's timed goals. */
  readonly conditions: readonly TemporalEvent[];
}

function planOffset(timing: Timing): { offset: Rational; fromEnd: boolean } {
  switch (timing.anchor) {
    case 'global-start':
      return { offset: timing.delay, fromEnd: false };
    case 'global-end':
      return { offset: timing.delay, fromEnd: true };
    case 'start':
    case 'end':
      throw new UnsupportedTimingError(`Timed goal uses action-level timing '${timing.anchor}'`, {
        anchor: timing.anchor,
      });
  }
}

/**
 * Plan start/end and the condition events of timed goals. Goals anchored at
 * global end count their offset back from the plan's end.
 */
export function buildPlanEvents(
  activity: Activity,
  timedGoals: readonly TimedCondition[],
  context: BuildContext,
): PlanEvents {
  const start: StartActionEvent = {
    kind: 'start-action',
    id: context.nextId(),
    activity,
    offset: Rational.ZERO,
    fromEnd: false,
    label: 'plan.start',
    conditions: [],
    effects: [],
    simulated: undefined,
    duration: Rational.ZERO,
    committed: [],
  };
  const end: EndActionEvent = {
    kind: 'end-action',
    id: context.nextId(),
    activity,
    offset: Rational.ZERO,
    fromEnd: true,
    label: 'plan.end',
    conditions: [],
    effects: [],
    simulated: undefined,
  };

  const conditions: TemporalEvent[] = [];
  for (const goal of timedGoals) {
    const { interval } = goal;
    const lower = planOffset(interval.lower);
    const upper = planOffset(interval.upper);
    if (lower.fromEnd === upper.fromEnd) {
      // same anchor: compare positions on one axis
      const lo = lower.fromEnd ? lower.offset.neg() : lower.offset;
      const hi = upper.fromEnd ? upper.offset.neg() : upper.offset;
      if (lo.gt(hi) || (lo.equals(hi) && (interval.leftOpen || interval.rightOpen))) continue;
    }

    const label = `${lower.fromEnd ? 'end' : 'start'}+${lower.offset}..${upper.fromEnd ? 'end' : 'start'}+${upper.offset}`;
    const condition: IntervalCondition = {
      activity,
      condition: goal.condition,
      lower: lower.offset,
      upper: upper.offset,
      leftOpen: interval.leftOpen,
      rightOpen: interval.rightOpen,
      continuousEffects: [],
      effects: [],
      simulated: undefined,
      label: `${interval.leftOpen ? '(' : '['}${label}${interval.rightOpen ? ')' : ']'}`,
    };
    // an epsilon step later in time is a smaller distance back from the end
    const shift = (base: Rational, fromEnd: boolean, later: boolean): Rational => {
      const forward = later === !fromEnd;
      const shifted = forward ? base.add(context.epsilon) : base.sub(context.epsilon);
      return Rational.max(shifted, Rational.ZERO);
    };
    conditions.push(
      {
        kind: 'start-condition',
        id: context.nextId(),
        activity,
        offset: interval.leftOpen ? shift(lower.offset, lower.fromEnd, true) : lower.offset,
        fromEnd: lower.fromEnd,
        label: `plan.open${condition.label}`,
        interval: condition,
      },
      {
        kind: 'end-condition',
        id: context.nextId(),
        activity,
        offset: interval.rightOpen ? shift(upper.offset, upper.fromEnd, false) : upper.offset,
        fromEnd: upper.fromEnd,
        label: `plan.close${condition.label}`,
        interval: condition,
      },
    );
  }
  return { start, end, conditions };
}
