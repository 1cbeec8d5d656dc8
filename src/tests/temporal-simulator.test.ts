import { describe, it, expect } from 'vitest';
import {
  ActivityEndedError,
  ActivityNotStartedError,
  ForeignEventError,
  InvalidDurationError,
  MissingCapabilityError,
  UnknownActionError,
  UnsupportedTimingError,
} from '../lib/errors.js';
import { ActionInstance } from '../engine/plans/index.js';
import {
  InapplicableEventError,
  TemporalSimulator,
  isRunning,
  type CombinedState,
  type Inapplicability,
  type TemporalEvent,
} from '../engine/simulator/index.js';
import {
  assign,
  atEnd,
  atStart,
  boolFluent,
  closedInterval,
  condition,
  continuousEffect,
  durationBetween,
  durativeAction,
  fixedDuration,
  fluent,
  globalEnd,
  globalStart,
  instantaneousAction,
  not,
  openInterval,
  pointInterval,
  problem,
  realFluent,
  timedEffect,
} from '../types/index.js';
import type { Action, Problem, TimedCondition, TimedEffect } from '../types/index.js';
import { makeResourceDomain, makeSwitchDomain, r, silentLogger } from './fixtures.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function makeSimulator(prob: Problem): TemporalSimulator {
  return new TemporalSimulator(prob, { epsilon: r('1/1000'), logger: silentLogger });
}

function makeProblem(
  actions: Action[],
  extra: { timedGoals?: TimedCondition[]; timedEffects?: TimedEffect[] } = {},
): Problem {
  return problem('kit', {
    fluents: [
      boolFluent('p', [], true),
      boolFluent('q', [], false),
      boolFluent('x', [], false),
      realFluent('level', [], 0),
      realFluent('reading', [], 0),
    ],
    actions,
    ...extra,
  });
}

/** Applies `events` in order, failing the test on the first inapplicable one. */
function run(sim: TemporalSimulator, events: readonly TemporalEvent[], state = sim.initialState()): CombinedState {
  return events.reduce((s, event) => sim.apply(event, s), state);
}

function reasonOf(sim: TemporalSimulator, event: TemporalEvent, state: CombinedState): Inapplicability {
  const result = sim.tryApply(event, state);
  if (result.ok) throw new Error(`${event.label} was applicable`);
  return result.reason;
}

// ---------------------------------------------------------------------------
// Event construction
// ---------------------------------------------------------------------------

describe('TemporalSimulator events', () => {
  it('decomposes a durative action with an interval condition', () => {
    const { problem: prob, use } = makeResourceDomain();
    const sim = makeSimulator(prob);
    const events = sim.getEvents(use, [], 5);
    expect(events.map((e) => [e.kind, e.label, e.offset.toString()])).toEqual([
      ['start-action', 'use#1.start', '0'],
      ['start-condition', 'use#1.open[0, 5]', '0'],
      ['end-condition', 'use#1.close[0, 5]', '5'],
      ['end-action', 'use#1.end', '5'],
    ]);
  });

  it('puts the effects of an instantaneous action on its start', () => {
    const { problem: prob } = makeSwitchDomain();
    const sim = makeSimulator(prob);
    const [start, end] = sim.getEvents('b');
    expect(start.kind === 'start-action' && start.conditions.length).toBe(1);
    expect(start.kind === 'start-action' && start.effects.length).toBe(1);
    expect(end.kind === 'end-action' && end.effects.length).toBe(0);
    expect(end.offset.isZero()).toBe(true);
  });

  it('shifts open interval ends inwards by epsilon', () => {
    const watch = durativeAction('watch', {
      duration: fixedDuration(1),
      conditions: [condition(openInterval(atStart(), atEnd()), fluent('p'))],
    });
    const sim = makeSimulator(makeProblem([watch]));
    const [, open, close] = sim.getEvents(watch, [], 1);
    expect(open.label).toBe('watch#1.open(0, 1)');
    expect(open.offset.toString()).toBe('1/1000');
    expect(close.offset.toString()).toBe('999/1000');
  });

  it('meets at the midpoint when the interval is shorter than the shifts', () => {
    const blink = durativeAction('blink', {
      duration: fixedDuration('1/1000'),
      conditions: [condition(openInterval(atStart(), atEnd()), fluent('p'))],
    });
    const sim = makeSimulator(makeProblem([blink]));
    const [, open, close] = sim.getEvents(blink, [], '1/1000');
    expect(open.offset.toString()).toBe('1/2000');
    expect(close.offset.toString()).toBe('1/2000');
  });

  it('folds point conditions into the start and end actions', () => {
    const check = durativeAction('check', {
      duration: fixedDuration(2),
      conditions: [
        condition(pointInterval(atStart()), fluent('p')),
        condition(pointInterval(atEnd()), fluent('q')),
      ],
    });
    const sim = makeSimulator(makeProblem([check]));
    const events = sim.getEvents(check, [], 2);
    expect(events.map((e) => e.kind)).toEqual(['start-action', 'end-action']);
    const [start, end] = events;
    expect(start.kind === 'start-action' && start.conditions).toEqual([fluent('p')]);
    expect(end.kind === 'end-action' && end.conditions).toEqual([fluent('q')]);
  });

  it('gives each scheduling of an instance its own activity', () => {
    const { problem: prob, hold } = makeResourceDomain();
    const sim = makeSimulator(prob);
    const instance = new ActionInstance(hold);
    const first = sim.getInstanceEvents(instance, r(6));
    const second = sim.getInstanceEvents(instance, r(6));
    expect(first[0].label).toBe('hold#1.start');
    expect(second[0].label).toBe('hold#2.start');
    expect(first[0].activity.instance).toBe(second[0].activity.instance);
  });

  it('labels timed-goal events relative to the plan', () => {
    const sim = makeSimulator(
      makeProblem([], {
        timedGoals: [
          condition(closedInterval(globalStart(1), globalEnd(2)), fluent('p')),
          condition(openInterval(globalStart(1), globalStart(3)), fluent('p')),
        ],
      }),
    );
    expect(sim.getPlanConditionEvents().map((e) => [e.label, e.offset.toString(), e.fromEnd])).toEqual([
      ['plan.open[start+1..end+2]', '1', false],
      ['plan.close[start+1..end+2]', '2', true],
      ['plan.open(start+1..start+3)', '1001/1000', false],
      ['plan.close(start+1..start+3)', '2999/1000', false],
    ]);
    expect(sim.getPlanStartEvent().label).toBe('plan.start');
    expect(sim.getPlanEndEvent().fromEnd).toBe(true);
  });

  it('groups timed effects by time', () => {
    const sim = makeSimulator(
      makeProblem([], {
        timedEffects: [
          timedEffect(globalStart(3), assign(fluent('p'), false)),
          timedEffect(globalStart(1), assign(fluent('q'), true)),
          timedEffect(globalStart(1), assign(fluent('x'), true)),
        ],
      }),
    );
    const timed = sim.getTimedEffectEvents();
    expect(timed.map((t) => [t.time.toString(), t.events[0].label])).toEqual([
      ['1', 'timed-effect@1#1.start'],
      ['3', 'timed-effect@3#2.start'],
    ]);
    const [first] = timed[0].events;
    expect(first.kind === 'start-action' && first.effects.length).toBe(2);
    expect(sim.getTimedEffectEvents()).toBe(timed);
  });

  it('rejects timed effects anchored at global end', () => {
    const sim = makeSimulator(
      makeProblem([], { timedEffects: [timedEffect(globalEnd(1), assign(fluent('p'), false))] }),
    );
    expect(() => sim.getTimedEffectEvents()).toThrow(UnsupportedTimingError);
  });

  it('rejects malformed requests', () => {
    const { problem: prob, hold } = makeResourceDomain();
    const sim = makeSimulator(prob);
    const stranger = instantaneousAction('stranger');
    expect(() => sim.getEvents('nope')).toThrow(UnknownActionError);
    expect(() => sim.getEvents(stranger)).toThrow(UnknownActionError);
    expect(() => sim.getEvents(hold)).toThrow(InvalidDurationError);
    expect(() => sim.getEvents(hold, [], -1)).toThrow(InvalidDurationError);
  });

  it('rejects a duration on an instantaneous action', () => {
    const { problem: prob } = makeSwitchDomain();
    expect(() => makeSimulator(prob).getEvents('a', [], 2)).toThrow(InvalidDurationError);
  });

  it('rejects effects outside the duration', () => {
    const late = durativeAction('late', {
      duration: fixedDuration(2),
      effects: [timedEffect(atStart(3), assign(fluent('p'), false))],
    });
    const sim = makeSimulator(makeProblem([late]));
    expect(() => sim.getEvents(late, [], 2)).toThrow(UnsupportedTimingError);
  });

  it('applies an intermediate effect when its instant closes', () => {
    const relay = durativeAction('relay', {
      duration: fixedDuration(2),
      effects: [timedEffect(atStart(1), assign(fluent('q'), true))],
    });
    const sim = makeSimulator(makeProblem([relay]));
    const events = sim.getEvents(relay, [], 2);
    expect(events.map((e) => [e.label, e.offset.toString()])).toEqual([
      ['relay#1.start', '0'],
      ['relay#1.open[1, 1]', '1'],
      ['relay#1.close[1, 1]', '1'],
      ['relay#1.end', '2'],
    ]);

    const opened = run(sim, events.slice(0, 2));
    expect(sim.evaluator.evaluateBool(fluent('q'), opened.valuation)).toBe(false);
    const closed = sim.apply(events[2], opened);
    expect(sim.evaluator.evaluateBool(fluent('q'), closed.valuation)).toBe(true);
    expect([...closed.lastEvent.writes]).toEqual(['q']);
  });

  it('checks conditions at an intermediate instant before its effects', () => {
    const flip = durativeAction('flip', {
      duration: fixedDuration(2),
      conditions: [condition(pointInterval(atStart(1)), fluent('p'))],
      effects: [timedEffect(atStart(1), assign(fluent('p'), false))],
    });
    const sim = makeSimulator(makeProblem([flip]));
    const events = sim.getEvents(flip, [], 2);
    expect(events.map((e) => e.label)).toEqual(['flip#1.start', 'flip#1.open[1, 1]', 'flip#1.close[1, 1]', 'flip#1.end']);
    const state = run(sim, events);
    expect(sim.evaluator.evaluateBool(fluent('p'), state.valuation)).toBe(false);
  });

  it('rejects two simulated effects at one instant', () => {
    const sample = durativeAction('sample', {
      duration: fixedDuration(2),
      simulatedEffects: [
        { timing: atStart(1), fluents: [fluent('reading')] },
        { timing: atStart(1), fluents: [fluent('level')] },
      ],
    });
    const sim = makeSimulator(makeProblem([sample]));
    expect(() => sim.getEvents(sample, [], 2)).toThrow(UnsupportedTimingError);
  });

  it('checks a closed interval condition before the start effects', () => {
    const heat = durativeAction('heat', {
      duration: fixedDuration(4),
      conditions: [condition(closedInterval(atStart(), atEnd()), fluent('x'))],
      effects: [timedEffect(atStart(), assign(fluent('x'), true))],
    });
    const sim = makeSimulator(makeProblem([heat]));
    const [start] = sim.getEvents(heat, [], 4);
    expect(start.kind === 'start-action' && start.conditions).toEqual([fluent('x')]);
    const reason = reasonOf(sim, start, sim.initialState());
    expect(reason.kind).toBe('unsatisfied-condition');
    expect(reason.condition).toEqual(fluent('x'));
  });
});

// ---------------------------------------------------------------------------
// Lifecycle
// ---------------------------------------------------------------------------

describe('TemporalSimulator lifecycle', () => {
  it('throws for events of another simulator', () => {
    const { problem: prob, hold } = makeResourceDomain();
    const sim = makeSimulator(prob);
    const other = makeSimulator(prob);
    const [start] = other.getEvents(hold, [], 6);
    expect(() => sim.tryApply(start, sim.initialState())).toThrow(ForeignEventError);
  });

  it('throws for an event of an activity that never started', () => {
    const { problem: prob, use } = makeResourceDomain();
    const sim = makeSimulator(prob);
    const [, open] = sim.getEvents(use, [], 5);
    expect(() => sim.tryApply(open, sim.initialState())).toThrow(ActivityNotStartedError);
  });

  it('throws for an event of an activity that already ended', () => {
    const { problem: prob } = makeSwitchDomain();
    const sim = makeSimulator(prob);
    const [start, end] = sim.getEvents('a');
    const started = sim.apply(start, sim.initialState());
    expect(isRunning(started, start.activity)).toBe(true);
    const state = sim.apply(end, started);
    expect(isRunning(state, start.activity)).toBe(false);
    expect(() => sim.tryApply(start, state)).toThrow(ActivityEndedError);
    expect(() => sim.tryApply(end, state)).toThrow(ActivityEndedError);
  });

  it('reports events applied out of order', () => {
    const { problem: prob, hold, use } = makeResourceDomain();
    const sim = makeSimulator(prob);
    const [holdStart, holdEnd] = sim.getEvents(hold, [], 6);
    const [useStart, , useClose] = sim.getEvents(use, [], 5);
    const state = run(sim, [holdStart, useStart]);
    expect(reasonOf(sim, holdStart, state).kind).toBe('out-of-order');
    expect(reasonOf(sim, useClose, state).kind).toBe('out-of-order');
    // nothing depends on holding yet
    expect(sim.isApplicable(holdEnd, state)).toBe(true);
  });

  it('leaves the source state untouched', () => {
    const { problem: prob } = makeSwitchDomain();
    const sim = makeSimulator(prob);
    const [start] = sim.getEvents('a');
    const initial = sim.initialState();
    const next = sim.apply(start, initial);
    expect(sim.evaluator.evaluateBool(fluent('p'), initial.valuation)).toBe(false);
    expect(sim.evaluator.evaluateBool(fluent('p'), next.valuation)).toBe(true);
    expect(next.parent).toBe(initial);
    expect(next.depth).toBe(1);
  });

  it('throws InapplicableEventError from apply', () => {
    const { problem: prob, use } = makeResourceDomain();
    const sim = makeSimulator(prob);
    const [start] = sim.getEvents(use, [], 5);
    const initial = sim.initialState();
    try {
      sim.apply(start, initial);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InapplicableEventError);
      if (error instanceof InapplicableEventError) {
        expect(error.reason.kind).toBe('unsatisfied-condition');
        expect(error.reason.condition).toEqual(fluent('holding'));
      }
    }
    expect(sim.explain(start, initial)?.kind).toBe('unsatisfied-condition');
  });
});

// ---------------------------------------------------------------------------
// Conditions and effects
// ---------------------------------------------------------------------------

describe('TemporalSimulator conditions and effects', () => {
  it('checks the duration against its bounds', () => {
    const flex = durativeAction('flex', { duration: durationBetween(2, 4) });
    const strict = durativeAction('strict', { duration: durationBetween(2, 4, { upperOpen: true }) });
    const sim = makeSimulator(makeProblem([flex, strict]));
    const initial = sim.initialState();
    expect(reasonOf(sim, sim.getEvents(flex, [], 5)[0], initial).kind).toBe('duration-out-of-bounds');
    expect(sim.isApplicable(sim.getEvents(flex, [], 4)[0], initial)).toBe(true);
    expect(reasonOf(sim, sim.getEvents(strict, [], 4)[0], initial).kind).toBe('duration-out-of-bounds');
    expect(sim.isApplicable(sim.getEvents(strict, [], '7/2')[0], initial)).toBe(true);
  });

  it('reports an open condition broken by another activity', () => {
    const { problem: prob, hold, use } = makeResourceDomain();
    const sim = makeSimulator(prob);
    const [holdStart, holdEnd] = sim.getEvents(hold, [], 6);
    const [useStart, useOpen] = sim.getEvents(use, [], 5);
    const state = run(sim, [holdStart, useStart, useOpen]);
    const reason = reasonOf(sim, holdEnd, state);
    expect(reason.kind).toBe('open-condition-violated');
    expect(reason.condition).toEqual(fluent('holding'));
  });

  it('rejects an interval that contradicts an open one', () => {
    const needP = durativeAction('needP', {
      duration: fixedDuration(2),
      conditions: [condition(openInterval(atStart(), atEnd()), fluent('p'))],
    });
    const needNotP = durativeAction('needNotP', {
      duration: fixedDuration(2),
      conditions: [condition(openInterval(atStart(), atEnd()), not(fluent('p')))],
    });
    const sim = makeSimulator(makeProblem([needP, needNotP]));
    const [aStart, aOpen] = sim.getEvents(needP, [], 2);
    const [bStart, bOpen] = sim.getEvents(needNotP, [], 2);
    const state = run(sim, [aStart, aOpen, bStart]);
    expect(reasonOf(sim, bOpen, state).kind).toBe('incompatible-open-condition');
  });

  it('reports an event that writes one fluent twice', () => {
    const toggle = instantaneousAction('toggle', {
      effects: [assign(fluent('x'), true), assign(fluent('x'), false)],
    });
    const sim = makeSimulator(makeProblem([toggle]));
    const reason = reasonOf(sim, sim.getEvents(toggle)[0], sim.initialState());
    expect(reason.kind).toBe('conflicting-effects');
    expect(reason.fluents).toEqual(['x']);
  });

  it('applies the accumulated change of a continuous effect', () => {
    const fill = durativeAction('fill', {
      duration: fixedDuration(4),
      continuousEffects: [continuousEffect('increase', openInterval(atStart(), atEnd()), fluent('level'), 3)],
    });
    const sim = makeSimulator(makeProblem([fill]));
    const events = sim.getEvents(fill, [], 4);
    expect(events.map((e) => e.label)).toEqual([
      'fill#1.start',
      'fill#1.open(0, 4)',
      'fill#1.close(0, 4)',
      'fill#1.end',
    ]);
    const state = run(sim, events);
    expect(sim.evaluator.evaluateNumber(fluent('level'), state.valuation).toString()).toBe('12');
  });

  it('asks the provider for simulated effects', () => {
    const sense = instantaneousAction('sense', {
      simulatedEffect: { timing: atStart(), fluents: [fluent('reading')] },
    });
    const prob = makeProblem([sense]);

    const bare = makeSimulator(prob);
    expect(() => bare.tryApply(bare.getEvents(sense)[0], bare.initialState())).toThrow(MissingCapabilityError);

    const sim = new TemporalSimulator(prob, {
      logger: silentLogger,
      simulatedEffects: { values: () => [r(7)] },
    });
    const state = run(sim, sim.getEvents(sense));
    expect(sim.evaluator.evaluateNumber(fluent('reading'), state.valuation).toString()).toBe('7');
  });
});

// ---------------------------------------------------------------------------
// Temporal network
// ---------------------------------------------------------------------------

describe('TemporalSimulator timing', () => {
  const w1 = instantaneousAction('w1', { effects: [assign(fluent('x'), true)] });
  const w2 = instantaneousAction('w2', { effects: [assign(fluent('x'), true)] });

  it('separates writes of one fluent by epsilon', () => {
    const sim = makeSimulator(makeProblem([w1, w2]));
    const [aStart, aEnd] = sim.getEvents(w1);
    const [bStart] = sim.getEvents(w2);
    const state = run(sim, [aStart, aEnd]);

    const clash = sim.tryApply(bStart, state, { at: r(0) });
    expect(clash.ok).toBe(false);
    if (!clash.ok) {
      expect(clash.reason.kind).toBe('temporal-inconsistency');
      expect(clash.reason.witness?.[0]).toBe(sim.getPlanStartEvent());
      expect(clash.reason.witness?.[1]).toBe(bStart);
    }
    expect(sim.isApplicable(bStart, state, { at: sim.epsilon })).toBe(true);
  });

  it('lets events of one activity share an instant', () => {
    const sim = makeSimulator(makeProblem([w1]));
    const [start, end] = sim.getEvents(w1);
    const state = sim.apply(start, sim.initialState(), { at: r(2) });
    expect(sim.isApplicable(end, state, { at: r(2) })).toBe(true);
    expect(sim.isApplicable(end, state, { at: r(3) })).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Plan events and goals
// ---------------------------------------------------------------------------

describe('TemporalSimulator plan events', () => {
  it('does not close the plan while an activity runs', () => {
    const { problem: prob, hold } = makeResourceDomain();
    const sim = makeSimulator(prob);
    const state = run(sim, sim.getEvents(hold, [], 6).slice(0, 1));
    expect(reasonOf(sim, sim.getPlanEndEvent(), state).kind).toBe('out-of-order');
  });

  it('does not close the plan before its timed goals are checked', () => {
    const sim = makeSimulator(
      makeProblem([], { timedGoals: [condition(closedInterval(globalStart(1), globalStart(2)), fluent('p'))] }),
    );
    expect(reasonOf(sim, sim.getPlanEndEvent(), sim.initialState()).kind).toBe('pending-conditions');
  });

  it('reaches the goal once every goal holds and nothing runs', () => {
    const { problem: prob } = makeSwitchDomain();
    const sim = makeSimulator(prob);
    expect(sim.isGoal(sim.initialState())).toBe(false);
    const state = run(sim, [...sim.getEvents('a'), ...sim.getEvents('b')]);
    expect(sim.getUnsatisfiedGoals(state)).toEqual([]);
    expect(sim.isGoal(state)).toBe(true);
  });
});
