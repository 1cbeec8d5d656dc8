import { InconsistentPlanError, InvalidDurationError } from '../../lib/errors.js';
import { Rational } from '../../lib/rational.js';
import { TemporalNetwork } from '../network/index.js';
import type { ActionInstance, TimeTriggeredPlan, TimeTriggeredStep } from '../plans/index.js';
import { Timepoint } from './timepoint.js';

/** `lower <= time(to) - time(from) <= upper`, seen from the owning node. */
export interface STNConstraint {
  readonly lower?: Rational;
  readonly upper?: Rational;
  readonly to: Timepoint;
}

/** `[a, lower, upper, b]`: `lower <= time(b) - time(a) <= upper`. */
export type STNConstraintTuple = readonly [Timepoint, Rational | undefined, Rational | undefined, Timepoint];

type DistanceRows = Map<Timepoint, Map<Timepoint, Rational>>;

const { GLOBAL_START, GLOBAL_END } = Timepoint;

function setTighter(rows: DistanceRows, from: Timepoint, to: Timepoint, weight: Rational): void {
  let row = rows.get(from);
  if (!row) {
    row = new Map();
    rows.set(from, row);
  }
  const existing = row.get(to);
  if (existing === undefined || weight.lt(existing)) {
    row.set(to, weight);
  }
}

/** Edges that follow from every node lying between global start and global end. */
function impliedByAnchors(from: Timepoint, to: Timepoint, weight: Rational): boolean {
  if (weight.sign() < 0) return false;
  return to === GLOBAL_START || from === GLOBAL_END;
}

/**
 * Plan whose steps are placed by interval constraints between timepoints
 * rather than by absolute times. Every node lies after GLOBAL_START and before
 * GLOBAL_END.
 *
 * Constraints are kept as a distance graph (`from → to` weighted `w` meaning
 * `time(to) - time(from) <= w`), tightest bound per ordered pair. A negative
 * cycle that collapses onto one node is recorded as
 * `GLOBAL_END - GLOBAL_START <= w` with `w < 0`, which the anchors contradict.
 */
export class STNPlan {
  readonly kind = 'stn';
  private order: Timepoint[];
  private rows: DistanceRows;

  constructor(constraints: Iterable<STNConstraintTuple> = []) {
    this.order = [GLOBAL_START, GLOBAL_END];
    this.rows = new Map();
    for (const [from, lower, upper, to] of constraints) {
      this.addConstraint(from, lower, upper, to);
    }
  }

  /** Builds a plan from the node → outgoing constraints shape `getConstraints` returns. */
  static fromConstraintMap(constraints: ReadonlyMap<Timepoint, readonly STNConstraint[]>): STNPlan {
    const plan = new STNPlan();
    for (const [from, list] of constraints) {
      plan.addNode(from);
      for (const c of list) plan.addConstraint(from, c.lower, c.upper, c.to);
    }
    return plan;
  }

  static fromTimeTriggeredPlan(plan: TimeTriggeredPlan): STNPlan {
    const tuples: STNConstraintTuple[] = [];
    for (const step of plan.steps) {
      const start = Timepoint.start(step.instance);
      const end = Timepoint.end(step.instance);
      const duration = stepDuration(step);
      tuples.push([GLOBAL_START, step.start, step.start, start]);
      tuples.push([start, duration, duration, end]);
    }
    return new STNPlan(tuples);
  }

  /** Node list in insertion order, global nodes first. */
  nodes(): readonly Timepoint[] {
    return this.order;
  }

  instances(): ActionInstance[] {
    const seen = new Set<ActionInstance>();
    for (const tp of this.order) {
      if (tp.instance) seen.add(tp.instance);
    }
    return [...seen];
  }

  contains(instance: ActionInstance): boolean {
    return this.index(Timepoint.start(instance)) !== -1 || this.index(Timepoint.end(instance)) !== -1;
  }

  /**
   * Fresh network over the plan's nodes: every stored edge plus the anchors
   * `0 <= node - GLOBAL_START` and `0 <= GLOBAL_END - node`.
   */
  toNetwork(): TemporalNetwork<Timepoint> {
    const network = new TemporalNetwork<Timepoint>();
    for (const node of this.order) network.addNode(node);
    network.add(GLOBAL_START, GLOBAL_END, Rational.ZERO);
    for (const node of this.order) {
      if (node.isGlobal) continue;
      network.add(GLOBAL_START, node, Rational.ZERO);
      network.add(node, GLOBAL_END, Rational.ZERO);
    }
    for (const [from, row] of this.rows) {
      for (const [to, weight] of row) {
        network.add(from, to, undefined, weight);
      }
    }
    return network;
  }

  isConsistent(): boolean {
    return this.toNetwork().check();
  }

  /**
   * Each constrained unordered pair once, self-loops dropped, with the
   * tightest bound recorded for it (including bounds composed by
   * `replaceActionInstances`). With `closed`, every pair gets its tightest
   * implied bound instead.
   */
  getConstraints(options: { closed?: boolean } = {}): Map<Timepoint, STNConstraint[]> {
    const rows = options.closed ? this.closure() : this.rows;
    const result = new Map<Timepoint, STNConstraint[]>();
    const push = (from: Timepoint, c: STNConstraint): void => {
      const list = result.get(from);
      if (list) list.push(c);
      else result.set(from, [c]);
    };

    for (let i = 0; i < this.order.length; i++) {
      for (let j = i + 1; j < this.order.length; j++) {
        const a = this.order[i];
        const b = this.order[j];
        const ab = rows.get(a)?.get(b);
        const ba = rows.get(b)?.get(a);
        if (ab === undefined && ba === undefined) continue;

        const lowerAB = ba?.neg();
        const lowerBA = ab?.neg();
        if (lowerAB !== undefined && lowerAB.sign() >= 0) {
          push(a, { lower: lowerAB, upper: ab, to: b });
        } else if (lowerBA !== undefined && lowerBA.sign() >= 0) {
          push(b, { lower: lowerBA, upper: ba, to: a });
        } else if (ab === undefined) {
          push(b, { upper: ba, to: a });
        } else {
          push(a, { lower: lowerAB, upper: ab, to: b });
        }
      }
    }
    return result;
  }

  /**
   * All-pairs tightest implied distances (Floyd-Warshall), anchors included.
   * Only meaningful for a consistent plan.
   */
  closure(): DistanceRows {
    if (!this.isConsistent()) {
      throw new InconsistentPlanError('Cannot close an inconsistent STN plan');
    }
    const dist: DistanceRows = new Map();
    for (const node of this.order) dist.set(node, new Map([[node, Rational.ZERO]]));
    for (const edge of this.toNetwork().edges()) {
      setTighter(dist, edge.from, edge.to, edge.weight);
    }

    for (const k of this.order) {
      const fromK = dist.get(k);
      if (!fromK) continue;
      for (const i of this.order) {
        const ik = dist.get(i)?.get(k);
        if (ik === undefined) continue;
        for (const [j, kj] of fromK) {
          setTighter(dist, i, j, ik.add(kj));
        }
      }
    }
    return dist;
  }

  /**
   * New plan where each instance is replaced by `f(instance)`, or eliminated
   * when `f` returns undefined. Eliminating node X composes every
   * `A → X (w1)`, `X → B (w2)` into `A → B (w1 + w2)`, so bounds implied
   * through X survive its removal.
   */
  replaceActionInstances(f: (instance: ActionInstance) => ActionInstance | undefined): STNPlan {
    const rows: DistanceRows = new Map();
    for (const [from, row] of this.rows) rows.set(from, new Map(row));
    const order = [...this.order];

    const replacement = new Map<Timepoint, Timepoint>();
    const dropped: Timepoint[] = [];
    for (const instance of this.instances()) {
      const target = f(instance);
      const start = Timepoint.start(instance);
      const end = Timepoint.end(instance);
      if (target === undefined) {
        dropped.push(start, end);
      } else {
        replacement.set(start, Timepoint.start(target));
        replacement.set(end, Timepoint.end(target));
      }
    }

    for (const node of dropped) {
      if (!order.includes(node)) continue;
      eliminate(rows, node);
      order.splice(order.indexOf(node), 1);
    }

    const rename = (tp: Timepoint): Timepoint => replacement.get(tp) ?? tp;
    const result = new STNPlan();
    for (const node of order) result.addNode(rename(node));
    for (const node of order) {
      for (const [to, weight] of rows.get(node) ?? []) {
        result.addEdge(rename(node), rename(to), weight);
      }
    }
    return result;
  }

  /**
   * Earliest-time schedule of the plan; durations are those of that
   * schedule. Instances whose start and end coincide and whose action is
   * instantaneous carry no duration.
   */
  toTimeTriggeredPlan(): TimeTriggeredPlan {
    if (!this.isConsistent()) {
      throw new InconsistentPlanError('Cannot schedule an inconsistent STN plan');
    }
    const dist = this.closure();
    // earliest time: -(shortest distance from node to GLOBAL_START)
    const earliest = (tp: Timepoint): Rational => dist.get(tp)?.get(GLOBAL_START)?.neg() ?? Rational.ZERO;

    const steps: TimeTriggeredStep[] = this.instances().map((instance) => {
      const start = earliest(Timepoint.start(instance));
      const end = this.index(Timepoint.end(instance)) === -1 ? start : earliest(Timepoint.end(instance));
      return instance.action.kind === 'instantaneous'
        ? { start, instance }
        : { start, instance, duration: end.sub(start) };
    });
    steps.sort((x, y) => x.start.compare(y.start));
    return { kind: 'time-triggered', steps };
  }

  private index(tp: Timepoint): number {
    return this.order.indexOf(tp);
  }

  private addNode(tp: Timepoint): void {
    if (this.index(tp) === -1) this.order.push(tp);
  }

  private addConstraint(from: Timepoint, lower: Rational | undefined, upper: Rational | undefined, to: Timepoint): void {
    this.addNode(from);
    this.addNode(to);
    if (upper !== undefined) this.addEdge(from, to, upper);
    if (lower !== undefined) this.addEdge(to, from, lower.neg());
  }

  private addEdge(from: Timepoint, to: Timepoint, weight: Rational): void {
    this.addNode(from);
    this.addNode(to);
    if (from === to) {
      if (weight.sign() < 0) setTighter(this.rows, GLOBAL_START, GLOBAL_END, weight);
      return;
    }
    setTighter(this.rows, from, to, weight);
  }
}

function stepDuration(step: TimeTriggeredStep): Rational {
  if (step.instance.action.kind === 'instantaneous') {
    return Rational.ZERO;
  }
  if (step.duration === undefined) {
    throw new InvalidDurationError(`Durative step '${step.instance.label}' has no duration`, {
      instance: step.instance.label,
    });
  }
  return step.duration;
}

function eliminate(rows: DistanceRows, node: Timepoint): void {
  const incoming: [Timepoint, Rational][] = [[GLOBAL_END, Rational.ZERO]];
  for (const [from, row] of rows) {
    const w = row.get(node);
    if (from !== node && w !== undefined) {
      incoming.push([from, w]);
      row.delete(node);
    }
  }
  const outgoing: [Timepoint, Rational][] = [[GLOBAL_START, Rational.ZERO]];
  for (const [to, w] of rows.get(node) ?? []) {
    if (to !== node) outgoing.push([to, w]);
    else if (w.sign() < 0) setTighter(rows, GLOBAL_START, GLOBAL_END, w);
  }
  rows.delete(node);

  for (const [a, w1] of incoming) {
    for (const [b, w2] of outgoing) {
      const w = w1.add(w2);
      if (a === b) {
        // a negative cycle through the node outlives it
        if (w.sign() < 0) setTighter(rows, GLOBAL_START, GLOBAL_END, w);
        continue;
      }
      if (impliedByAnchors(a, b, w)) continue;
      setTighter(rows, a, b, w);
    }
  }
}
