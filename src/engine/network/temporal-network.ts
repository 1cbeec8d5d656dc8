import { Rational } from '../../lib/rational.js';

export interface Bound {
  lower?: Rational;
  upper?: Rational;
}

/** Distance-graph edge: `time(to) - time(from) <= weight`. */
export interface DistanceEdge<N> {
  from: N;
  to: N;
  weight: Rational;
}

/**
 * Incremental simple temporal network (Delta-STN).
 *
 * `add(a, b, lower, upper)` records `lower <= time(b) - time(a) <= upper`.
 * Each bound is stored as an edge of the distance graph, and a potential
 * function over the nodes is kept feasible by relaxing only from the head of
 * the newest edge. The network is inconsistent exactly when that relaxation
 * lowers the potential of the edge's tail, i.e. the new edge closes a negative
 * cycle.
 *
 * Once inconsistent the network ignores further additions, so `witness()`
 * names the one insertion that broke it.
 *
 * Copies share adjacency rows; a row is cloned the first time either side
 * writes to it after the copy.
 */
export class TemporalNetwork<N> {
  private rows: Map<N, Map<N, Rational>>;
  private owned: Set<N>;
  private potentials: Map<N, Rational>;
  private failure: readonly [N, N] | undefined;

  constructor() {
    this.rows = new Map();
    this.owned = new Set();
    this.potentials = new Map();
    this.failure = undefined;
  }

  addNode(node: N): void {
    if (this.potentials.has(node)) return;
    this.potentials.set(node, Rational.ZERO);
    this.rows.set(node, new Map());
    this.owned.add(node);
  }

  has(node: N): boolean {
    return this.potentials.has(node);
  }

  nodes(): N[] {
    return [...this.potentials.keys()];
  }

  /**
   * Adds `lower <= time(to) - time(from) <= upper`. A missing bound is
   * unbounded. A bound looser than one already recorded for the same ordered
   * pair is ignored.
   */
  add(from: N, to: N, lower?: Rational, upper?: Rational): void {
    if (this.failure) return;
    this.addNode(from);
    this.addNode(to);

    if (lower !== undefined && upper !== undefined && lower.gt(upper)) {
      this.failure = [from, to];
      return;
    }
    if (upper !== undefined && !this.addEdge(from, to, upper)) {
      this.failure = [from, to];
      return;
    }
    if (lower !== undefined && !this.addEdge(to, from, lower.neg())) {
      this.failure = [from, to];
    }
  }

  check(): boolean {
    return this.failure === undefined;
  }

  /** The pair passed to the `add` that made the network inconsistent. */
  witness(): readonly [N, N] | undefined {
    return this.failure;
  }

  /**
   * A feasible time for `node`: the assignment `node ↦ model(node)` satisfies
   * every constraint while the network is consistent.
   */
  model(node: N): Rational | undefined {
    if (this.failure) return undefined;
    return this.potentials.get(node);
  }

  /** Tightest recorded bound on `time(to) - time(from)`. */
  bound(from: N, to: N): Bound {
    const upper = this.rows.get(from)?.get(to);
    const lower = this.rows.get(to)?.get(from)?.neg();
    return { lower, upper };
  }

  edges(): DistanceEdge<N>[] {
    const result: DistanceEdge<N>[] = [];
    for (const [from, row] of this.rows) {
      for (const [to, weight] of row) {
        result.push({ from, to, weight });
      }
    }
    return result;
  }

  copy(): TemporalNetwork<N> {
    const clone = new TemporalNetwork<N>();
    clone.rows = new Map(this.rows);
    clone.potentials = new Map(this.potentials);
    clone.failure = this.failure;
    // both sides now share every row
    this.owned = new Set();
    return clone;
  }

  private writableRow(node: N): Map<N, Rational> {
    const row = this.rows.get(node);
    if (row !== undefined && this.owned.has(node)) return row;
    const fresh = new Map(row);
    this.rows.set(node, fresh);
    this.owned.add(node);
    return fresh;
  }

  /** Returns false when the edge closes a negative cycle. */
  private addEdge(from: N, to: N, weight: Rational): boolean {
    if (from === to) {
      return weight.sign() >= 0;
    }
    const existing = this.rows.get(from)?.get(to);
    if (existing !== undefined && existing.le(weight)) return true;
    this.writableRow(from).set(to, weight);

    const potential = (node: N): Rational => this.potentials.get(node) ?? Rational.ZERO;

    const candidate = potential(from).add(weight);
    if (candidate.ge(potential(to))) return true;
    this.potentials.set(to, candidate);

    const queue: N[] = [to];
    const queued = new Set<N>([to]);
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      queued.delete(current);
      const base = potential(current);
      for (const [next, w] of this.rows.get(current) ?? []) {
        const relaxed = base.add(w);
        if (relaxed.ge(potential(next))) continue;
        if (next === from) return false;
        this.potentials.set(next, relaxed);
        if (!queued.has(next)) {
          queued.add(next);
          queue.push(next);
        }
      }
    }
    return true;
  }
}
