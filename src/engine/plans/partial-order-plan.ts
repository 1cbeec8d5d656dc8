import { ValidationError } from '../../lib/errors.js';
import type { ActionInstance } from './action-instance.js';
import type { SequentialPlan } from './types.js';

/**
 * A plan whose steps are only partially ordered. Every linearization
 * (topological order of the precedence graph) is a sequential plan that must
 * be valid for the partial-order plan to be valid.
 */
export class PartialOrderPlan {
  readonly kind = 'partial-order';
  private nodes: ActionInstance[];
  /** forward edges: step → steps that must come after it */
  private successors: Map<ActionInstance, ActionInstance[]>;
  private predecessorCount: Map<ActionInstance, number>;

  /**
   * @param ordering each step mapped to the steps that must follow it; a step
   *   with no constraints maps to an empty list
   */
  constructor(ordering: ReadonlyMap<ActionInstance, readonly ActionInstance[]>) {
    this.nodes = [];
    this.successors = new Map();
    this.predecessorCount = new Map();

    const addNode = (node: ActionInstance): void => {
      if (this.successors.has(node)) return;
      this.nodes.push(node);
      this.successors.set(node, []);
      this.predecessorCount.set(node, 0);
    };

    for (const [node, next] of ordering) {
      addNode(node);
      for (const succ of next) addNode(succ);
    }

    for (const [node, next] of ordering) {
      const out = this.successors.get(node) ?? [];
      for (const succ of next) {
        if (succ === node) {
          throw new ValidationError(`Step '${node.label}' is ordered before itself`);
        }
        if (out.includes(succ)) continue;
        out.push(succ);
        this.predecessorCount.set(succ, (this.predecessorCount.get(succ) ?? 0) + 1);
      }
    }

    if (this.topologicalOrder().length !== this.nodes.length) {
      throw new ValidationError('Cycle detected: the ordering of the plan steps is not a partial order');
    }
  }

  get steps(): readonly ActionInstance[] {
    return this.nodes;
  }

  successorsOf(step: ActionInstance): readonly ActionInstance[] {
    return this.successors.get(step) ?? [];
  }

  /**
   * Lazy, restartable enumeration: every call to `[Symbol.iterator]` starts a
   * fresh depth-first walk. The number of linearizations can be exponential;
   * callers bound how many they consume.
   */
  linearizations(): Iterable<SequentialPlan> {
    return {
      [Symbol.iterator]: () => this.walk(),
    };
  }

  /** The linearization that always picks the earliest declared ready step. */
  toSequentialPlan(): SequentialPlan {
    return { kind: 'sequential', actions: this.topologicalOrder() };
  }

  private topologicalOrder(): ActionInstance[] {
    // Kahn's algorithm, ready steps taken in declaration order
    const inDegree = new Map(this.predecessorCount);
    const ready = this.nodes.filter((n) => inDegree.get(n) === 0);
    const result: ActionInstance[] = [];
    while (ready.length > 0) {
      ready.sort((a, b) => this.nodes.indexOf(a) - this.nodes.indexOf(b));
      const current = ready.shift();
      if (current === undefined) break;
      result.push(current);
      for (const succ of this.successors.get(current) ?? []) {
        const deg = (inDegree.get(succ) ?? 0) - 1;
        inDegree.set(succ, deg);
        if (deg === 0) ready.push(succ);
      }
    }
    return result;
  }

  private *walk(): Generator<SequentialPlan> {
    const inDegree = new Map(this.predecessorCount);
    const prefix: ActionInstance[] = [];
    const placed = new Set<ActionInstance>();
    const nodes = this.nodes;
    const successors = this.successors;

    function* extend(): Generator<SequentialPlan> {
      if (prefix.length === nodes.length) {
        yield { kind: 'sequential', actions: [...prefix] };
        return;
      }
      for (const node of nodes) {
        if (placed.has(node) || inDegree.get(node) !== 0) continue;
        placed.add(node);
        prefix.push(node);
        const next = successors.get(node) ?? [];
        for (const succ of next) inDegree.set(succ, (inDegree.get(succ) ?? 0) - 1);
        yield* extend();
        for (const succ of next) inDegree.set(succ, (inDegree.get(succ) ?? 0) + 1);
        prefix.pop();
        placed.delete(node);
      }
    }

    yield* extend();
  }
}
