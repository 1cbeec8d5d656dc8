import type { FluentKey, Value } from '../../types/index.js';

const MAX_CHAIN = 32;

/**
 * Copy-on-write fluent assignment. `with` layers the changed keys over the
 * current valuation instead of copying it; the chain is squashed into one
 * map once it grows past MAX_CHAIN layers.
 */
export class Valuation {
  private readonly values: ReadonlyMap<FluentKey, Value>;
  private readonly parent: Valuation | undefined;
  private readonly depth: number;

  constructor(values: Iterable<readonly [FluentKey, Value]> = [], parent?: Valuation) {
    this.values = new Map(values);
    this.parent = parent;
    this.depth = parent ? parent.depth + 1 : 0;
  }

  get(key: FluentKey): Value | undefined {
    for (let v: Valuation | undefined = this; v; v = v.parent) {
      const value = v.values.get(key);
      if (value !== undefined) return value;
    }
    return undefined;
  }

  has(key: FluentKey): boolean {
    return this.get(key) !== undefined;
  }

  with(updates: ReadonlyMap<FluentKey, Value>): Valuation {
    if (updates.size === 0) return this;
    if (this.depth >= MAX_CHAIN) {
      const flat = new Map(this.entries());
      for (const [k, v] of updates) flat.set(k, v);
      return new Valuation(flat);
    }
    return new Valuation(updates, this);
  }

  /** Every assigned key with its current value. */
  entries(): Map<FluentKey, Value> {
    const layers: Valuation[] = [];
    for (let v: Valuation | undefined = this; v; v = v.parent) layers.push(v);
    const result = new Map<FluentKey, Value>();
    for (let i = layers.length - 1; i >= 0; i--) {
      for (const [k, value] of layers[i].values) result.set(k, value);
    }
    return result;
  }
}
