import type { ActionInstance } from '../plans/index.js';

export type TimepointKind = 'global-start' | 'global-end' | 'start' | 'end';

const starts = new WeakMap<ActionInstance, Timepoint>();
const ends = new WeakMap<ActionInstance, Timepoint>();

/**
 * Start or end instant of an action instance, or of the plan itself.
 * Timepoints are interned, so `===` is equality.
 */
export class Timepoint {
  static readonly GLOBAL_START = new Timepoint('global-start');
  static readonly GLOBAL_END = new Timepoint('global-end');

  readonly kind: TimepointKind;
  readonly instance: ActionInstance | undefined;

  private constructor(kind: TimepointKind, instance?: ActionInstance) {
    this.kind = kind;
    this.instance = instance;
  }

  static start(instance: ActionInstance): Timepoint {
    let tp = starts.get(instance);
    if (!tp) {
      tp = new Timepoint('start', instance);
      starts.set(instance, tp);
    }
    return tp;
  }

  static end(instance: ActionInstance): Timepoint {
    let tp = ends.get(instance);
    if (!tp) {
      tp = new Timepoint('end', instance);
      ends.set(instance, tp);
    }
    return tp;
  }

  get isGlobal(): boolean {
    return this.instance === undefined;
  }

  get label(): string {
    return this.instance === undefined ? this.kind : `${this.kind}(${this.instance.label})`;
  }

  toString(): string {
    return this.label;
  }
}
