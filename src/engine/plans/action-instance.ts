import type { Action } from '../../types/index.js';
import { ArityError } from '../../lib/errors.js';

let nextInstanceId = 0;

/**
 * An action applied to concrete objects. Instances are compared by identity:
 * two instances of the same action with the same arguments are distinct
 * plan steps.
 */
export class ActionInstance {
  readonly id: number;
  readonly action: Action;
  readonly args: readonly string[];
  /** Parameter name → object name. */
  readonly bindings: ReadonlyMap<string, string>;

  constructor(action: Action, args: readonly string[] = []) {
    if (args.length !== action.parameters.length) {
      throw new ArityError(action.name, action.parameters.length, args.length);
    }
    this.id = nextInstanceId++;
    this.action = action;
    this.args = [...args];
    this.bindings = new Map(action.parameters.map((p, i): [string, string] => [p.name, args[i]]));
  }

  get label(): string {
    return this.args.length === 0
      ? this.action.name
      : `${this.action.name}(${this.args.join(', ')})`;
  }

  toString(): string {
    return this.label;
  }
}
