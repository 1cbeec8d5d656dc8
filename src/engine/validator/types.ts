import type { Logger } from '../../lib/logger.js';
import type { Rational, RationalLike } from '../../lib/rational.js';
import type { Expression, FluentKey, QualityMetric, TrajectoryConstraint } from '../../types/index.js';
import type { PartialOrderPlan, SequentialPlan, TimeTriggeredPlan } from '../plans/index.js';
import type { Inapplicability, SimulatedEffectProvider } from '../simulator/index.js';
import type { STNPlan } from '../stn-plan/index.js';

export type Plan = SequentialPlan | TimeTriggeredPlan | PartialOrderPlan | STNPlan;

export type ValidationStatus = 'VALID' | 'INVALID';

export type Violation =
  | {
      readonly kind: 'inapplicable-event';
      readonly time: Rational;
      readonly reason: Inapplicability;
      readonly message: string;
    }
  | {
      readonly kind: 'conflicting-effects';
      readonly time: Rational;
      readonly events: readonly string[];
      readonly fluents: readonly FluentKey[];
      readonly message: string;
    }
  | {
      readonly kind: 'trajectory-constraint';
      readonly constraint: TrajectoryConstraint;
      readonly time: Rational | undefined;
      readonly message: string;
    }
  | {
      readonly kind: 'unsatisfied-goals';
      readonly goals: readonly Expression[];
      readonly message: string;
    }
  | {
      readonly kind: 'temporal-inconsistency';
      readonly witness: readonly [string, string] | undefined;
      readonly message: string;
    };

export type ViolationKind = Violation['kind'];

export interface MetricValue {
  readonly metric: QualityMetric;
  readonly value: Rational;
}

export interface LogMessage {
  readonly level: 'info' | 'warning' | 'error';
  readonly message: string;
}

/** One applied event of the run, for inspection. */
export interface TraceEntry {
  readonly time: Rational;
  readonly event: string;
}

export interface ValidationResult {
  readonly status: ValidationStatus;
  readonly violation?: Violation;
  readonly unsatisfiedGoals: readonly Expression[];
  readonly metricValues: readonly MetricValue[];
  readonly logs: readonly LogMessage[];
  readonly trace: readonly TraceEntry[];
}

export interface ValidatorOptions {
  epsilon?: RationalLike;
  /** Partial-order plans: check at most this many linearizations. */
  linearizationLimit?: number;
  simulatedEffects?: SimulatedEffectProvider;
  logger?: Logger;
}
