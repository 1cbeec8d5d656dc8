export { Timepoint } from './timepoint.js';
export type { TimepointKind } from './timepoint.js';
export { STNPlan } from './stn-plan.js';
export type { STNConstraint, STNConstraintTuple } from './stn-plan.js';
