export { ActionInstance } from './action-instance.js';
export { PartialOrderPlan } from './partial-order-plan.js';
export { sequentialPlan, timeTriggeredPlan } from './builders.js';
export type { TimeTriggeredEntry } from './builders.js';
export type { SequentialPlan, TimeTriggeredPlan, TimeTriggeredStep } from './types.js';
