export { Valuation } from './valuation.js';
export { StateEvaluator, valueEquals, formatValue } from './state-evaluator.js';
export type { Bindings, Literal } from './state-evaluator.js';
