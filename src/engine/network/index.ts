export { TemporalNetwork } from './temporal-network.js';
export type { Bound, DistanceEdge } from './temporal-network.js';
