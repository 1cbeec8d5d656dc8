export * from './types/index.js';
export { Rational, rational } from './lib/rational.js';
export type { RationalLike } from './lib/rational.js';
export * from './lib/errors.js';
export { getEngineConfig, resetEngineConfigCache, DEFAULT_EPSILON } from './lib/config/engine.js';
export type { EngineConfig, LogLevel } from './lib/config/engine.js';
export { getLogger, childLogger, setLogger } from './lib/logger.js';
export type { Logger } from './lib/logger.js';

export * from './engine/plans/index.js';
export * from './engine/network/index.js';
export * from './engine/stn-plan/index.js';
export * from './engine/evaluation/index.js';
export * from './engine/simulator/index.js';
export * from './engine/validator/index.js';
