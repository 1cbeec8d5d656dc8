import { pino } from 'pino';
import type { Logger } from 'pino';
import { getEngineConfig } from './config/engine.js';

export type { Logger };

let rootLogger: Logger | undefined;

export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      name: 'temporal-plan-engine',
      level: getEngineConfig().logLevel,
    });
  }
  return rootLogger;
}

export function childLogger(component: string): Logger {
  return getLogger().child({ component });
}

/**
 * Replace the root logger (for example with `pino({ level: 'silent' })` in tests).
 */
export function setLogger(logger: Logger): void {
  rootLogger = logger;
}
