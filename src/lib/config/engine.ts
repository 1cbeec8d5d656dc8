import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { Rational } from '../rational.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface EngineConfig {
  /** Minimum separation between events that touch the same fluent. */
  epsilon: Rational;
  logLevel: LogLevel;
  /** Upper bound on checked linearizations of a partial-order plan, if any. */
  linearizationLimit?: number;
}

export const DEFAULT_EPSILON = Rational.of(1n, 1000n);

const rationalString = z
  .string()
  .trim()
  .min(1)
  .transform((value, ctx) => {
    let parsed: Rational;
    try {
      parsed = Rational.parse(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${value}' is not a rational number` });
      return z.NEVER;
    }
    if (parsed.sign() <= 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be strictly positive' });
      return z.NEVER;
    }
    return parsed;
  });

const envSchema = z.object({
  TEMPORAL_EPSILON: rationalString.optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  VALIDATOR_LINEARIZATION_LIMIT: z.coerce.number().int().positive().optional(),
});

let cachedConfig: EngineConfig | undefined;

/**
 * Reads TEMPORAL_EPSILON, LOG_LEVEL and VALIDATOR_LINEARIZATION_LIMIT once and
 * caches the result. Throws ValidationError when any of them is malformed.
 */
export function getEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  if (cachedConfig !== undefined) {
    return cachedConfig;
  }

  const parsed = envSchema.safeParse({
    TEMPORAL_EPSILON: env.TEMPORAL_EPSILON || undefined,
    LOG_LEVEL: env.LOG_LEVEL || undefined,
    VALIDATOR_LINEARIZATION_LIMIT: env.VALIDATOR_LINEARIZATION_LIMIT || undefined,
  });

  if (!parsed.success) {
    throw new ValidationError('Invalid engine configuration', {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  const config: EngineConfig = {
    epsilon: parsed.data.TEMPORAL_EPSILON ?? DEFAULT_EPSILON,
    logLevel: parsed.data.LOG_LEVEL ?? 'info',
    linearizationLimit: parsed.data.VALIDATOR_LINEARIZATION_LIMIT,
  };

  cachedConfig = config;
  return config;
}

/**
 * Reset the cached config. Intended for tests only.
 */
export function resetEngineConfigCache(): void {
  cachedConfig = undefined;
}
