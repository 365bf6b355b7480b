/**
 * Service configuration, read from environment variables.
 *
 * Every variable is optional; defaults match the scheduler defaults.
 * Invalid values fail fast with a ConfigError naming the variable.
 */

import { z } from 'zod';
import {
  DEFAULT_REVIEWS_PER_NEW_CARD,
  resolveSchedulerSettings,
  SchedulingError,
  type SchedulerSettings,
} from '@spaced-review/shared/scheduler';
import { ConfigError } from './errors';
import type { LogLevel } from './logger';

export interface AppConfig {
  databasePath: string;
  logLevel: LogLevel;
  reviewsPerNewCard: number;
  maxGradeAttempts: number;
  /** 0 = always use server time for reviews */
  clockSkewToleranceMs: number;
  scheduler: SchedulerSettings;
}

type Env = Record<string, string | undefined>;

const EnvSchema = z.object({
  SPACED_REVIEW_DB_PATH: z.string().min(1).default('spaced-review.db'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  REVIEWS_PER_NEW_CARD: z.coerce.number().int().min(1).default(DEFAULT_REVIEWS_PER_NEW_CARD),
  MAX_GRADE_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(3),
  CLOCK_SKEW_TOLERANCE_MS: z.coerce.number().int().min(0).default(0),
  MASTERY_THRESHOLD_DAYS: z.coerce.number().positive().optional(),
  MINIMUM_STABILITY: z.coerce.number().positive().optional(),
});

// Treat empty strings as unset, the way shells export them
function withoutBlanks(env: Env): Env {
  const cleaned: Env = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[name] = value.trim();
    }
  }
  return cleaned;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const name = issue?.path.join('.') || 'environment';
    throw new ConfigError(`Invalid ${name}: ${issue?.message ?? 'invalid value'}`);
  }

  const vars = parsed.data;

  let scheduler: SchedulerSettings;
  try {
    scheduler = resolveSchedulerSettings({
      mastery_threshold_days: vars.MASTERY_THRESHOLD_DAYS,
      minimum_stability: vars.MINIMUM_STABILITY,
    });
  } catch (err) {
    if (err instanceof SchedulingError) {
      throw new ConfigError(err.message);
    }
    throw err;
  }

  return {
    databasePath: vars.SPACED_REVIEW_DB_PATH,
    logLevel: vars.LOG_LEVEL,
    reviewsPerNewCard: vars.REVIEWS_PER_NEW_CARD,
    maxGradeAttempts: vars.MAX_GRADE_ATTEMPTS,
    clockSkewToleranceMs: vars.CLOCK_SKEW_TOLERANCE_MS,
    scheduler,
  };
}
