/**
 * Progress Computation for the Spaced-Repetition Scheduler
 *
 * Pure, deterministic functions that turn a learner's recall grade into an
 * updated memory model (stability, difficulty) and the next due date.
 *
 * Stability is the number of days the learner is expected to retain the card.
 * Each grade scales it by a tunable multiplier; difficulty drifts up on
 * Again/Hard and down on Good/Easy. The next review is always scheduled
 * `ceil(stability)` days after the review, never earlier.
 *
 * Used by the server's Session Façade; has no I/O and no clock of its own.
 */

import { Rating, type Grade } from 'ts-fsrs';
import { z } from 'zod';
import { InvalidGradeError, InvalidRequestError, InvalidSettingsError } from './errors';

// ============ Types ============

export { Rating, type Grade };

export type GradeName = 'again' | 'hard' | 'good' | 'easy';

export type ProgressStatus = 'new' | 'learning' | 'reviewing' | 'mastered';

/**
 * Memory-model state of one (learner, card) pair.
 * Dates are ISO timestamps; both stay null until the first review.
 */
export interface ProgressState {
  stability: number;             // Days of retention, always > 0
  difficulty: number;            // 1.0 (easy) to 10.0 (hard)
  last_review_at: string | null;
  next_due_at: string | null;    // null = new, due immediately
  repetitions: number;
  lapses: number;                // Reviews graded Again
  status: ProgressStatus;
}

export interface ReviewRecord {
  grade: number;
  reviewed_at: string;
}

export interface UpdateOptions {
  settings?: SchedulerSettings;
  /** The card's intrinsic difficulty, used only when there is no prior state */
  baseDifficulty?: number | null;
}

export interface IntervalPreview {
  grade: Grade;
  intervalDays: number;
  intervalText: string;
  stability: number;
  nextStatus: ProgressStatus;
}

// ============ Constants ============

export const MIN_DIFFICULTY = 1.0;
export const MAX_DIFFICULTY = 10.0;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

// Stability and difficulty are stored at this precision so float noise never
// tips ceil() into an extra day.
const METRIC_PRECISION = 1e6;

export const GRADES: readonly Grade[] = [Rating.Again, Rating.Hard, Rating.Good, Rating.Easy];

const GRADE_NAMES: Record<Grade, GradeName> = {
  [Rating.Again]: 'again',
  [Rating.Hard]: 'hard',
  [Rating.Good]: 'good',
  [Rating.Easy]: 'easy',
};

const STATUS_RANK: Record<ProgressStatus, number> = {
  new: 0,
  learning: 1,
  reviewing: 2,
  mastered: 3,
};

// ============ Settings ============

const positive = z.number().finite().positive();

const SchedulerSettingsSchema = z
  .object({
    stability_multipliers: z.object({
      again: positive,
      hard: positive,
      good: positive,
      easy: positive,
    }),
    minimum_stability: positive,
    maximum_stability: positive,
    initial_stability: positive,
    default_difficulty: z.number().min(MIN_DIFFICULTY).max(MAX_DIFFICULTY),
    difficulty_penalty: z.number().finite().nonnegative(),
    difficulty_reward: z.number().finite().nonnegative(),
    mastery_threshold_days: positive,
  })
  .refine((s) => s.minimum_stability <= s.maximum_stability, {
    message: 'minimum_stability must not exceed maximum_stability',
    path: ['minimum_stability'],
  });

export type SchedulerSettings = z.infer<typeof SchedulerSettingsSchema>;

export type SchedulerSettingsOverrides = Partial<Omit<SchedulerSettings, 'stability_multipliers'>> & {
  stability_multipliers?: Partial<SchedulerSettings['stability_multipliers']>;
};

export const DEFAULT_SCHEDULER_SETTINGS: SchedulerSettings = {
  stability_multipliers: {
    again: 0.25,
    hard: 1.2,
    good: 1.5,
    easy: 2.2,
  },
  minimum_stability: 0.25,      // Floor so the schedule can never collapse
  maximum_stability: 36500,     // ~100 years
  initial_stability: 1.0,
  default_difficulty: 5.0,
  difficulty_penalty: 0.5,      // Again / Hard
  difficulty_reward: 0.2,       // Good / Easy
  mastery_threshold_days: 21,
};

/**
 * Merge overrides onto the defaults and validate the result.
 * Throws InvalidSettingsError naming the first offending field.
 */
export function resolveSchedulerSettings(
  overrides: SchedulerSettingsOverrides = {},
  base: SchedulerSettings = DEFAULT_SCHEDULER_SETTINGS
): SchedulerSettings {
  // Field by field so an explicit `undefined` keeps the base value
  const multipliers = overrides.stability_multipliers ?? {};
  const merged = {
    stability_multipliers: {
      again: multipliers.again ?? base.stability_multipliers.again,
      hard: multipliers.hard ?? base.stability_multipliers.hard,
      good: multipliers.good ?? base.stability_multipliers.good,
      easy: multipliers.easy ?? base.stability_multipliers.easy,
    },
    minimum_stability: overrides.minimum_stability ?? base.minimum_stability,
    maximum_stability: overrides.maximum_stability ?? base.maximum_stability,
    initial_stability: overrides.initial_stability ?? base.initial_stability,
    default_difficulty: overrides.default_difficulty ?? base.default_difficulty,
    difficulty_penalty: overrides.difficulty_penalty ?? base.difficulty_penalty,
    difficulty_reward: overrides.difficulty_reward ?? base.difficulty_reward,
    mastery_threshold_days: overrides.mastery_threshold_days ?? base.mastery_threshold_days,
  };

  const result = SchedulerSettingsSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join('.') : 'settings';
    throw new InvalidSettingsError(`Invalid scheduler setting ${field}: ${issue?.message ?? 'invalid value'}`);
  }
  return result.data;
}

// ============ Grades ============

export function isGrade(value: unknown): value is Grade {
  return GRADES.some((grade) => grade === value);
}

export function gradeName(grade: Grade): GradeName {
  return GRADE_NAMES[grade];
}

// ============ Dates ============

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

/**
 * Due date for a card reviewed at `lastReviewAt` with the given stability.
 * Rounds up so a card never resurfaces a day early.
 */
export function scheduleDueDate(lastReviewAt: Date, stability: number): Date {
  return addDays(lastReviewAt, Math.ceil(stability));
}

function parseTimestamp(value: string): number {
  return new Date(value).getTime();
}

// ============ Initial State ============

function clampDifficulty(difficulty: number): number {
  return Math.min(MAX_DIFFICULTY, Math.max(MIN_DIFFICULTY, difficulty));
}

function roundMetric(value: number): number {
  return Math.round(value * METRIC_PRECISION) / METRIC_PRECISION;
}

/**
 * The implicit state of a card the learner has never reviewed.
 */
export function initialProgressState(
  baseDifficulty?: number | null,
  settings: SchedulerSettings = DEFAULT_SCHEDULER_SETTINGS
): ProgressState {
  const difficulty = baseDifficulty != null && Number.isFinite(baseDifficulty)
    ? clampDifficulty(baseDifficulty)
    : settings.default_difficulty;

  return {
    stability: settings.initial_stability,
    difficulty,
    last_review_at: null,
    next_due_at: null,
    repetitions: 0,
    lapses: 0,
    status: 'new',
  };
}

// ============ Status ============

/**
 * Status only moves forward. Lapses are handled by the caller, which sets
 * `learning` directly.
 */
export function advanceStatus(previous: ProgressStatus, candidate: ProgressStatus): ProgressStatus {
  return STATUS_RANK[candidate] >= STATUS_RANK[previous] ? candidate : previous;
}

// ============ Update ============

/**
 * Apply one graded review to the current state (or to a never-reviewed card
 * when `current` is null).
 *
 * Deterministic: the same state, grade, time and settings always produce an
 * equal result. Throws InvalidGradeError before doing anything else when the
 * grade is not one of the four canonical values.
 */
export function updateProgress(
  current: ProgressState | null,
  grade: number,
  now: Date,
  options: UpdateOptions = {}
): ProgressState {
  if (!isGrade(grade)) {
    throw new InvalidGradeError(grade);
  }
  if (Number.isNaN(now.getTime())) {
    throw new InvalidRequestError('Review time is not a valid date');
  }

  const settings = options.settings ?? DEFAULT_SCHEDULER_SETTINGS;
  const state = current ?? initialProgressState(options.baseDifficulty, settings);

  // A review stamped before the previous one is treated as happening at the
  // previous review, so last_review_at never moves backwards.
  const previousReview = state.last_review_at ? parseTimestamp(state.last_review_at) : NaN;
  const reviewedAt = previousReview > now.getTime() ? new Date(previousReview) : now;

  const priorStability = Number.isFinite(state.stability) && state.stability > 0
    ? state.stability
    : settings.initial_stability;
  const priorDifficulty = Number.isFinite(state.difficulty)
    ? clampDifficulty(state.difficulty)
    : settings.default_difficulty;

  const multiplier = settings.stability_multipliers[gradeName(grade)];
  const stability = Math.min(
    settings.maximum_stability,
    Math.max(settings.minimum_stability, roundMetric(priorStability * multiplier))
  );

  const struggled = grade === Rating.Again || grade === Rating.Hard;
  const difficulty = roundMetric(
    struggled
      ? Math.min(MAX_DIFFICULTY, priorDifficulty + settings.difficulty_penalty)
      : Math.max(MIN_DIFFICULTY, priorDifficulty - settings.difficulty_reward)
  );

  const lapsed = grade === Rating.Again;
  const repetitions = state.repetitions + 1;
  const lapses = lapsed ? state.lapses + 1 : state.lapses;

  let status: ProgressStatus;
  if (lapsed) {
    status = 'learning';
  } else if (stability > settings.mastery_threshold_days) {
    status = advanceStatus(state.status, 'mastered');
  } else if (repetitions >= 1) {
    status = advanceStatus(state.status, 'reviewing');
  } else {
    status = advanceStatus(state.status, 'learning');
  }

  return {
    stability,
    difficulty,
    last_review_at: reviewedAt.toISOString(),
    next_due_at: scheduleDueDate(reviewedAt, stability).toISOString(),
    repetitions,
    lapses,
    status,
  };
}

/**
 * Recompute state by folding review events in chronological order.
 * Returns null when there are no events (the card is still new).
 */
export function replayReviews(
  events: readonly ReviewRecord[],
  options: UpdateOptions = {}
): ProgressState | null {
  const ordered = [...events].sort(
    (a, b) => parseTimestamp(a.reviewed_at) - parseTimestamp(b.reviewed_at)
  );

  let state: ProgressState | null = null;
  for (const event of ordered) {
    state = updateProgress(state, event.grade, new Date(event.reviewed_at), options);
  }
  return state;
}

// ============ Invariants ============

/**
 * List every invariant the state violates. An empty list means consistent.
 */
export function checkProgressInvariants(state: ProgressState): string[] {
  const violations: string[] = [];

  if (!(state.stability > 0) || !Number.isFinite(state.stability)) {
    violations.push(`stability must be positive, got ${state.stability}`);
  }
  if (!(state.difficulty >= MIN_DIFFICULTY && state.difficulty <= MAX_DIFFICULTY)) {
    violations.push(`difficulty must be within [${MIN_DIFFICULTY}, ${MAX_DIFFICULTY}], got ${state.difficulty}`);
  }
  if (!Number.isInteger(state.repetitions) || state.repetitions < 0) {
    violations.push(`repetitions must be a non-negative integer, got ${state.repetitions}`);
  }
  if (!Number.isInteger(state.lapses) || state.lapses < 0 || state.lapses > state.repetitions) {
    violations.push(`lapses must be between 0 and repetitions, got ${state.lapses}`);
  }

  if (state.next_due_at !== null) {
    if (state.last_review_at === null) {
      violations.push('next_due_at is set without last_review_at');
    } else {
      const expected = scheduleDueDate(new Date(state.last_review_at), state.stability).getTime();
      if (parseTimestamp(state.next_due_at) !== expected) {
        violations.push('next_due_at must equal last_review_at + ceil(stability) days');
      }
    }
  }

  if (state.status === 'new' && state.repetitions > 0) {
    violations.push('a reviewed card cannot be new');
  }

  return violations;
}

// ============ Interval Preview ============

/**
 * Preview the outcome of every grade without committing anything.
 * Used to label rating buttons.
 */
export function getIntervalPreviews(
  current: ProgressState | null,
  now: Date,
  options: UpdateOptions = {}
): IntervalPreview[] {
  return GRADES.map((grade) => {
    const next = updateProgress(current, grade, now, options);
    const intervalDays = Math.ceil(next.stability);
    return {
      grade,
      intervalDays,
      intervalText: formatInterval(intervalDays),
      stability: next.stability,
      nextStatus: next.status,
    };
  });
}

// ============ Utility Functions ============

/**
 * Format an interval in days for display: 2d, 3w, 1.5mo, 2y.
 */
export function formatInterval(days: number): string {
  if (days < 7) {
    return `${Math.round(days)}d`;
  }
  if (days < 30) {
    const weeks = days / 7;
    return weeks === Math.floor(weeks) ? `${weeks}w` : `${weeks.toFixed(1)}w`;
  }
  if (days < 365) {
    const months = days / 30;
    return months === Math.floor(months) ? `${months}mo` : `${months.toFixed(1)}mo`;
  }
  const years = days / 365;
  return years === Math.floor(years) ? `${years}y` : `${years.toFixed(1)}y`;
}
