/**
 * Shared Scheduler Module
 *
 * Pure spaced-repetition logic: the progress update rule, scheduler settings,
 * interval previews, event replay and due-set ordering. No I/O; the server
 * package supplies storage, locking and the clock.
 */

export {
  // Types
  Rating,
  type Grade,
  type GradeName,
  type ProgressStatus,
  type ProgressState,
  type ReviewRecord,
  type UpdateOptions,
  type IntervalPreview,
  type SchedulerSettings,
  type SchedulerSettingsOverrides,

  // Constants
  DEFAULT_SCHEDULER_SETTINGS,
  GRADES,
  MIN_DIFFICULTY,
  MAX_DIFFICULTY,

  // Core functions
  initialProgressState,
  updateProgress,
  replayReviews,
  advanceStatus,
  checkProgressInvariants,
  resolveSchedulerSettings,

  // Previews
  getIntervalPreviews,

  // Utility functions
  isGrade,
  gradeName,
  addDays,
  scheduleDueDate,
  formatInterval,
} from './compute-progress';

export {
  DEFAULT_REVIEWS_PER_NEW_CARD,
  type DueReviewSortKey,
  type NewCardSortKey,
  type InterleaveOptions,
  compareDueReviews,
  compareNewCards,
  interleaveDue,
} from './due-order';

export {
  type SchedulingErrorCode,
  SchedulingError,
  InvalidGradeError,
  InvalidRequestError,
  InvalidSettingsError,
} from './errors';
