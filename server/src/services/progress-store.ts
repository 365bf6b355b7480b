import type { Grade, ProgressState } from '@spaced-review/shared/scheduler';
import { guardStore, type SqliteDatabase } from '../db/connection';
import {
  getCardReviewEvents,
  getDueReviews,
  getNewCards,
  getProgress,
  getQueueCounts,
  getReviewEventById,
  insertLearner,
  insertProgress,
  insertReviewEvent,
  updateProgressIfVersion,
} from '../db/queries';
import { InvalidRequestError } from '../errors';
import type {
  DueQueryOptions,
  DueSnapshot,
  Progress,
  ProgressKey,
  QueueCounts,
  ReviewEvent,
} from '../types';

/**
 * The review being recorded alongside a progress write.
 */
export interface ReviewInput {
  id: string;
  grade: Grade;
  reviewed_at: string;
}

export type CommitConflict = 'version_conflict' | 'duplicate_review';

export type CommitResult =
  | { committed: true; progress: Progress; review: ReviewEvent }
  | { committed: false; reason: CommitConflict };

export interface ProgressStore {
  get(key: ProgressKey): Promise<Progress | null>;
  /**
   * Atomically record a review and write the resulting progress, provided
   * the stored row is still at `expectedVersion` (null: no row yet).
   * The learner joins the roster with their first committed review.
   * Nothing is written when the result is not committed.
   */
  commit(
    key: ProgressKey,
    next: ProgressState,
    expectedVersion: number | null,
    review: ReviewInput,
    now: Date
  ): Promise<CommitResult>;
  findReview(reviewId: string): Promise<ReviewEvent | null>;
  listReviews(key: ProgressKey): Promise<ReviewEvent[]>;
  loadDueSnapshot(learnerId: string, now: Date, options?: DueQueryOptions): Promise<DueSnapshot>;
  countQueues(learnerId: string, now: Date, scope?: string): Promise<QueueCounts>;
}

export class SqliteProgressStore implements ProgressStore {
  constructor(private readonly db: SqliteDatabase) {}

  async get(key: ProgressKey): Promise<Progress | null> {
    return guardStore('getProgress', () => getProgress(this.db, key));
  }

  async commit(
    key: ProgressKey,
    next: ProgressState,
    expectedVersion: number | null,
    review: ReviewInput,
    now: Date
  ): Promise<CommitResult> {
    const nextDueAt = next.next_due_at;
    if (nextDueAt === null) {
      throw new InvalidRequestError('Cannot commit progress without a due date');
    }

    const write = (): CommitResult => {
      if (getReviewEventById(this.db, review.id)) {
        return { committed: false, reason: 'duplicate_review' };
      }

      const progress: Progress = {
        ...next,
        learner_id: key.learnerId,
        card_id: key.cardId,
        version: expectedVersion === null ? 1 : expectedVersion + 1,
        updated_at: now.toISOString(),
      };

      const written = expectedVersion === null
        ? insertProgress(this.db, progress)
        : updateProgressIfVersion(this.db, progress, expectedVersion);
      if (!written) {
        return { committed: false, reason: 'version_conflict' };
      }

      const event: ReviewEvent = {
        id: review.id,
        learner_id: key.learnerId,
        card_id: key.cardId,
        grade: review.grade,
        reviewed_at: review.reviewed_at,
        created_at: now.toISOString(),
        snapshot_stability: progress.stability,
        snapshot_difficulty: progress.difficulty,
        snapshot_next_due_at: nextDueAt,
        snapshot_status: progress.status,
      };
      insertReviewEvent(this.db, event);
      insertLearner(this.db, { id: key.learnerId, created_at: now.toISOString() });

      return { committed: true, progress, review: event };
    };

    return guardStore('commitProgress', () => this.db.transaction(write));
  }

  async findReview(reviewId: string): Promise<ReviewEvent | null> {
    return guardStore('findReview', () => getReviewEventById(this.db, reviewId));
  }

  async listReviews(key: ProgressKey): Promise<ReviewEvent[]> {
    return guardStore('listReviews', () => getCardReviewEvents(this.db, key));
  }

  /**
   * Read due reviews and new cards in one transaction so both lists come
   * from the same state. Each list is capped at `limit`, which is all the
   * interleaving can ever consume.
   */
  async loadDueSnapshot(learnerId: string, now: Date, options: DueQueryOptions = {}): Promise<DueSnapshot> {
    return guardStore('loadDueSnapshot', () => this.db.read((): DueSnapshot => ({
      reviews: getDueReviews(this.db, learnerId, now.toISOString(), options.scope, options.limit),
      fresh: getNewCards(this.db, learnerId, options.scope, options.limit),
    })));
  }

  async countQueues(learnerId: string, now: Date, scope?: string): Promise<QueueCounts> {
    return guardStore('countQueues', () => getQueueCounts(this.db, learnerId, now.toISOString(), scope));
  }
}
