import {
  DEFAULT_REVIEWS_PER_NEW_CARD,
  DEFAULT_SCHEDULER_SETTINGS,
  getIntervalPreviews,
  isGrade,
  updateProgress,
  type Grade,
  type IntervalPreview,
  type SchedulerSettings,
} from '@spaced-review/shared/scheduler';
import {
  ConcurrentGradeConflict,
  InvalidGradeError,
  InvalidRequestError,
  StoreUnavailableError,
  UnknownCardError,
} from '../errors';
import { createLogger } from '../logger';
import type { Card, Progress, ProgressKey, QueueCounts, ReviewEvent } from '../types';
import { generateId, type CardRepository } from './cards';
import { DueSelector, type DueSet } from './due-selector';
import { KeyedLock } from './keyed-lock';
import type { LearnerDirectory } from './learners';
import type { ProgressStore } from './progress-store';
import {
  parseDueQuery,
  parseGradeRequest,
  resolveReviewTime,
  toDueCardView,
  toGradeResponse,
  type DueCardView,
  type GradeResponse,
} from './review-requests';

const log = createLogger('StudySession');

export const DEFAULT_MAX_GRADE_ATTEMPTS = 3;

export interface StudySessionDeps {
  cards: CardRepository;
  progress: ProgressStore;
  learners: LearnerDirectory;
  settings?: SchedulerSettings;
  reviewsPerNewCard?: number;
  maxGradeAttempts?: number;
  /** How far a client timestamp may drift from the clock and still be used; 0 ignores client time */
  clockSkewToleranceMs?: number;
  clock?: () => Date;
  generateReviewId?: () => string;
}

export interface GradeCommand {
  learnerId: string;
  cardId: string;
  /** 1 (again) to 4 (easy); anything else is rejected */
  grade: number;
  /** Review time, defaults to the session clock */
  now?: Date;
  /** Idempotency key. Repeating a grade with the same id returns the first outcome. */
  reviewId?: string;
}

export interface GradeOutcome {
  /**
   * Stored progress after the grade. On a replay this is the progress as it
   * is stored now, which includes any grades recorded since; `review` holds
   * what the replayed grade itself produced.
   */
  progress: Progress;
  /** The recorded review, including the state it produced */
  review: ReviewEvent;
  /** True when the review id had already been recorded and nothing changed */
  replayed: boolean;
}

export interface DueRequest {
  scope?: string;
  limit?: number;
  now?: Date;
}

/**
 * Entry point for a study client: what to study next, and recording grades.
 *
 * Grades for the same (learner, card) are serialized in process and checked
 * against the stored version on commit, so concurrent grades are applied one
 * after another and never lost.
 */
export class StudySession {
  private readonly cards: CardRepository;
  private readonly store: ProgressStore;
  private readonly learners: LearnerDirectory;
  private readonly selector: DueSelector;
  private readonly settings: SchedulerSettings;
  private readonly maxGradeAttempts: number;
  private readonly clockSkewToleranceMs: number;
  private readonly clock: () => Date;
  private readonly generateReviewId: () => string;
  private readonly locks = new KeyedLock<ProgressKey>((key) => JSON.stringify([key.learnerId, key.cardId]));

  constructor(deps: StudySessionDeps) {
    this.cards = deps.cards;
    this.store = deps.progress;
    this.learners = deps.learners;
    this.settings = deps.settings ?? DEFAULT_SCHEDULER_SETTINGS;
    this.maxGradeAttempts = Math.max(1, deps.maxGradeAttempts ?? DEFAULT_MAX_GRADE_ATTEMPTS);
    this.clockSkewToleranceMs = Math.max(0, deps.clockSkewToleranceMs ?? 0);
    this.clock = deps.clock ?? (() => new Date());
    this.generateReviewId = deps.generateReviewId ?? generateId;
    this.selector = new DueSelector(this.store, this.learners, {
      reviewsPerNewCard: deps.reviewsPerNewCard ?? DEFAULT_REVIEWS_PER_NEW_CARD,
    });
  }

  /** Number of (learner, card) pairs with a grade in flight */
  get pendingGrades(): number {
    return this.locks.size;
  }

  async getDue(learnerId: string, request: DueRequest = {}): Promise<DueSet> {
    const now = request.now ?? this.clock();
    return this.selector.selectDue(learnerId, now, { scope: request.scope, limit: request.limit });
  }

  async grade(command: GradeCommand): Promise<GradeOutcome> {
    const { learnerId, cardId, reviewId } = command;
    if (!isGrade(command.grade)) {
      throw new InvalidGradeError(command.grade);
    }
    const grade: Grade = command.grade;
    const now = command.now ?? this.clock();
    if (Number.isNaN(now.getTime())) {
      throw new InvalidRequestError('Review time is not a valid date');
    }

    const card = await this.requireCard(cardId);
    const key: ProgressKey = { learnerId, cardId };

    return this.locks.run(key, async () => {
      if (reviewId !== undefined) {
        const existing = await this.store.findReview(reviewId);
        if (existing) {
          return this.replay(existing, key);
        }
      }

      const id = reviewId ?? this.generateReviewId();

      for (let attempt = 1; attempt <= this.maxGradeAttempts; attempt++) {
        const current = await this.store.get(key);
        const next = updateProgress(current, grade, now, {
          settings: this.settings,
          baseDifficulty: card.base_difficulty,
        });

        const result = await this.store.commit(
          key,
          next,
          current?.version ?? null,
          { id, grade, reviewed_at: next.last_review_at ?? now.toISOString() },
          now
        );

        if (result.committed) {
          log.debug(
            `Graded ${cardId} for ${learnerId}: grade ${grade}, due ${result.progress.next_due_at}, status ${result.progress.status}`
          );
          return { progress: result.progress, review: result.review, replayed: false };
        }

        if (result.reason === 'duplicate_review') {
          // Recorded by another writer between our lookup and commit
          const existing = await this.store.findReview(id);
          if (existing) {
            return this.replay(existing, key);
          }
        }

        log.warn(`Progress for ${learnerId}/${cardId} changed during grading (attempt ${attempt}/${this.maxGradeAttempts})`);
      }

      throw new ConcurrentGradeConflict(key, this.maxGradeAttempts);
    });
  }

  /**
   * Grade from an unvalidated request body. The review is dated by the
   * client's timestamp when it is within the skew tolerance, otherwise by
   * the session clock.
   */
  async submitGrade(body: unknown): Promise<GradeResponse> {
    const request = parseGradeRequest(body);
    const now = resolveReviewTime(this.clock(), request.client_timestamp, this.clockSkewToleranceMs);
    const outcome = await this.grade({
      learnerId: request.learner_id,
      cardId: request.card_id,
      grade: request.grade,
      now,
      reviewId: request.review_id,
    });
    return toGradeResponse(outcome);
  }

  async listDue(query: unknown): Promise<DueCardView[]> {
    const { learner_id: learnerId, scope, limit } = parseDueQuery(query);
    const due = await this.getDue(learnerId, { scope, limit });
    return due.toArray().map(toDueCardView);
  }

  /**
   * What each grade would do to the card right now, without recording it.
   */
  async previewGrades(learnerId: string, cardId: string, now: Date = this.clock()): Promise<IntervalPreview[]> {
    const card = await this.requireCard(cardId);
    const current = await this.store.get({ learnerId, cardId });
    return getIntervalPreviews(current, now, {
      settings: this.settings,
      baseDifficulty: card.base_difficulty,
    });
  }

  async getQueueCounts(learnerId: string, request: { scope?: string; now?: Date } = {}): Promise<QueueCounts> {
    if (!(await this.learners.isKnown(learnerId))) {
      return { new: 0, learning: 0, reviewing: 0, mastered: 0, total: 0 };
    }
    return this.store.countQueues(learnerId, request.now ?? this.clock(), request.scope);
  }

  async getReviewHistory(learnerId: string, cardId: string): Promise<ReviewEvent[]> {
    return this.store.listReviews({ learnerId, cardId });
  }

  private async requireCard(cardId: string): Promise<Card> {
    const card = await this.cards.getCard(cardId);
    if (!card) {
      throw new UnknownCardError(cardId);
    }
    return card;
  }

  private async replay(review: ReviewEvent, key: ProgressKey): Promise<GradeOutcome> {
    if (review.learner_id !== key.learnerId || review.card_id !== key.cardId) {
      throw new InvalidRequestError(`Review id ${review.id} was already used for a different card`);
    }

    const progress = await this.store.get(key);
    if (!progress) {
      throw new StoreUnavailableError('replayReview', new Error(`No progress stored for recorded review ${review.id}`));
    }

    log.info(`Review ${review.id} already recorded, returning stored outcome`);
    return { progress, review, replayed: true };
  }
}
