import {
  compareDueReviews,
  compareNewCards,
  DEFAULT_REVIEWS_PER_NEW_CARD,
  interleaveDue,
} from '@spaced-review/shared/scheduler';
import { InvalidRequestError } from '../errors';
import { createLogger } from '../logger';
import type { DueItem, DueQueryOptions, DueSnapshot, ReviewedDueItem } from '../types';
import type { LearnerDirectory } from './learners';
import type { ProgressStore } from './progress-store';

const log = createLogger('DueSelector');

/**
 * The cards a learner should study now, in study order.
 *
 * Built over one snapshot of the store: iterating twice yields the same
 * sequence, and items are produced only as they are consumed.
 */
export class DueSet implements Iterable<DueItem> {
  private readonly reviews: readonly ReviewedDueItem[];
  private readonly fresh: readonly DueItem[];

  constructor(
    snapshot: DueSnapshot,
    private readonly reviewsPerNewCard: number = DEFAULT_REVIEWS_PER_NEW_CARD,
    private readonly limit?: number
  ) {
    this.reviews = [...snapshot.reviews].sort((a, b) => compareDueReviews(a.progress, b.progress));
    this.fresh = [...snapshot.fresh].sort((a, b) =>
      compareNewCards({ card_id: a.card.id, seq: a.card.seq }, { card_id: b.card.id, seq: b.card.seq })
    );
  }

  static empty(): DueSet {
    return new DueSet({ reviews: [], fresh: [] });
  }

  [Symbol.iterator](): Iterator<DueItem> {
    return interleaveDue<DueItem>(this.reviews, this.fresh, {
      reviewsPerNewCard: this.reviewsPerNewCard,
      limit: this.limit,
    });
  }

  toArray(): DueItem[] {
    return [...this];
  }

  get size(): number {
    const available = this.reviews.length + this.fresh.length;
    return this.limit === undefined ? available : Math.min(available, this.limit);
  }
}

export interface DueSelectorOptions {
  reviewsPerNewCard?: number;
}

export class DueSelector {
  private readonly reviewsPerNewCard: number;

  constructor(
    private readonly store: ProgressStore,
    private readonly learners: LearnerDirectory,
    options: DueSelectorOptions = {}
  ) {
    this.reviewsPerNewCard = options.reviewsPerNewCard ?? DEFAULT_REVIEWS_PER_NEW_CARD;
  }

  async selectDue(learnerId: string, now: Date, options: DueQueryOptions = {}): Promise<DueSet> {
    const { limit, scope } = options;
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
      throw new InvalidRequestError(`limit must be a non-negative integer, got ${limit}`);
    }
    if (Number.isNaN(now.getTime())) {
      throw new InvalidRequestError('Due time is not a valid date');
    }
    if (limit === 0) {
      return DueSet.empty();
    }

    if (!(await this.learners.isKnown(learnerId))) {
      log.debug(`Unknown learner ${learnerId}, returning empty due set`);
      return DueSet.empty();
    }

    const snapshot = await this.store.loadDueSnapshot(learnerId, now, { scope, limit });
    log.debug(
      `Learner ${learnerId}: ${snapshot.reviews.length} due reviews, ${snapshot.fresh.length} new cards`
    );
    return new DueSet(snapshot, this.reviewsPerNewCard, limit);
  }
}
