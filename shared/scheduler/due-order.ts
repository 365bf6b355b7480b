/**
 * Ordering of the due set: which reviews and new cards a learner sees first.
 *
 * Due reviews come most-overdue first. New cards are mixed in at a bounded
 * ratio (by default at most one new card per four reviews) and fill the rest
 * of the session once reviews run out.
 */

export const DEFAULT_REVIEWS_PER_NEW_CARD = 4;

export interface DueReviewSortKey {
  card_id: string;
  /** null sorts first: the card is due immediately */
  next_due_at: string | null;
}

export interface NewCardSortKey {
  card_id: string;
  /** Card creation order */
  seq: number;
}

export interface InterleaveOptions {
  reviewsPerNewCard?: number;
  limit?: number;
}

function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function dueTime(nextDueAt: string | null): number {
  return nextDueAt === null ? -Infinity : new Date(nextDueAt).getTime();
}

export function compareDueReviews(a: DueReviewSortKey, b: DueReviewSortKey): number {
  const aDue = dueTime(a.next_due_at);
  const bDue = dueTime(b.next_due_at);
  if (aDue !== bDue) {
    return aDue < bDue ? -1 : 1;
  }
  return compareIds(a.card_id, b.card_id);
}

export function compareNewCards(a: NewCardSortKey, b: NewCardSortKey): number {
  const bySeq = a.seq - b.seq;
  return bySeq !== 0 ? bySeq : compareIds(a.card_id, b.card_id);
}

/**
 * Lazily interleave already-sorted reviews and new cards.
 *
 * Emits `reviewsPerNewCard` reviews, then one new card, and repeats. When one
 * side is exhausted the other fills the remainder. Stops after `limit` items.
 */
export function* interleaveDue<T>(
  reviews: readonly T[],
  fresh: readonly T[],
  options: InterleaveOptions = {}
): Generator<T, void, undefined> {
  const reviewsPerNewCard = Math.max(1, Math.floor(options.reviewsPerNewCard ?? DEFAULT_REVIEWS_PER_NEW_CARD));
  const limit = options.limit ?? Infinity;

  let emitted = 0;
  let reviewIdx = 0;
  let newIdx = 0;
  let reviewsSinceNew = 0;

  while (emitted < limit && (reviewIdx < reviews.length || newIdx < fresh.length)) {
    const newTurn = reviewsSinceNew >= reviewsPerNewCard || reviewIdx >= reviews.length;

    if (newTurn && newIdx < fresh.length) {
      yield fresh[newIdx++];
      reviewsSinceNew = 0;
    } else {
      yield reviews[reviewIdx++];
      reviewsSinceNew++;
    }
    emitted++;
  }
}
