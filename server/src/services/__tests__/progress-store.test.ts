import { describe, it, expect, beforeEach } from 'vitest';
import { Rating, updateProgress } from '@spaced-review/shared/scheduler';
import type { SqliteDatabase } from '../../db/connection';
import { insertProgress } from '../../db/queries';
import { StoreUnavailableError } from '../../errors';
import type { ProgressKey } from '../../types';
import { SqliteProgressStore } from '../progress-store';
import { baseTime, createTestDb, createTestProgress, now, seedCards, seedProgress } from './test-db';

const key: ProgressKey = { learnerId: 'learner-1', cardId: 'card-1' };
const later = new Date('2024-01-17T10:00:00.000Z');

describe('SqliteProgressStore', () => {
  let db: SqliteDatabase;
  let store: SqliteProgressStore;

  beforeEach(async () => {
    db = await createTestDb();
    store = new SqliteProgressStore(db);
    seedCards(db, [
      { id: 'card-1' },
      { id: 'card-2' },
      { id: 'card-3' },
      { id: 'card-4', scope: 'GS2' },
    ]);
  });

  describe('get', () => {
    it('returns null when the learner has never reviewed the card', async () => {
      expect(await store.get(key)).toBeNull();
    });

    it('returns the stored row', async () => {
      const stored = createTestProgress();
      insertProgress(db, stored);

      expect(await store.get(key)).toEqual(stored);
    });
  });

  describe('commit', () => {
    it('creates the first row at version 1 and records the review', async () => {
      const next = updateProgress(null, Rating.Good, now);

      const result = await store.commit(key, next, null, {
        id: 'review-1',
        grade: Rating.Good,
        reviewed_at: baseTime,
      }, now);

      expect(result.committed).toBe(true);
      expect(await store.get(key)).toEqual({
        learner_id: 'learner-1',
        card_id: 'card-1',
        stability: 1.5,
        difficulty: 4.8,
        last_review_at: baseTime,
        next_due_at: '2024-01-17T10:00:00.000Z',
        repetitions: 1,
        lapses: 0,
        status: 'reviewing',
        version: 1,
        updated_at: baseTime,
      });
      expect(await store.findReview('review-1')).toEqual({
        id: 'review-1',
        learner_id: 'learner-1',
        card_id: 'card-1',
        grade: 3,
        reviewed_at: baseTime,
        created_at: baseTime,
        snapshot_stability: 1.5,
        snapshot_difficulty: 4.8,
        snapshot_next_due_at: '2024-01-17T10:00:00.000Z',
        snapshot_status: 'reviewing',
      });
    });

    it('bumps the version when the expected version matches', async () => {
      insertProgress(db, createTestProgress({ version: 4 }));
      const current = await store.get(key);
      const next = updateProgress(current, Rating.Again, now);

      const result = await store.commit(key, next, 4, { id: 'review-1', grade: Rating.Again, reviewed_at: baseTime }, now);

      expect(result.committed).toBe(true);
      const stored = await store.get(key);
      expect(stored?.version).toBe(5);
      expect(stored?.stability).toBe(2.5);
      expect(stored?.lapses).toBe(1);
    });

    it('rejects a stale version without writing anything', async () => {
      insertProgress(db, createTestProgress({ version: 2 }));
      const next = updateProgress(createTestProgress(), Rating.Good, now);

      const result = await store.commit(key, next, 1, { id: 'review-1', grade: Rating.Good, reviewed_at: baseTime }, now);

      expect(result).toEqual({ committed: false, reason: 'version_conflict' });
      expect(await store.get(key)).toEqual(createTestProgress({ version: 2 }));
      expect(await store.findReview('review-1')).toBeNull();
    });

    it('rejects a first write when another writer already created the row', async () => {
      insertProgress(db, createTestProgress());
      const next = updateProgress(null, Rating.Good, now);

      const result = await store.commit(key, next, null, { id: 'review-1', grade: Rating.Good, reviewed_at: baseTime }, now);

      expect(result).toEqual({ committed: false, reason: 'version_conflict' });
    });

    it('rejects a review id that was already recorded', async () => {
      const first = updateProgress(null, Rating.Good, now);
      await store.commit(key, first, null, { id: 'review-1', grade: Rating.Good, reviewed_at: baseTime }, now);

      const second = updateProgress(first, Rating.Easy, later);
      const result = await store.commit(key, second, 1, {
        id: 'review-1',
        grade: Rating.Easy,
        reviewed_at: later.toISOString(),
      }, later);

      expect(result).toEqual({ committed: false, reason: 'duplicate_review' });
      expect((await store.get(key))?.version).toBe(1);
    });

    it('rolls back the progress write when recording the review fails', async () => {
      insertProgress(db, createTestProgress());
      db.exec(`
        CREATE TRIGGER fail_reviews BEFORE INSERT ON review_events
        BEGIN SELECT RAISE(ABORT, 'review log offline'); END;
      `);
      const next = updateProgress(createTestProgress(), Rating.Good, now);

      await expect(
        store.commit(key, next, 1, { id: 'review-1', grade: Rating.Good, reviewed_at: baseTime }, now)
      ).rejects.toThrow('Store failed during commitProgress: review log offline');

      expect(await store.get(key)).toEqual(createTestProgress());
    });
  });

  describe('listReviews', () => {
    it('returns the history oldest first', async () => {
      const first = updateProgress(null, Rating.Good, now);
      await store.commit(key, first, null, { id: 'review-b', grade: Rating.Good, reviewed_at: baseTime }, now);
      const second = updateProgress(first, Rating.Hard, later);
      await store.commit(key, second, 1, {
        id: 'review-a',
        grade: Rating.Hard,
        reviewed_at: later.toISOString(),
      }, later);

      const history = await store.listReviews(key);

      expect(history.map((r) => r.id)).toEqual(['review-b', 'review-a']);
      expect(history.map((r) => r.grade)).toEqual([3, 2]);
    });

    it('is empty for another learner', async () => {
      const first = updateProgress(null, Rating.Good, now);
      await store.commit(key, first, null, { id: 'review-1', grade: Rating.Good, reviewed_at: baseTime }, now);

      expect(await store.listReviews({ learnerId: 'learner-2', cardId: 'card-1' })).toEqual([]);
    });
  });

  describe('loadDueSnapshot', () => {
    beforeEach(() => {
      seedProgress(db, 'learner-1', 'card-1', 2);
      seedProgress(db, 'learner-1', 'card-2', -3);
      insertProgress(db, createTestProgress({
        card_id: 'card-3',
        last_review_at: null,
        next_due_at: null,
        repetitions: 0,
        status: 'new',
      }));
    });

    it('splits due reviews from cards that were never scheduled', async () => {
      const snapshot = await store.loadDueSnapshot('learner-1', now);

      expect(snapshot.reviews.map((item) => item.card.id)).toEqual(['card-1']);
      expect(snapshot.fresh.map((item) => item.card.id)).toEqual(['card-3', 'card-4']);
      expect(snapshot.fresh[0]?.progress?.status).toBe('new');
      expect(snapshot.fresh[1]?.progress).toBeNull();
    });

    it('restricts both lists to the scope', async () => {
      const snapshot = await store.loadDueSnapshot('learner-1', now, { scope: 'GS2' });

      expect(snapshot.reviews).toEqual([]);
      expect(snapshot.fresh.map((item) => item.card.id)).toEqual(['card-4']);
    });

    it('treats a card due exactly now as due', async () => {
      const snapshot = await store.loadDueSnapshot('learner-1', new Date('2024-01-13T10:00:00.000Z'));

      expect(snapshot.reviews.map((item) => item.card.id)).toEqual(['card-1']);
    });

    it('caps each list at the limit', async () => {
      const snapshot = await store.loadDueSnapshot('learner-1', now, { limit: 1 });

      expect(snapshot.reviews).toHaveLength(1);
      expect(snapshot.fresh.map((item) => item.card.id)).toEqual(['card-3']);
    });
  });

  describe('countQueues', () => {
    it('counts new cards and due reviews by status', async () => {
      seedProgress(db, 'learner-1', 'card-1', 2);
      seedProgress(db, 'learner-1', 'card-2', 1, { status: 'learning' });

      expect(await store.countQueues('learner-1', now)).toEqual({
        new: 2,
        learning: 1,
        reviewing: 1,
        mastered: 0,
        total: 4,
      });
    });

    it('leaves out reviews that are not due yet', async () => {
      seedProgress(db, 'learner-1', 'card-1', -1);

      expect(await store.countQueues('learner-1', now, 'GS1')).toEqual({
        new: 2,
        learning: 0,
        reviewing: 0,
        mastered: 0,
        total: 2,
      });
    });
  });

  describe('store failures', () => {
    it('wraps driver errors in StoreUnavailableError with the cause', async () => {
      db.close();

      const error = await store.get(key).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StoreUnavailableError);
      expect(error).toMatchObject({ code: 'STORE_UNAVAILABLE', operation: 'getProgress', retryable: true });
      expect(error).toHaveProperty('cause');
    });
  });
});
