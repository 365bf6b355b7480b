import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import { Rating } from '@spaced-review/shared/scheduler';
import {
  createStudyService,
  InvalidGradeError,
  InvalidRequestError,
  loadConfig,
  setLogLevel,
  type StudyService,
} from '../index';

const now = new Date('2024-01-15T10:00:00.000Z');

describe('createStudyService', () => {
  let service: StudyService | undefined;

  afterEach(() => {
    service?.close();
    service = undefined;
  });

  it('wires a working session over the configured database', async () => {
    service = await createStudyService(
      loadConfig({ SPACED_REVIEW_DB_PATH: ':memory:', LOG_LEVEL: 'error', REVIEWS_PER_NEW_CARD: '1' }),
      () => now
    );
    await service.learners.registerLearner('learner-1', now);
    await service.cards.createCard({ id: 'card-1', prompt: 'Q1', answer: 'A1' }, now);
    await service.cards.createCard({ id: 'card-2', prompt: 'Q2', answer: 'A2' }, now);

    const outcome = await service.session.grade({ learnerId: 'learner-1', cardId: 'card-1', grade: Rating.Easy });
    const due = await service.session.getDue('learner-1');

    expect(outcome.progress.next_due_at).toBe('2024-01-18T10:00:00.000Z');
    expect(due.toArray().map((item) => item.card.id)).toEqual(['card-2']);
  });

  it('applies the configured scheduler settings', async () => {
    service = await createStudyService(
      loadConfig({ SPACED_REVIEW_DB_PATH: ':memory:', LOG_LEVEL: 'error', MASTERY_THRESHOLD_DAYS: '2' }),
      () => now
    );
    await service.cards.createCard({ id: 'card-1', prompt: 'Q1', answer: 'A1' }, now);

    const outcome = await service.session.grade({ learnerId: 'learner-1', cardId: 'card-1', grade: Rating.Easy });

    expect(outcome.progress.status).toBe('mastered');
    setLogLevel('info');
  });

  describe('request entry points', () => {
    const grade = (body: object) => {
      if (!service) throw new Error('service not created');
      return service.session.submitGrade(body);
    };

    beforeEach(async () => {
      service = await createStudyService(
        loadConfig({ SPACED_REVIEW_DB_PATH: ':memory:', LOG_LEVEL: 'error', CLOCK_SKEW_TOLERANCE_MS: '60000' }),
        () => now
      );
      await service.cards.createCard({ id: 'card-1', prompt: 'Q1', answer: 'A1' }, now);
      await service.cards.createCard({ id: 'card-2', prompt: 'Q2', answer: 'A2' }, now);
    });

    it('dates the review by a client timestamp within the tolerance', async () => {
      const response = await grade({
        learner_id: 'learner-1',
        card_id: 'card-1',
        grade: 'good',
        client_timestamp: '2024-01-15T09:59:30.000Z',
      });

      expect(response).toEqual({
        next_due_at: '2024-01-17T09:59:30.000Z',
        stability: 1.5,
        difficulty: 4.8,
        status: 'reviewing',
        replayed: false,
      });
    });

    it('falls back to server time when the client clock is too far off', async () => {
      const response = await grade({
        learner_id: 'learner-1',
        card_id: 'card-1',
        grade: 3,
        client_timestamp: '2024-01-15T09:50:00.000Z',
      });

      expect(response.next_due_at).toBe('2024-01-17T10:00:00.000Z');
    });

    it('rejects a malformed body before grading', async () => {
      await expect(grade({ learner_id: 'learner-1', grade: 3 }))
        .rejects.toThrow(InvalidRequestError);
      await expect(grade({ learner_id: 'learner-1', card_id: 'card-1', grade: 'perfect' }))
        .rejects.toThrow(InvalidGradeError);
    });

    it('lists due cards as views', async () => {
      await grade({ learner_id: 'learner-1', card_id: 'card-1', grade: 'easy' });

      const views = await service?.session.listDue({ learner_id: 'learner-1', limit: '5' });

      expect(views).toEqual([{
        card_id: 'card-2',
        prompt: 'Q2',
        answer: 'A2',
        explanation: null,
        scope: 'default',
        progress_summary: null,
      }]);
    });
  });
});
