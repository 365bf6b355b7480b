/**
 * In-memory SQLite fixtures for service tests.
 */

import type { ProgressState } from '@spaced-review/shared/scheduler';
import { openDatabase, type SqliteDatabase } from '../../db/connection';
import { insertCard, insertProgress } from '../../db/queries';
import { setLogLevel } from '../../logger';
import type { Card, Progress } from '../../types';
import { SqliteCardRepository } from '../cards';
import { SqliteLearnerDirectory } from '../learners';
import { SqliteProgressStore, type ProgressStore } from '../progress-store';
import { StudySession, type StudySessionDeps } from '../study-session';

// Keep test output quiet; individual tests spy on console where they care
setLogLevel('error');

export const baseTime = '2024-01-15T10:00:00.000Z';
export const now = new Date(baseTime);

export function createTestDb(): Promise<SqliteDatabase> {
  return openDatabase(':memory:');
}

export function createTestCard(overrides: Partial<Omit<Card, 'seq'>> = {}): Omit<Card, 'seq'> {
  return {
    id: overrides.id ?? 'card-1',
    prompt: overrides.prompt ?? 'What does mitochondria produce?',
    answer: overrides.answer ?? 'ATP',
    explanation: overrides.explanation ?? null,
    scope: overrides.scope ?? 'GS1',
    base_difficulty: overrides.base_difficulty ?? 5,
    source: overrides.source ?? 'authored',
    created_at: overrides.created_at ?? '2024-01-01T00:00:00.000Z',
  };
}

export function createTestProgress(overrides: Partial<Progress> = {}): Progress {
  const state: ProgressState = {
    stability: 10,
    difficulty: 5,
    last_review_at: '2024-01-05T10:00:00.000Z',
    next_due_at: '2024-01-15T10:00:00.000Z',
    repetitions: 3,
    lapses: 0,
    status: 'reviewing',
  };
  return {
    ...state,
    learner_id: 'learner-1',
    card_id: 'card-1',
    version: 1,
    updated_at: '2024-01-05T10:00:00.000Z',
    ...overrides,
  };
}

/**
 * Insert cards straight through the queries, in the given order.
 */
export function seedCards(db: SqliteDatabase, cards: Array<Partial<Omit<Card, 'seq'>>>): void {
  for (const card of cards) {
    insertCard(db, createTestCard(card));
  }
}

/**
 * Insert a progress row due `daysOverdue` days before `now` (a negative value
 * means due in the future).
 */
export function seedProgress(
  db: SqliteDatabase,
  learnerId: string,
  cardId: string,
  daysOverdue: number,
  overrides: Partial<Progress> = {}
): Progress {
  const due = new Date(now.getTime() - daysOverdue * 24 * 60 * 60 * 1000);
  const lastReview = new Date(due.getTime() - 10 * 24 * 60 * 60 * 1000);
  const progress = createTestProgress({
    learner_id: learnerId,
    card_id: cardId,
    last_review_at: lastReview.toISOString(),
    next_due_at: due.toISOString(),
    ...overrides,
  });
  insertProgress(db, progress);
  return progress;
}

export interface TestContext {
  db: SqliteDatabase;
  cards: SqliteCardRepository;
  learners: SqliteLearnerDirectory;
  progress: SqliteProgressStore;
  session: StudySession;
}

export async function createTestContext(
  options: Omit<Partial<StudySessionDeps>, 'cards' | 'learners' | 'progress'> & { store?: (inner: SqliteProgressStore) => ProgressStore } = {}
): Promise<TestContext> {
  const db = await createTestDb();
  const cards = new SqliteCardRepository(db);
  const learners = new SqliteLearnerDirectory(db);
  const progress = new SqliteProgressStore(db);
  const { store, ...deps } = options;

  const session = new StudySession({
    clock: () => now,
    ...deps,
    cards,
    learners,
    progress: store ? store(progress) : progress,
  });

  return { db, cards, learners, progress, session };
}
