import { z } from 'zod';
import { GRADES } from '@spaced-review/shared/scheduler';
import type {
  Card,
  DueItem,
  Learner,
  Progress,
  ProgressKey,
  QueueCounts,
  ReviewedDueItem,
  ReviewEvent,
} from '../types';
import type { SqliteDatabase } from './connection';

// ============ Row Schemas ============

const StatusSchema = z.enum(['new', 'learning', 'reviewing', 'mastered']);

const GradeSchema = z.number().int().transform((value, ctx) => {
  const grade = GRADES.find((g) => g === value);
  if (grade === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Stored grade ${value} is out of range` });
    return z.NEVER;
  }
  return grade;
});

const CardRowSchema = z.object({
  seq: z.number().int(),
  id: z.string(),
  prompt: z.string(),
  answer: z.string(),
  explanation: z.string().nullable(),
  scope: z.string(),
  base_difficulty: z.number(),
  source: z.enum(['authored', 'generated']),
  created_at: z.string(),
});

const ProgressRowSchema = z.object({
  learner_id: z.string(),
  card_id: z.string(),
  stability: z.number(),
  difficulty: z.number(),
  last_review_at: z.string().nullable(),
  next_due_at: z.string().nullable(),
  repetitions: z.number().int(),
  lapses: z.number().int(),
  status: StatusSchema,
  version: z.number().int(),
  updated_at: z.string(),
});

const ReviewEventRowSchema = z.object({
  id: z.string(),
  learner_id: z.string(),
  card_id: z.string(),
  grade: GradeSchema,
  reviewed_at: z.string(),
  created_at: z.string(),
  snapshot_stability: z.number(),
  snapshot_difficulty: z.number(),
  snapshot_next_due_at: z.string(),
  snapshot_status: StatusSchema,
});

const LearnerRowSchema = z.object({
  id: z.string(),
  created_at: z.string(),
});

const CountRowSchema = z.object({ count: z.number().int() });

const SeqRowSchema = z.object({ seq: z.number().int() });

const StatusCountRowSchema = z.object({
  status: StatusSchema,
  count: z.number().int(),
});

function parseCard(row: unknown): Card {
  return CardRowSchema.parse(row);
}

function parseProgress(row: unknown): Progress {
  return ProgressRowSchema.parse(row);
}

// SQLite treats a negative LIMIT as "no limit"
function sqlLimit(limit: number | undefined): number {
  return limit === undefined ? -1 : limit;
}

// ============ Learners ============

export function insertLearner(db: SqliteDatabase, learner: Learner): boolean {
  const result = db
    .prepare('INSERT INTO learners (id, created_at) VALUES (?, ?) ON CONFLICT(id) DO NOTHING')
    .bind(learner.id, learner.created_at)
    .run();
  return result.changes === 1;
}

export function getLearnerById(db: SqliteDatabase, id: string): Learner | null {
  const row = db.prepare('SELECT * FROM learners WHERE id = ?').bind(id).first();
  return row === null ? null : LearnerRowSchema.parse(row);
}

// ============ Cards ============

/**
 * Insert a card and return its creation sequence number.
 */
export function insertCard(db: SqliteDatabase, card: Omit<Card, 'seq'>): number {
  db.prepare(`
    INSERT INTO cards (id, prompt, answer, explanation, scope, base_difficulty, source, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `).bind(
    card.id,
    card.prompt,
    card.answer,
    card.explanation,
    card.scope,
    card.base_difficulty,
    card.source,
    card.created_at
  ).run();

  const row = db.prepare('SELECT seq FROM cards WHERE id = ?').bind(card.id).first();
  return SeqRowSchema.parse(row).seq;
}

export function getCardById(db: SqliteDatabase, id: string): Card | null {
  const row = db.prepare('SELECT * FROM cards WHERE id = ?').bind(id).first();
  return row === null ? null : parseCard(row);
}

/**
 * Fetch several cards at once. The ids travel as one JSON array so the
 * statement has a single parameter regardless of how many ids there are.
 */
export function getCardsByIds(db: SqliteDatabase, ids: readonly string[]): Map<string, Card> {
  const cards = new Map<string, Card>();
  if (ids.length === 0) {
    return cards;
  }

  const rows = db
    .prepare('SELECT * FROM cards WHERE id IN (SELECT value FROM json_each(?))')
    .bind(JSON.stringify(ids))
    .all();

  for (const row of rows) {
    const card = parseCard(row);
    cards.set(card.id, card);
  }
  return cards;
}

// ============ Progress ============

export function getProgress(db: SqliteDatabase, key: ProgressKey): Progress | null {
  const row = db
    .prepare('SELECT * FROM progress WHERE learner_id = ? AND card_id = ?')
    .bind(key.learnerId, key.cardId)
    .first();
  return row === null ? null : parseProgress(row);
}

/**
 * Insert the first progress row for a key. Returns false if a row already
 * exists (another writer got there first).
 */
export function insertProgress(db: SqliteDatabase, progress: Progress): boolean {
  const result = db.prepare(`
    INSERT INTO progress (
      learner_id, card_id, stability, difficulty, last_review_at, next_due_at,
      repetitions, lapses, status, version, updated_at
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(learner_id, card_id) DO NOTHING
  `).bind(
    progress.learner_id,
    progress.card_id,
    progress.stability,
    progress.difficulty,
    progress.last_review_at,
    progress.next_due_at,
    progress.repetitions,
    progress.lapses,
    progress.status,
    progress.version,
    progress.updated_at
  ).run();
  return result.changes === 1;
}

/**
 * Overwrite a progress row only if it is still at `expectedVersion`.
 * Returns false when the row moved on in the meantime.
 */
export function updateProgressIfVersion(
  db: SqliteDatabase,
  progress: Progress,
  expectedVersion: number
): boolean {
  const result = db.prepare(`
    UPDATE progress SET
      stability = ?,
      difficulty = ?,
      last_review_at = ?,
      next_due_at = ?,
      repetitions = ?,
      lapses = ?,
      status = ?,
      version = ?,
      updated_at = ?
    WHERE learner_id = ? AND card_id = ? AND version = ?
  `).bind(
    progress.stability,
    progress.difficulty,
    progress.last_review_at,
    progress.next_due_at,
    progress.repetitions,
    progress.lapses,
    progress.status,
    progress.version,
    progress.updated_at,
    progress.learner_id,
    progress.card_id,
    expectedVersion
  ).run();
  return result.changes === 1;
}

export function getProgressForCards(
  db: SqliteDatabase,
  learnerId: string,
  cardIds: readonly string[]
): Map<string, Progress> {
  const progress = new Map<string, Progress>();
  if (cardIds.length === 0) {
    return progress;
  }

  const rows = db.prepare(`
    SELECT * FROM progress
    WHERE learner_id = ? AND card_id IN (SELECT value FROM json_each(?))
  `).bind(learnerId, JSON.stringify(cardIds)).all();

  for (const row of rows) {
    const parsed = parseProgress(row);
    progress.set(parsed.card_id, parsed);
  }
  return progress;
}

// ============ Review Events ============

export function insertReviewEvent(db: SqliteDatabase, event: ReviewEvent): void {
  db.prepare(`
    INSERT INTO review_events (
      id, learner_id, card_id, grade, reviewed_at, created_at,
      snapshot_stability, snapshot_difficulty, snapshot_next_due_at, snapshot_status
    )
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
  `).bind(
    event.id,
    event.learner_id,
    event.card_id,
    event.grade,
    event.reviewed_at,
    event.created_at,
    event.snapshot_stability,
    event.snapshot_difficulty,
    event.snapshot_next_due_at,
    event.snapshot_status
  ).run();
}

export function getReviewEventById(db: SqliteDatabase, id: string): ReviewEvent | null {
  const row = db.prepare('SELECT * FROM review_events WHERE id = ?').bind(id).first();
  return row === null ? null : ReviewEventRowSchema.parse(row);
}

/**
 * Review history for one card, oldest first.
 */
export function getCardReviewEvents(db: SqliteDatabase, key: ProgressKey): ReviewEvent[] {
  const rows = db.prepare(`
    SELECT * FROM review_events
    WHERE learner_id = ? AND card_id = ?
    ORDER BY reviewed_at ASC, created_at ASC, id ASC
  `).bind(key.learnerId, key.cardId).all();

  return rows.map((row) => ReviewEventRowSchema.parse(row));
}

// ============ Due Selection ============

/**
 * Reviewed cards whose due date has arrived, most overdue first.
 */
export function getDueReviews(
  db: SqliteDatabase,
  learnerId: string,
  now: string,
  scope?: string,
  limit?: number
): ReviewedDueItem[] {
  const rows = db.prepare(`
    SELECT p.* FROM progress p
    JOIN cards c ON c.id = p.card_id
    WHERE p.learner_id = ?1
    AND p.next_due_at IS NOT NULL
    AND p.next_due_at <= ?2
    AND (?3 IS NULL OR c.scope = ?3)
    ORDER BY p.next_due_at ASC, p.card_id ASC
    LIMIT ?4
  `).bind(learnerId, now, scope ?? null, sqlLimit(limit)).all();

  const progress = rows.map(parseProgress);
  const cards = getCardsByIds(db, progress.map((p) => p.card_id));

  const items: ReviewedDueItem[] = [];
  for (const p of progress) {
    const card = cards.get(p.card_id);
    if (card) {
      items.push({ card, progress: p });
    }
  }
  return items;
}

/**
 * Cards the learner has never been scheduled on, in creation order.
 */
export function getNewCards(
  db: SqliteDatabase,
  learnerId: string,
  scope?: string,
  limit?: number
): DueItem[] {
  const rows = db.prepare(`
    SELECT c.* FROM cards c
    WHERE NOT EXISTS (
      SELECT 1 FROM progress p
      WHERE p.card_id = c.id AND p.learner_id = ?1 AND p.next_due_at IS NOT NULL
    )
    AND (?2 IS NULL OR c.scope = ?2)
    ORDER BY c.seq ASC, c.id ASC
    LIMIT ?3
  `).bind(learnerId, scope ?? null, sqlLimit(limit)).all();

  const cards = rows.map(parseCard);
  const progress = getProgressForCards(db, learnerId, cards.map((c) => c.id));

  return cards.map((card) => ({ card, progress: progress.get(card.id) ?? null }));
}

/**
 * Count currently due cards for a learner, by status.
 */
export function getQueueCounts(
  db: SqliteDatabase,
  learnerId: string,
  now: string,
  scope?: string
): QueueCounts {
  const newRow = db.prepare(`
    SELECT COUNT(*) AS count FROM cards c
    WHERE NOT EXISTS (
      SELECT 1 FROM progress p
      WHERE p.card_id = c.id AND p.learner_id = ?1 AND p.next_due_at IS NOT NULL
    )
    AND (?2 IS NULL OR c.scope = ?2)
  `).bind(learnerId, scope ?? null).first();

  const statusRows = db.prepare(`
    SELECT p.status AS status, COUNT(*) AS count FROM progress p
    JOIN cards c ON c.id = p.card_id
    WHERE p.learner_id = ?1
    AND p.next_due_at IS NOT NULL
    AND p.next_due_at <= ?2
    AND (?3 IS NULL OR c.scope = ?3)
    GROUP BY p.status
  `).bind(learnerId, now, scope ?? null).all();

  const counts: QueueCounts = {
    new: CountRowSchema.parse(newRow).count,
    learning: 0,
    reviewing: 0,
    mastered: 0,
    total: 0,
  };

  for (const row of statusRows) {
    const { status, count } = StatusCountRowSchema.parse(row);
    counts[status] += count;
  }

  counts.total = counts.new + counts.learning + counts.reviewing + counts.mastered;
  return counts;
}
