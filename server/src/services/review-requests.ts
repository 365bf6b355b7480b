import { z } from 'zod';
import { GRADES, gradeName, isGrade, type Grade, type ProgressStatus } from '@spaced-review/shared/scheduler';
import { InvalidGradeError, InvalidRequestError } from '../errors';
import { createLogger } from '../logger';
import type { DueItem } from '../types';
import type { GradeOutcome } from './study-session';

const log = createLogger('Requests');

export const MAX_DUE_LIMIT = 500;

// ============ Schemas ============

export const DueQuerySchema = z.object({
  learner_id: z.string().trim().min(1),
  scope: z.string().trim().min(1).optional(),
  limit: z.coerce.number().int().min(0).max(MAX_DUE_LIMIT).optional(),
});

export const GradeRequestSchema = z.object({
  learner_id: z.string().trim().min(1),
  card_id: z.string().trim().min(1),
  // Checked separately so a bad grade surfaces as InvalidGradeError
  grade: z.unknown(),
  client_timestamp: z.string().datetime({ offset: true }).optional(),
  review_id: z.string().trim().min(1).max(128).optional(),
});

export type DueQuery = z.infer<typeof DueQuerySchema>;

export type GradeRequest = Omit<z.infer<typeof GradeRequestSchema>, 'grade'> & { grade: Grade };

export interface DueCardView {
  card_id: string;
  prompt: string;
  answer: string;
  explanation: string | null;
  scope: string;
  /** null for a card the learner has never reviewed */
  progress_summary: {
    stability: number;
    difficulty: number;
    status: ProgressStatus;
  } | null;
}

export interface GradeResponse {
  next_due_at: string;
  stability: number;
  difficulty: number;
  status: ProgressStatus;
  replayed: boolean;
}

// ============ Parsing ============

function firstIssue(error: z.ZodError, fallback: string): string {
  const issue = error.issues[0];
  const field = issue?.path.join('.') || fallback;
  return `Invalid ${field}: ${issue?.message ?? 'invalid value'}`;
}

/**
 * Accept a grade as its number (3, "3") or its name ("good").
 */
export function parseGrade(raw: unknown): Grade {
  if (isGrade(raw)) {
    return raw;
  }
  if (typeof raw === 'string') {
    const text = raw.trim().toLowerCase();
    const byName = GRADES.find((grade) => gradeName(grade) === text);
    if (byName !== undefined) {
      return byName;
    }
    const numeric = text === '' ? NaN : Number(text);
    if (isGrade(numeric)) {
      return numeric;
    }
  }
  throw new InvalidGradeError(raw);
}

export function parseGradeRequest(body: unknown): GradeRequest {
  const parsed = GradeRequestSchema.safeParse(body);
  if (!parsed.success) {
    throw new InvalidRequestError(firstIssue(parsed.error, 'request'));
  }
  return { ...parsed.data, grade: parseGrade(parsed.data.grade) };
}

export function parseDueQuery(query: unknown): DueQuery {
  const parsed = DueQuerySchema.safeParse(query);
  if (!parsed.success) {
    throw new InvalidRequestError(firstIssue(parsed.error, 'query'));
  }
  return parsed.data;
}

/**
 * Pick the time a review happened. The client's clock is trusted only when a
 * tolerance is configured and the client is within it; otherwise server time.
 */
export function resolveReviewTime(serverNow: Date, clientTimestamp: string | undefined, toleranceMs: number): Date {
  if (clientTimestamp === undefined || toleranceMs <= 0) {
    return serverNow;
  }

  const clientTime = new Date(clientTimestamp);
  if (Number.isNaN(clientTime.getTime())) {
    return serverNow;
  }

  const skew = Math.abs(clientTime.getTime() - serverNow.getTime());
  if (skew > toleranceMs) {
    log.debug(`Client timestamp ${clientTimestamp} is ${skew}ms off server time, using server time`);
    return serverNow;
  }
  return clientTime;
}

// ============ Responses ============

export function toDueCardView(item: DueItem): DueCardView {
  const { card, progress } = item;
  return {
    card_id: card.id,
    prompt: card.prompt,
    answer: card.answer,
    explanation: card.explanation,
    scope: card.scope,
    progress_summary: progress
      ? { stability: progress.stability, difficulty: progress.difficulty, status: progress.status }
      : null,
  };
}

/**
 * Built from the recorded review, so a replayed grade answers exactly as the
 * first call did.
 */
export function toGradeResponse(outcome: GradeOutcome): GradeResponse {
  const { review } = outcome;
  return {
    next_due_at: review.snapshot_next_due_at,
    stability: review.snapshot_stability,
    difficulty: review.snapshot_difficulty,
    status: review.snapshot_status,
    replayed: outcome.replayed,
  };
}
