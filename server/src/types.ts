import type { Grade, ProgressState, ProgressStatus } from '@spaced-review/shared/scheduler';

// Card origin: written by an instructor or produced by the generation pipeline
export type CardSource = 'authored' | 'generated';

// Database models
export interface Card {
  id: string;
  seq: number;                  // Creation order, stable tie-break for new cards
  prompt: string;
  answer: string;
  explanation: string | null;
  scope: string;                // Course / lesson / segment tag
  base_difficulty: number;      // 1-10, seeds difficulty on first review
  source: CardSource;
  created_at: string;
}

/**
 * Identifies one learner's progress on one card.
 */
export interface ProgressKey {
  learnerId: string;
  cardId: string;
}

export interface Progress extends ProgressState {
  learner_id: string;
  card_id: string;
  version: number;              // Bumped on every write, used for compare-and-swap
  updated_at: string;
}

export interface ReviewEvent {
  id: string;
  learner_id: string;
  card_id: string;
  grade: Grade;
  reviewed_at: string;
  created_at: string;
  // Resulting state, returned again when the same review is replayed
  snapshot_stability: number;
  snapshot_difficulty: number;
  snapshot_next_due_at: string;
  snapshot_status: ProgressStatus;
}

export interface Learner {
  id: string;
  created_at: string;
}

// Extended types for due selection (with joins)
export interface DueItem {
  card: Card;
  progress: Progress | null;    // null = never reviewed
}

export interface ReviewedDueItem extends DueItem {
  progress: Progress;
}

export interface DueSnapshot {
  reviews: ReviewedDueItem[];
  fresh: DueItem[];
}

// Counts of currently due cards, by status
export interface QueueCounts {
  new: number;
  learning: number;
  reviewing: number;
  mastered: number;
  total: number;
}

export interface DueQueryOptions {
  scope?: string;
  limit?: number;
}
