import { randomUUID } from 'crypto';
import { z } from 'zod';
import { MAX_DIFFICULTY, MIN_DIFFICULTY } from '@spaced-review/shared/scheduler';
import { guardStore, type SqliteDatabase } from '../db/connection';
import { getCardById, insertCard } from '../db/queries';
import { InvalidRequestError } from '../errors';
import type { Card, CardSource } from '../types';

/**
 * Generate a unique ID using crypto
 */
export function generateId(): string {
  return randomUUID();
}

export const CARD_SOURCES: readonly CardSource[] = ['authored', 'generated'];

export const DEFAULT_BASE_DIFFICULTY = 5.0;

export const CreateCardSchema = z.object({
  id: z.string().trim().min(1).optional(),
  prompt: z.string().trim().min(1, 'prompt must not be empty'),
  answer: z.string().trim().min(1, 'answer must not be empty'),
  explanation: z.string().nullish().transform((value) => value ?? null),
  scope: z.string().trim().min(1).default('default'),
  base_difficulty: z.number().min(MIN_DIFFICULTY).max(MAX_DIFFICULTY).default(DEFAULT_BASE_DIFFICULTY),
  source: z.enum(['authored', 'generated']).default('authored'),
});

export type CreateCardInput = z.input<typeof CreateCardSchema>;

/**
 * Read access to the card catalogue, plus the creation hook used by the
 * content pipeline.
 */
export interface CardRepository {
  getCard(id: string): Promise<Card | null>;
  createCard(input: CreateCardInput, now?: Date): Promise<Card>;
}

export class SqliteCardRepository implements CardRepository {
  constructor(private readonly db: SqliteDatabase) {}

  async getCard(id: string): Promise<Card | null> {
    return guardStore('getCard', () => getCardById(this.db, id));
  }

  async createCard(input: CreateCardInput, now: Date = new Date()): Promise<Card> {
    const parsed = CreateCardSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue?.path.join('.') || 'card';
      throw new InvalidRequestError(`Invalid ${field}: ${issue?.message ?? 'invalid value'}`);
    }

    const { id, ...fields } = parsed.data;
    const cardId = id ?? generateId();

    return guardStore('createCard', () => {
      if (getCardById(this.db, cardId)) {
        throw new InvalidRequestError(`Card already exists: ${cardId}`);
      }
      const card: Omit<Card, 'seq'> = { id: cardId, ...fields, created_at: now.toISOString() };
      const seq = insertCard(this.db, card);
      return { ...card, seq };
    });
  }
}
