import { describe, it, expect } from 'vitest';
import { interleaveDue, compareDueReviews, compareNewCards } from './due-order';

const reviews = (count: number) => Array.from({ length: count }, (_, i) => `r${i + 1}`);
const fresh = (count: number) => Array.from({ length: count }, (_, i) => `n${i + 1}`);

describe('interleaveDue', () => {
  it('mixes one new card after every four reviews by default', () => {
    expect([...interleaveDue(reviews(9), fresh(3))]).toEqual([
      'r1', 'r2', 'r3', 'r4', 'n1',
      'r5', 'r6', 'r7', 'r8', 'n2',
      'r9', 'n3',
    ]);
  });

  it('fills with new cards when reviews run out', () => {
    expect([...interleaveDue(reviews(2), fresh(3))]).toEqual(['r1', 'r2', 'n1', 'n2', 'n3']);
  });

  it('returns only new cards when nothing is due for review', () => {
    expect([...interleaveDue([], fresh(3))]).toEqual(['n1', 'n2', 'n3']);
  });

  it('returns only reviews when there are no new cards', () => {
    expect([...interleaveDue(reviews(6), [])]).toEqual(reviews(6));
  });

  it('keeps at most one new card in the first five with ten reviews due', () => {
    const first = [...interleaveDue(reviews(10), fresh(3), { limit: 5 })];

    expect(first).toEqual(['r1', 'r2', 'r3', 'r4', 'n1']);
    expect(first.filter((id) => id.startsWith('n'))).toHaveLength(1);
  });

  it('respects a custom ratio', () => {
    expect([...interleaveDue(reviews(4), fresh(2), { reviewsPerNewCard: 2 })]).toEqual([
      'r1', 'r2', 'n1', 'r3', 'r4', 'n2',
    ]);
  });

  it('stops at the limit', () => {
    expect([...interleaveDue(reviews(10), fresh(10), { limit: 3 })]).toEqual(['r1', 'r2', 'r3']);
  });

  it('yields nothing for a zero limit', () => {
    expect([...interleaveDue(reviews(3), fresh(3), { limit: 0 })]).toEqual([]);
  });

  it('is lazy', () => {
    const iterator = interleaveDue(reviews(3), fresh(1));
    expect(iterator.next()).toEqual({ value: 'r1', done: false });
    expect(iterator.next()).toEqual({ value: 'r2', done: false });
  });
});

describe('compareDueReviews', () => {
  it('orders the most overdue first', () => {
    const items = [
      { card_id: 'a', next_due_at: '2024-01-10T00:00:00.000Z' },
      { card_id: 'b', next_due_at: '2024-01-02T00:00:00.000Z' },
      { card_id: 'c', next_due_at: '2024-01-05T00:00:00.000Z' },
    ];
    expect([...items].sort(compareDueReviews).map((i) => i.card_id)).toEqual(['b', 'c', 'a']);
  });

  it('breaks ties by card id', () => {
    const items = [
      { card_id: 'z', next_due_at: '2024-01-02T00:00:00.000Z' },
      { card_id: 'm', next_due_at: '2024-01-02T00:00:00.000Z' },
    ];
    expect([...items].sort(compareDueReviews).map((i) => i.card_id)).toEqual(['m', 'z']);
  });
});

describe('compareNewCards', () => {
  it('orders by creation sequence, then id', () => {
    const items = [
      { card_id: 'b', seq: 2 },
      { card_id: 'c', seq: 1 },
      { card_id: 'a', seq: 2 },
    ];
    expect([...items].sort(compareNewCards).map((i) => i.card_id)).toEqual(['c', 'a', 'b']);
  });
});
