import { guardStore, type SqliteDatabase } from '../db/connection';
import { getLearnerById, insertLearner } from '../db/queries';
import { InvalidRequestError } from '../errors';
import type { Learner } from '../types';

/**
 * Roster of learners known to the identity system. Learners are registered
 * from outside; the scheduler only asks whether one exists.
 */
export interface LearnerDirectory {
  isKnown(learnerId: string): Promise<boolean>;
  registerLearner(learnerId: string, now?: Date): Promise<Learner>;
}

export class SqliteLearnerDirectory implements LearnerDirectory {
  constructor(private readonly db: SqliteDatabase) {}

  async isKnown(learnerId: string): Promise<boolean> {
    return guardStore('isKnown', () => getLearnerById(this.db, learnerId) !== null);
  }

  /**
   * Add a learner to the roster. Registering twice keeps the first record.
   */
  async registerLearner(learnerId: string, now: Date = new Date()): Promise<Learner> {
    const id = learnerId.trim();
    if (!id) {
      throw new InvalidRequestError('learner id must not be empty');
    }

    return guardStore('registerLearner', () => {
      insertLearner(this.db, { id, created_at: now.toISOString() });
      return getLearnerById(this.db, id) ?? { id, created_at: now.toISOString() };
    });
  }
}
