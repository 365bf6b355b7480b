import { loadConfig, type AppConfig } from './config';
import { openDatabase, type SqliteDatabase } from './db/connection';
import { createLogger, setLogLevel } from './logger';
import { SqliteCardRepository } from './services/cards';
import { SqliteLearnerDirectory } from './services/learners';
import { SqliteProgressStore } from './services/progress-store';
import { StudySession } from './services/study-session';

const log = createLogger('Server');

export interface StudyService {
  config: AppConfig;
  db: SqliteDatabase;
  cards: SqliteCardRepository;
  learners: SqliteLearnerDirectory;
  progress: SqliteProgressStore;
  session: StudySession;
  close(): void;
}

/**
 * Open the database named by the config and wire the study session over it.
 */
export async function createStudyService(
  config: AppConfig = loadConfig(),
  clock?: () => Date
): Promise<StudyService> {
  setLogLevel(config.logLevel);

  const db = await openDatabase(config.databasePath);
  const cards = new SqliteCardRepository(db);
  const learners = new SqliteLearnerDirectory(db);
  const progress = new SqliteProgressStore(db);
  const session = new StudySession({
    cards,
    progress,
    learners,
    settings: config.scheduler,
    reviewsPerNewCard: config.reviewsPerNewCard,
    maxGradeAttempts: config.maxGradeAttempts,
    clockSkewToleranceMs: config.clockSkewToleranceMs,
    clock,
  });

  log.info(`Study service ready (database: ${config.databasePath})`);

  return {
    config,
    db,
    cards,
    learners,
    progress,
    session,
    close: () => db.close(),
  };
}

export { loadConfig, type AppConfig } from './config';
export { openDatabase, type SqliteDatabase } from './db/connection';
export * from './errors';
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from './logger';
export * from './types';
export { SqliteCardRepository, CreateCardSchema, type CardRepository, type CreateCardInput } from './services/cards';
export { SqliteLearnerDirectory, type LearnerDirectory } from './services/learners';
export {
  SqliteProgressStore,
  type ProgressStore,
  type CommitResult,
  type ReviewInput,
} from './services/progress-store';
export { DueSelector, DueSet } from './services/due-selector';
export { KeyedLock } from './services/keyed-lock';
export {
  StudySession,
  DEFAULT_MAX_GRADE_ATTEMPTS,
  type GradeCommand,
  type GradeOutcome,
  type DueRequest,
  type StudySessionDeps,
} from './services/study-session';
export * from './services/review-requests';
