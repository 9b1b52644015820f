/**
 * SQLite training history
 * Records are append-only; the active model is derived by query, never flagged in place.
 */
import Database from 'better-sqlite3';
import { logger as baseLogger } from '../../shared/logger';
import { FolderSenseError, ErrorCodes, getErrorMessage } from '../../shared/errors';
import type { ITrainingHistoryRepository } from '../../domain/repositories/ITrainingHistoryRepository';
import type { TrainedModelRecord } from '../../domain/models/TrainingHistory';

const logger = baseLogger.child('TrainingHistory');

interface TrainingRunRow {
  id: number;
  model_name: string;
  version: string;
  example_count: number;
  label_count: number;
  validation_accuracy: number;
  false_positive_rate: number;
  accepted: number;
  trained_at: number;
  notes: string | null;
}

interface ArtifactRow {
  artifact: string | null;
}

const RECORD_COLUMNS = `
  id, model_name, version, example_count, label_count,
  validation_accuracy, false_positive_rate, accepted, trained_at, notes
`;

function toRecord(row: TrainingRunRow): TrainedModelRecord {
  return Object.freeze({
    modelName: row.model_name,
    version: row.version,
    exampleCount: row.example_count,
    labelCount: row.label_count,
    validationAccuracy: row.validation_accuracy,
    falsePositiveRate: row.false_positive_rate,
    accepted: row.accepted === 1,
    trainedAt: new Date(row.trained_at),
    notes: row.notes,
  });
}

export class SqliteTrainingHistoryRepository implements ITrainingHistoryRepository {
  private db: Database.Database;

  /**
   * @param dbPath - Path to the SQLite database, or ':memory:'
   */
  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    if (dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this._initializeTables();

    logger.info('[History] Initialized', { path: dbPath });
  }

  private _initializeTables(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS training_runs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        model_name TEXT NOT NULL,
        version TEXT NOT NULL,
        example_count INTEGER NOT NULL,
        label_count INTEGER NOT NULL,
        validation_accuracy REAL NOT NULL,
        false_positive_rate REAL NOT NULL,
        accepted INTEGER CHECK(accepted IN (0, 1)) NOT NULL,
        trained_at INTEGER NOT NULL,
        notes TEXT,
        artifact TEXT
      );

      CREATE INDEX IF NOT EXISTS idx_training_runs_model ON training_runs(model_name, accepted, trained_at);
    `);
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new FolderSenseError(
        `Training history ${operation} failed: ${getErrorMessage(error)}`,
        ErrorCodes.HISTORY_STORE_FAILED,
        { operation },
        'Model training history could not be read or saved',
      );
    }
  }

  async insert(record: TrainedModelRecord, artifact?: string): Promise<void> {
    this.run('insert', () => {
      this.db
        .prepare(
          `INSERT INTO training_runs (
            model_name, version, example_count, label_count,
            validation_accuracy, false_positive_rate, accepted, trained_at, notes, artifact
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          record.modelName,
          record.version,
          record.exampleCount,
          record.labelCount,
          record.validationAccuracy,
          record.falsePositiveRate,
          record.accepted ? 1 : 0,
          record.trainedAt.getTime(),
          record.notes,
          artifact ?? null,
        );
    });

    logger.debug('[History] Run recorded', { version: record.version, accepted: record.accepted });
  }

  async findActive(modelName: string): Promise<TrainedModelRecord | null> {
    const row = this.run('findActive', () =>
      this.db
        .prepare<[string], TrainingRunRow>(
          `SELECT ${RECORD_COLUMNS} FROM training_runs
           WHERE model_name = ? AND accepted = 1
           ORDER BY trained_at DESC, id DESC LIMIT 1`,
        )
        .get(modelName),
    );
    return row ? toRecord(row) : null;
  }

  async findLatest(modelName: string): Promise<TrainedModelRecord | null> {
    const row = this.run('findLatest', () =>
      this.db
        .prepare<[string], TrainingRunRow>(
          `SELECT ${RECORD_COLUMNS} FROM training_runs WHERE model_name = ? ORDER BY id DESC LIMIT 1`,
        )
        .get(modelName),
    );
    return row ? toRecord(row) : null;
  }

  async list(modelName: string): Promise<TrainedModelRecord[]> {
    const rows = this.run('list', () =>
      this.db
        .prepare<[string], TrainingRunRow>(
          `SELECT ${RECORD_COLUMNS} FROM training_runs WHERE model_name = ? ORDER BY id ASC`,
        )
        .all(modelName),
    );
    return rows.map(toRecord);
  }

  async loadArtifact(modelName: string, version: string): Promise<string | null> {
    const row = this.run('loadArtifact', () =>
      this.db
        .prepare<[string, string], ArtifactRow>(
          `SELECT artifact FROM training_runs
           WHERE model_name = ? AND version = ? AND accepted = 1
           ORDER BY id DESC LIMIT 1`,
        )
        .get(modelName, version),
    );
    return row?.artifact ?? null;
  }

  close(): void {
    this.db.close();
    logger.info('[History] Closed');
  }
}

export default SqliteTrainingHistoryRepository;
