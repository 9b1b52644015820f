/**
 * In-memory training history, used when no history database is configured
 */
import type { ITrainingHistoryRepository } from '../../domain/repositories/ITrainingHistoryRepository';
import { selectActiveRecord, type TrainedModelRecord } from '../../domain/models/TrainingHistory';

interface StoredRun {
  record: TrainedModelRecord;
  artifact: string | null;
}

export class InMemoryTrainingHistoryRepository implements ITrainingHistoryRepository {
  private runs: StoredRun[] = [];

  async insert(record: TrainedModelRecord, artifact?: string): Promise<void> {
    this.runs.push({ record: Object.freeze({ ...record }), artifact: artifact ?? null });
  }

  async findActive(modelName: string): Promise<TrainedModelRecord | null> {
    return selectActiveRecord(await this.list(modelName));
  }

  async findLatest(modelName: string): Promise<TrainedModelRecord | null> {
    const records = await this.list(modelName);
    return records.length > 0 ? records[records.length - 1] : null;
  }

  async list(modelName: string): Promise<TrainedModelRecord[]> {
    return this.runs.filter((run) => run.record.modelName === modelName).map((run) => run.record);
  }

  async loadArtifact(modelName: string, version: string): Promise<string | null> {
    const run = this.runs.find(
      (candidate) => candidate.record.modelName === modelName && candidate.record.version === version,
    );
    return run?.artifact ?? null;
  }
}

export default InMemoryTrainingHistoryRepository;
