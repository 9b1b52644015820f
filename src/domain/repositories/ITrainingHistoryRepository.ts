/**
 * Training History Repository Interface
 * Append-only store of training runs and the artifacts of accepted models
 */

import type { TrainedModelRecord } from '../models/TrainingHistory';

export interface ITrainingHistoryRepository {
  /**
   * Append a training run. Accepted runs pass their serialized model as `artifact`.
   */
  insert(record: TrainedModelRecord, artifact?: string): Promise<void>;

  /**
   * Most recently trained accepted record; ties on trainedAt go to the later insert
   * @returns Promise resolving to the record or null if no run was ever accepted
   */
  findActive(modelName: string): Promise<TrainedModelRecord | null>;

  /**
   * Most recently inserted record, accepted or not
   */
  findLatest(modelName: string): Promise<TrainedModelRecord | null>;

  /**
   * All runs for a model in insertion order
   */
  list(modelName: string): Promise<TrainedModelRecord[]>;

  /**
   * Serialized model stored with an accepted run
   * @returns Promise resolving to the artifact or null if none was stored
   */
  loadArtifact(modelName: string, version: string): Promise<string | null>;
}
