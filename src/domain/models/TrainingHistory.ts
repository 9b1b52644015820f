/**
 * Training history and training data models for the destination predictor
 */
import type { FileLocationKind } from '../../shared/constants';

/**
 * One training run. Records are append-only; the active model is derived by query.
 */
export interface TrainedModelRecord {
  readonly modelName: string;
  /** Run number and UTC time, e.g. "3-2026-10-19T101500Z" */
  readonly version: string;
  readonly exampleCount: number;
  readonly labelCount: number;
  readonly validationAccuracy: number;
  readonly falsePositiveRate: number;
  readonly accepted: boolean;
  readonly trainedAt: Date;
  readonly notes: string | null;
}

/**
 * A past move the user made, used as a labelled example
 */
export interface TrainingExample {
  readonly fileName: string;
  readonly extension: string;
  readonly destination: string;
  readonly timestamp: Date;
  readonly sourceLocation?: FileLocationKind;
}

export type PredictionOutcome = 'accepted' | 'overridden' | 'dismissed';

/**
 * Pick the active record: latest trainedAt among accepted records, later insertion wins ties
 */
export function selectActiveRecord(records: readonly TrainedModelRecord[]): TrainedModelRecord | null {
  let active: TrainedModelRecord | null = null;
  for (const record of records) {
    if (!record.accepted) continue;
    if (!active || record.trainedAt.getTime() >= active.trainedAt.getTime()) {
      active = record;
    }
  }
  return active;
}
