/**
 * Model Lifecycle Manager
 * Decides when to train the destination model, trains it in the background, validates it,
 * and swaps it in only when it clears the acceptance thresholds. Every run is recorded.
 */
import {
  DRIFT_DEFAULTS,
  PREDICTION_DEFAULTS,
  SECONDS_PER_DAY,
  TRAINING_DEFAULTS,
} from '../../../shared/constants';
import { yieldToEventLoop } from '../../../shared/asyncUtils';
import { logger as baseLogger } from '../../../shared/logger';
import { FolderSenseError, ErrorCodes, TrainingError, getErrorMessage } from '../../../shared/errors';
import type { ITrainingHistoryRepository } from '../../../domain/repositories/ITrainingHistoryRepository';
import type {
  PredictionOutcome,
  TrainedModelRecord,
  TrainingExample,
} from '../../../domain/models/TrainingHistory';
import type { DestinationModel, ModelTrainer, TrainingSample } from './DestinationModel';
import { featuresForExample, toTokens } from './FeatureExtractor';
import { NaiveBayesTrainer } from './NaiveBayesClassifier';
import type ModelSlot from './ModelSlot';

const logger = baseLogger.child('ModelLifecycle');

export interface ValidationMetrics {
  accuracy: number;
  falsePositiveRate: number;
  avgCorrectConfidence: number;
  avgIncorrectConfidence: number;
  incorrectCount: number;
}

export interface PredictionStats {
  total: number;
  accepted: number;
  overridden: number;
  dismissed: number;
}

export interface ModelLifecycleOptions {
  repository: ITrainingHistoryRepository;
  slot: ModelSlot;
  trainer?: ModelTrainer;
  modelName?: string;
  now?: () => Date;
}

export interface TrainOptions {
  /** Skip the retraining policy; eligibility still applies */
  force?: boolean;
}

/**
 * "N-yyyy-MM-ddTHHmmssZ" in UTC
 */
export function formatModelVersion(runNumber: number, date: Date): string {
  const [day, time] = date.toISOString().slice(0, 19).split('T');
  return `${runNumber}-${day}T${time.replace(/:/g, '')}Z`;
}

function normalizeExample(example: TrainingExample): TrainingExample | null {
  const destination = example.destination.trim();
  const fileName = example.fileName.trim().toLowerCase();
  if (!destination || !fileName) return null;
  return { ...example, fileName, destination };
}

/**
 * Most recent examples first, capped, then returned oldest-first for a stable split
 */
export function capDataset(examples: readonly TrainingExample[], maxSize: number): TrainingExample[] {
  return examples
    .map((example, index) => ({ example, index }))
    .sort((a, b) => b.example.timestamp.getTime() - a.example.timestamp.getTime() || b.index - a.index)
    .slice(0, maxSize)
    .reverse()
    .map(({ example }) => example);
}

function prepareDataset(examples: readonly TrainingExample[]): TrainingExample[] {
  const usable = examples.map(normalizeExample).filter((example): example is TrainingExample => example !== null);
  return capDataset(usable, TRAINING_DEFAULTS.MAX_DATASET_SIZE);
}

function isEligibleDataset(dataset: readonly TrainingExample[]): boolean {
  const destinations = new Set(dataset.map((example) => example.destination));
  return dataset.length >= TRAINING_DEFAULTS.MIN_EXAMPLES && destinations.size >= TRAINING_DEFAULTS.MIN_DESTINATIONS;
}

/**
 * Deterministic stratified split: every `stride`-th example of each destination is held out
 */
export function stratifiedSplit<T extends { destination: string }>(
  items: readonly T[],
  stride: number,
): { train: T[]; validation: T[] } {
  const seen = new Map<string, number>();
  const train: T[] = [];
  const validation: T[] = [];

  for (const item of items) {
    const position = (seen.get(item.destination) ?? 0) + 1;
    seen.set(item.destination, position);
    if (position % stride === 0) {
      validation.push(item);
    } else {
      train.push(item);
    }
  }
  return { train, validation };
}

async function evaluateModel(model: DestinationModel, validation: readonly TrainingSample[]): Promise<ValidationMetrics> {
  let correct = 0;
  let falsePositives = 0;
  const correctConfidences: number[] = [];
  const incorrectConfidences: number[] = [];

  for (let start = 0; start < validation.length; start += TRAINING_DEFAULTS.TRAINING_CHUNK_SIZE) {
    for (const sample of validation.slice(start, start + TRAINING_DEFAULTS.TRAINING_CHUNK_SIZE)) {
      const [top] = model.rank(sample.tokens);
      const confidence = top ? top.score : 0;
      if (top && top.destination === sample.destination) {
        correct += 1;
        correctConfidences.push(confidence);
      } else {
        incorrectConfidences.push(confidence);
        // A wrong answer the gate would have shown the user
        if (confidence >= PREDICTION_DEFAULTS.MINIMUM_CONFIDENCE) {
          falsePositives += 1;
        }
      }
    }
    await yieldToEventLoop();
  }

  const average = (values: number[]): number =>
    values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;

  return {
    accuracy: correct / validation.length,
    falsePositiveRate: falsePositives / validation.length,
    avgCorrectConfidence: average(correctConfidences),
    avgIncorrectConfidence: average(incorrectConfidences),
    incorrectCount: incorrectConfidences.length,
  };
}

/**
 * Reasons a validated model falls short; empty means accept
 */
export function rejectionReasons(metrics: ValidationMetrics): string[] {
  const reasons: string[] = [];
  if (metrics.accuracy < TRAINING_DEFAULTS.MIN_ACCURACY) {
    reasons.push(`accuracy ${metrics.accuracy.toFixed(3)} below ${TRAINING_DEFAULTS.MIN_ACCURACY}`);
  }
  if (metrics.falsePositiveRate > TRAINING_DEFAULTS.MAX_FALSE_POSITIVE_RATE) {
    reasons.push(
      `false positive rate ${metrics.falsePositiveRate.toFixed(3)} above ${TRAINING_DEFAULTS.MAX_FALSE_POSITIVE_RATE}`,
    );
  }
  if (metrics.incorrectCount > 0) {
    const separation = metrics.avgCorrectConfidence - metrics.avgIncorrectConfidence;
    if (separation < TRAINING_DEFAULTS.MIN_CONFIDENCE_SEPARATION) {
      reasons.push(
        `confidence separation ${separation.toFixed(3)} below ${TRAINING_DEFAULTS.MIN_CONFIDENCE_SEPARATION}`,
      );
    }
  }
  return reasons;
}

class ModelLifecycleManager {
  private repository: ITrainingHistoryRepository;
  private slot: ModelSlot;
  private trainer: ModelTrainer;
  private modelName: string;
  private now: () => Date;
  private pending: Promise<TrainedModelRecord | null> | null = null;
  private outcomes: PredictionOutcome[] = [];

  constructor(options: ModelLifecycleOptions) {
    this.repository = options.repository;
    this.slot = options.slot;
    this.trainer = options.trainer ?? new NaiveBayesTrainer();
    this.modelName = options.modelName ?? PREDICTION_DEFAULTS.MODEL_NAME;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Restore the active model from history so predictions survive a restart
   */
  async initialize(): Promise<TrainedModelRecord | null> {
    const active = await this.repository.findActive(this.modelName);
    if (!active) {
      logger.info('No accepted model yet', { modelName: this.modelName });
      return null;
    }

    const artifact = await this.repository.loadArtifact(this.modelName, active.version);
    if (artifact === null) {
      const missing = new FolderSenseError(
        `No artifact stored for ${this.modelName} ${active.version}`,
        ErrorCodes.MODEL_NOT_FOUND,
        { modelName: this.modelName, version: active.version },
      );
      logger.warn('Active model could not be restored', missing.toLogEntry('warn'));
      return null;
    }

    try {
      const model = this.trainer.restore(artifact);
      await this.slot.replace({ model, record: active });
      logger.info('Restored destination model', { version: active.version });
      return active;
    } catch (error) {
      logger.error('Failed to restore destination model', {
        version: active.version,
        error: getErrorMessage(error),
      });
      return null;
    }
  }

  /**
   * Judged on the dataset a run would actually train on: normalized, then capped to the most recent examples
   */
  isEligibleForTraining(examples: readonly TrainingExample[]): boolean {
    return isEligibleDataset(prepareDataset(examples));
  }

  /**
   * Retraining policy, applied to eligible data only
   */
  async shouldRetrain(exampleCount: number): Promise<boolean> {
    const latest = await this.repository.findLatest(this.modelName);
    if (!latest) return true;

    if (this.isDriftDetected()) {
      logger.info('Prediction drift detected', this.getPredictionStats());
      return true;
    }

    const ageMs = this.now().getTime() - latest.trainedAt.getTime();
    if (ageMs > TRAINING_DEFAULTS.RETRAIN_AFTER_DAYS * SECONDS_PER_DAY * 1000) return true;

    const datasetSize = Math.min(exampleCount, TRAINING_DEFAULTS.MAX_DATASET_SIZE);
    return datasetSize - latest.exampleCount >= TRAINING_DEFAULTS.RETRAIN_MIN_NEW_EXAMPLES;
  }

  /**
   * Fire-and-forget entry point; a call while a run is pending does nothing
   */
  scheduleTrainingIfNeeded(examples: readonly TrainingExample[]): void {
    if (this.pending) {
      logger.debug('Training already pending, schedule ignored');
      return;
    }
    this.trainIfNeeded(examples).catch((error: unknown) => {
      logger.error('Background training failed', { error: getErrorMessage(error) });
    });
  }

  /**
   * Train when eligible and the policy (or `force`) calls for it.
   * Resolves to the recorded run, or null when nothing ran. Joins a pending run instead of starting another.
   */
  trainIfNeeded(examples: readonly TrainingExample[], options: TrainOptions = {}): Promise<TrainedModelRecord | null> {
    if (this.pending) return this.pending;

    const run = this.runIfNeeded([...examples], options.force ?? false).finally(() => {
      this.pending = null;
    });
    this.pending = run;
    return run;
  }

  async waitForPendingTraining(): Promise<void> {
    if (this.pending) {
      await this.pending;
    }
  }

  isTrainingPending(): boolean {
    return this.pending !== null;
  }

  async currentModelMetadata(): Promise<TrainedModelRecord | null> {
    return this.repository.findActive(this.modelName);
  }

  async getHistory(): Promise<TrainedModelRecord[]> {
    return this.repository.list(this.modelName);
  }

  /**
   * Feed back what the user did with an ML suggestion; only the latest window counts toward drift
   */
  recordPredictionOutcome(outcome: PredictionOutcome): void {
    this.outcomes.push(outcome);
    if (this.outcomes.length > DRIFT_DEFAULTS.WINDOW_SIZE) {
      this.outcomes.shift();
    }
  }

  getPredictionStats(): PredictionStats {
    const count = (outcome: PredictionOutcome): number => this.outcomes.filter((value) => value === outcome).length;
    return {
      total: this.outcomes.length,
      accepted: count('accepted'),
      overridden: count('overridden'),
      dismissed: count('dismissed'),
    };
  }

  isDriftDetected(): boolean {
    const stats = this.getPredictionStats();
    if (stats.total < DRIFT_DEFAULTS.WINDOW_SIZE) return false;
    return (
      stats.accepted / stats.total < DRIFT_DEFAULTS.MIN_ACCEPTANCE_RATE ||
      stats.overridden / stats.total > DRIFT_DEFAULTS.MAX_OVERRIDE_RATE
    );
  }

  private async runIfNeeded(examples: TrainingExample[], force: boolean): Promise<TrainedModelRecord | null> {
    const dataset = prepareDataset(examples);
    if (!isEligibleDataset(dataset)) {
      logger.debug('Not enough training data', { examples: examples.length, usable: dataset.length });
      return null;
    }
    if (!force && !(await this.shouldRetrain(dataset.length))) {
      logger.debug('Retraining not needed');
      return null;
    }
    return this.train(dataset);
  }

  private async train(dataset: readonly TrainingExample[]): Promise<TrainedModelRecord> {
    const startTime = Date.now();
    const history = await this.repository.list(this.modelName);
    const runNumber = history.length + 1;

    const labelCount = new Set(dataset.map((example) => example.destination)).size;
    let stage = 'preparation';

    try {
      const samples: TrainingSample[] = dataset.map((example) => ({
        tokens: toTokens(featuresForExample(example)),
        destination: example.destination,
      }));
      const { train, validation } = stratifiedSplit(samples, TRAINING_DEFAULTS.VALIDATION_STRIDE);
      if (validation.length === 0) {
        throw new TrainingError(this.modelName, stage, 'no validation examples');
      }

      stage = 'training';
      const model = await this.trainer.train(train);

      stage = 'validation';
      const metrics = await evaluateModel(model, validation);
      const reasons = rejectionReasons(metrics);
      const trainedAt = this.now();

      const record: TrainedModelRecord = {
        modelName: this.modelName,
        version: formatModelVersion(runNumber, trainedAt),
        exampleCount: dataset.length,
        labelCount,
        validationAccuracy: metrics.accuracy,
        falsePositiveRate: metrics.falsePositiveRate,
        accepted: reasons.length === 0,
        trainedAt,
        notes: reasons.length > 0 ? `Rejected: ${reasons.join('; ')}` : null,
      };

      stage = 'persistence';
      if (record.accepted) {
        await this.repository.insert(record, model.serialize());
        await this.slot.replace({ model, record });
        this.outcomes = [];
        logger.info('Accepted destination model', { version: record.version, accuracy: record.validationAccuracy });
      } else {
        await this.repository.insert(record);
        logger.warn('Rejected destination model, keeping previous model', {
          version: record.version,
          notes: record.notes,
        });
      }

      logger.performance('trainDestinationModel', Date.now() - startTime, {
        examples: dataset.length,
        labels: labelCount,
      });
      return record;
    } catch (error) {
      const failure =
        error instanceof TrainingError
          ? error
          : new TrainingError(this.modelName, stage, getErrorMessage(error), error instanceof Error ? error : undefined);
      logger.error('Training run failed', failure.toLogEntry());

      const trainedAt = this.now();
      const record: TrainedModelRecord = {
        modelName: this.modelName,
        version: formatModelVersion(runNumber, trainedAt),
        exampleCount: dataset.length,
        labelCount,
        validationAccuracy: 0,
        falsePositiveRate: 0,
        accepted: false,
        trainedAt,
        notes: failure.message,
      };
      await this.repository.insert(record);
      return record;
    }
  }
}

export default ModelLifecycleManager;
