/**
 * Service Registry - Wires the suggestion services from configuration
 * Centralizes service dependencies and initialization
 */
import { loadConfig, type FolderSenseConfig } from '../../shared/config';
import { logger } from '../../shared/logger';
import type { ITrainingHistoryRepository } from '../../domain/repositories/ITrainingHistoryRepository';
import { createPredictionContext, type PredictionContext } from '../../domain/models/Suggestion';
import { InMemoryTrainingHistoryRepository } from '../../infrastructure/repositories/InMemoryTrainingHistoryRepository';
import { SqliteTrainingHistoryRepository } from '../../infrastructure/repositories/SqliteTrainingHistoryRepository';
import RuleEngine from '../services/rules/RuleEngine';
import PatternMatcher from '../services/patterns/PatternMatcher';
import ModelSlot from '../services/prediction/ModelSlot';
import PredictionGate from '../services/prediction/PredictionGate';
import ModelLifecycleManager from '../services/prediction/ModelLifecycleManager';
import type { ModelTrainer } from '../services/prediction/DestinationModel';
import SuggestionPipeline from '../services/SuggestionPipeline';

export interface SuggestionServices {
  config: FolderSenseConfig;
  repository: ITrainingHistoryRepository;
  ruleEngine: RuleEngine;
  patternMatcher: PatternMatcher;
  predictionGate: PredictionGate;
  modelLifecycle: ModelLifecycleManager;
  pipeline: SuggestionPipeline;
  /** Prediction context seeded from configuration */
  defaultContext(overrides?: Partial<PredictionContext>): PredictionContext;
  /** Restore the last accepted model from history */
  initialize(): Promise<void>;
  /** Wait for background training and release the history store */
  shutdown(): Promise<void>;
}

export interface ServiceOverrides {
  repository?: ITrainingHistoryRepository;
  trainer?: ModelTrainer;
  now?: () => Date;
}

/**
 * Build every suggestion service. Pass a partial config to override environment values.
 */
export function createSuggestionServices(
  config: Partial<FolderSenseConfig> = {},
  overrides: ServiceOverrides = {},
): SuggestionServices {
  const resolved: FolderSenseConfig = { ...loadConfig(), ...config };

  logger.setLevel(resolved.logLevel);
  if (resolved.logFile) {
    logger.enableFileLogging(resolved.logFile);
  }

  let sqliteRepository: SqliteTrainingHistoryRepository | null = null;
  let repository: ITrainingHistoryRepository;
  if (overrides.repository) {
    repository = overrides.repository;
  } else if (resolved.historyDbPath) {
    sqliteRepository = new SqliteTrainingHistoryRepository(resolved.historyDbPath);
    repository = sqliteRepository;
  } else {
    repository = new InMemoryTrainingHistoryRepository();
  }

  const now = overrides.now;
  const slot = new ModelSlot();
  const ruleEngine = new RuleEngine({ now });
  const patternMatcher = new PatternMatcher({ now });
  const predictionGate = new PredictionGate(slot, { mlEnabled: resolved.mlEnabled, now });
  const modelLifecycle = new ModelLifecycleManager({ repository, slot, trainer: overrides.trainer, now });
  const pipeline = new SuggestionPipeline({
    ruleEngine,
    patternMatcher,
    predictionGate,
    concurrency: resolved.batchConcurrency,
  });

  logger.info('[ServiceRegistry] Suggestion services created', {
    mlEnabled: resolved.mlEnabled,
    history: resolved.historyDbPath ?? 'memory',
  });

  return {
    config: resolved,
    repository,
    ruleEngine,
    patternMatcher,
    predictionGate,
    modelLifecycle,
    pipeline,
    defaultContext: (contextOverrides = {}) =>
      createPredictionContext({
        mlEnabled: resolved.mlEnabled,
        minimumConfidence: resolved.minimumConfidence,
        ...contextOverrides,
      }),
    initialize: async () => {
      await modelLifecycle.initialize();
    },
    shutdown: async () => {
      await modelLifecycle.waitForPendingTraining();
      sqliteRepository?.close();
    },
  };
}
