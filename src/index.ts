/**
 * FolderSense public API
 */
export * from './domain/models';
export type { ITrainingHistoryRepository } from './domain/repositories';
export { InMemoryTrainingHistoryRepository, SqliteTrainingHistoryRepository } from './infrastructure/repositories';

export { evaluateCondition, evaluateTree, RuleEngine, type TreeMatch } from './main/services/rules';
export { PatternMatcher, type PatternMatch } from './main/services/patterns';
export { default as ModelSlot, type ModelSnapshot } from './main/services/prediction/ModelSlot';
export {
  default as PredictionGate,
  type GateName,
  type GateStats,
} from './main/services/prediction/PredictionGate';
export {
  default as ModelLifecycleManager,
  type TrainOptions,
} from './main/services/prediction/ModelLifecycleManager';
export { NaiveBayesClassifier, NaiveBayesTrainer } from './main/services/prediction/NaiveBayesClassifier';
export type {
  DestinationModel,
  ModelTrainer,
  RankedDestination,
  TrainingSample,
} from './main/services/prediction/DestinationModel';
export { default as SuggestionPipeline } from './main/services/SuggestionPipeline';
export { createSuggestionServices, type SuggestionServices } from './main/core/serviceRegistry';

export { loadConfig, type FolderSenseConfig } from './shared/config';
export { logger, Logger, LOG_LEVELS } from './shared/logger';
export * from './shared/errors';
export { FILE_KINDS, TRASH_DESTINATION, type FileKind, type FileLocationKind } from './shared/constants';
