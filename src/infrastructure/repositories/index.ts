export { InMemoryTrainingHistoryRepository } from './InMemoryTrainingHistoryRepository';
export { SqliteTrainingHistoryRepository } from './SqliteTrainingHistoryRepository';
