/**
 * Repositories Export
 * Central export point for all repository interfaces
 */

export type { ITrainingHistoryRepository } from './ITrainingHistoryRepository';
