/**
 * Shared test data builders
 */
import { createFileFact, type FileFact, type FileFactInput } from '../../src/domain/models/FileFact';
import type { TrainedModelRecord, TrainingExample } from '../../src/domain/models/TrainingHistory';
import type { DestinationModel, RankedDestination } from '../../src/main/services/prediction/DestinationModel';

/** Monday, 12:00 UTC */
export const NOW = new Date('2026-10-19T12:00:00.000Z');
export const DAY_MS = 86_400_000;

export function daysAgo(days: number, extraMs = 0): Date {
  return new Date(NOW.getTime() - days * DAY_MS - extraMs);
}

export function makeFile(path: string, overrides: Partial<FileFactInput> = {}): FileFact {
  return createFileFact({ path, size: 1024, createdAt: NOW, ...overrides });
}

/**
 * `count` examples per destination, with distinct extensions and keywords so the classes separate cleanly
 */
export function separableExamples(count: number): TrainingExample[] {
  const classes = [
    { destination: 'Documents/Invoices', extension: 'pdf', keyword: 'invoice' },
    { destination: 'Pictures/Screenshots', extension: 'png', keyword: 'screenshot' },
    { destination: 'Music/Podcasts', extension: 'mp3', keyword: 'episode' },
  ];
  const examples: TrainingExample[] = [];
  for (let i = 0; i < count; i += 1) {
    for (const cls of classes) {
      examples.push({
        fileName: `${cls.keyword}_${i}.${cls.extension}`,
        extension: cls.extension,
        destination: cls.destination,
        timestamp: new Date(NOW.getTime() - (count - i) * 60_000),
        sourceLocation: 'downloads',
      });
    }
  }
  return examples;
}

/**
 * `total` examples spread round-robin over `destinations` distinct folders
 */
export function examplesAcross(total: number, destinations: number): TrainingExample[] {
  return Array.from({ length: total }, (_, i) => ({
    fileName: `file_${i}.txt`,
    extension: 'txt',
    destination: `Folder${i % destinations}`,
    timestamp: new Date(NOW.getTime() - (total - i) * 60_000),
  }));
}

export function makeRecord(overrides: Partial<TrainedModelRecord> = {}): TrainedModelRecord {
  return {
    modelName: 'destinationPrediction',
    version: '1-2026-10-01T000000Z',
    exampleCount: 60,
    labelCount: 3,
    validationAccuracy: 0.9,
    falsePositiveRate: 0.05,
    accepted: true,
    trainedAt: new Date('2026-10-01T00:00:00.000Z'),
    notes: null,
    ...overrides,
  };
}

/**
 * A model that ranks every input the same way
 */
export function stubModel(ranked: RankedDestination[], supportCount = 4): DestinationModel {
  return {
    destinations: ranked.map((candidate) => candidate.destination),
    rank: jest.fn(() => ranked.map((candidate) => ({ ...candidate }))),
    support: jest.fn(() => supportCount),
    serialize: () => JSON.stringify({ ranked, supportCount }),
  };
}
