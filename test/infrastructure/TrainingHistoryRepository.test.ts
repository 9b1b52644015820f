/**
 * Tests for the training history repositories
 */
import type { ITrainingHistoryRepository } from '../../src/domain/repositories/ITrainingHistoryRepository';
import { InMemoryTrainingHistoryRepository } from '../../src/infrastructure/repositories/InMemoryTrainingHistoryRepository';
import { SqliteTrainingHistoryRepository } from '../../src/infrastructure/repositories/SqliteTrainingHistoryRepository';
import { makeRecord } from '../mocks/fixtures';

const implementations: Array<[string, () => ITrainingHistoryRepository & { close?: () => void }]> = [
  ['InMemoryTrainingHistoryRepository', () => new InMemoryTrainingHistoryRepository()],
  ['SqliteTrainingHistoryRepository', () => new SqliteTrainingHistoryRepository(':memory:')],
];

describe.each(implementations)('%s', (_name, create) => {
  let repository: ITrainingHistoryRepository & { close?: () => void };

  beforeEach(() => {
    repository = create();
  });

  afterEach(() => {
    repository.close?.();
  });

  test('should return null when nothing was recorded', async () => {
    expect(await repository.findActive('destinationPrediction')).toBeNull();
    expect(await repository.findLatest('destinationPrediction')).toBeNull();
    expect(await repository.list('destinationPrediction')).toEqual([]);
  });

  test('should round-trip every record field', async () => {
    const record = makeRecord({ notes: 'Rejected: accuracy 0.500 below 0.7', accepted: false });
    await repository.insert(record);

    expect(await repository.list('destinationPrediction')).toEqual([record]);
  });

  test('should pick the latest accepted record as active', async () => {
    await repository.insert(makeRecord({ version: 'v1', trainedAt: new Date('2026-10-01T00:00:00Z') }), 'a1');
    await repository.insert(makeRecord({ version: 'v2', trainedAt: new Date('2026-10-05T00:00:00Z') }), 'a2');
    await repository.insert(
      makeRecord({ version: 'v3', trainedAt: new Date('2026-10-09T00:00:00Z'), accepted: false }),
    );

    expect((await repository.findActive('destinationPrediction'))?.version).toBe('v2');
    expect((await repository.findLatest('destinationPrediction'))?.version).toBe('v3');
    expect((await repository.list('destinationPrediction')).map((r) => r.version)).toEqual(['v1', 'v2', 'v3']);
  });

  test('should break trainedAt ties in favour of the later insert', async () => {
    const trainedAt = new Date('2026-10-05T00:00:00Z');
    await repository.insert(makeRecord({ version: 'first', trainedAt }), 'a1');
    await repository.insert(makeRecord({ version: 'second', trainedAt }), 'a2');

    expect((await repository.findActive('destinationPrediction'))?.version).toBe('second');
  });

  test('should store artifacts per version', async () => {
    await repository.insert(makeRecord({ version: 'v1' }), '{"weights":1}');
    await repository.insert(makeRecord({ version: 'v2', accepted: false }));

    expect(await repository.loadArtifact('destinationPrediction', 'v1')).toBe('{"weights":1}');
    expect(await repository.loadArtifact('destinationPrediction', 'v2')).toBeNull();
    expect(await repository.loadArtifact('otherModel', 'v1')).toBeNull();
  });

  test('should keep models separate by name', async () => {
    await repository.insert(makeRecord({ modelName: 'otherModel' }), 'x');

    expect(await repository.findActive('destinationPrediction')).toBeNull();
    expect(await repository.list('otherModel')).toHaveLength(1);
  });
});
