/**
 * Multinomial naive Bayes over feature tokens, with Laplace smoothing.
 * Scores are the softmax of per-destination log posteriors.
 */
import { z } from 'zod';
import { TRAINING_DEFAULTS } from '../../../shared/constants';
import { yieldToEventLoop } from '../../../shared/asyncUtils';
import { FolderSenseError, ErrorCodes } from '../../../shared/errors';
import type { DestinationModel, ModelTrainer, RankedDestination, TrainingSample } from './DestinationModel';

const SMOOTHING = 1;

// Counts are stored as entry lists; destination names are user text and never become object keys
const ArtifactSchema = z.object({
  kind: z.literal('multinomialNaiveBayes'),
  formatVersion: z.literal(1),
  destinations: z.array(
    z.object({
      destination: z.string(),
      count: z.number().int().positive(),
      tokens: z.array(z.tuple([z.string(), z.number().int().nonnegative()])),
    }),
  ),
  vocabulary: z.array(z.string()),
});

export type NaiveBayesArtifact = z.infer<typeof ArtifactSchema>;

interface DestinationStats {
  count: number;
  tokens: Map<string, number>;
  tokenTotal: number;
}

export class NaiveBayesClassifier implements DestinationModel {
  readonly destinations: readonly string[];
  private stats: Map<string, DestinationStats>;
  private vocabulary: ReadonlySet<string>;
  private totalExamples: number;

  constructor(artifact: NaiveBayesArtifact) {
    this.stats = new Map<string, DestinationStats>(
      artifact.destinations.map((entry) => [
        entry.destination,
        {
          count: entry.count,
          tokens: new Map(entry.tokens),
          tokenTotal: entry.tokens.reduce((sum, [, count]) => sum + count, 0),
        },
      ]),
    );
    this.destinations = [...this.stats.keys()].sort();
    this.vocabulary = new Set(artifact.vocabulary);
    this.totalExamples = artifact.destinations.reduce((sum, entry) => sum + entry.count, 0);
  }

  static fromJSON(serialized: string): NaiveBayesClassifier {
    let raw: unknown;
    try {
      raw = JSON.parse(serialized);
    } catch (error) {
      throw new FolderSenseError('Model artifact is not valid JSON', ErrorCodes.ARTIFACT_INVALID, {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = ArtifactSchema.safeParse(raw);
    if (!parsed.success) {
      throw new FolderSenseError('Model artifact has an unexpected shape', ErrorCodes.ARTIFACT_INVALID, {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return new NaiveBayesClassifier(parsed.data);
  }

  rank(tokens: readonly string[]): RankedDestination[] {
    if (this.destinations.length === 0) return [];

    const vocabularySize = this.vocabulary.size;
    const known = tokens.filter((token) => this.vocabulary.has(token));

    const logPosteriors = this.destinations.map((destination) => {
      const stats = this.stats.get(destination);
      if (!stats) return -Infinity;
      const denominator = stats.tokenTotal + SMOOTHING * vocabularySize;
      let logP = Math.log(stats.count / this.totalExamples);
      for (const token of known) {
        logP += Math.log(((stats.tokens.get(token) ?? 0) + SMOOTHING) / denominator);
      }
      return logP;
    });

    // Softmax, shifted by the max for numerical stability
    const max = Math.max(...logPosteriors);
    const exps = logPosteriors.map((value) => Math.exp(value - max));
    const sum = exps.reduce((acc, value) => acc + value, 0);

    return this.destinations
      .map((destination, index) => ({ destination, score: exps[index] / sum }))
      .sort((a, b) => b.score - a.score || a.destination.localeCompare(b.destination));
  }

  support(destination: string, token: string): number {
    return this.stats.get(destination)?.tokens.get(token) ?? 0;
  }

  serialize(): string {
    const artifact: NaiveBayesArtifact = {
      kind: 'multinomialNaiveBayes',
      formatVersion: 1,
      destinations: this.destinations.map((destination) => {
        const stats = this.stats.get(destination);
        return {
          destination,
          count: stats?.count ?? 0,
          tokens: stats ? [...stats.tokens.entries()].sort(([a], [b]) => a.localeCompare(b)) : [],
        };
      }),
      vocabulary: [...this.vocabulary].sort(),
    };
    return JSON.stringify(artifact);
  }
}

/**
 * Counts tokens per destination, yielding between chunks so suggestion calls keep flowing
 */
export class NaiveBayesTrainer implements ModelTrainer {
  private chunkSize: number;

  constructor(options: { chunkSize?: number } = {}) {
    this.chunkSize = Math.max(1, options.chunkSize ?? TRAINING_DEFAULTS.TRAINING_CHUNK_SIZE);
  }

  async train(samples: readonly TrainingSample[]): Promise<DestinationModel> {
    const counts = new Map<string, { count: number; tokens: Map<string, number> }>();
    const vocabulary = new Set<string>();

    for (let start = 0; start < samples.length; start += this.chunkSize) {
      for (const sample of samples.slice(start, start + this.chunkSize)) {
        const entry = counts.get(sample.destination) ?? { count: 0, tokens: new Map<string, number>() };
        entry.count += 1;
        counts.set(sample.destination, entry);
        for (const token of sample.tokens) {
          entry.tokens.set(token, (entry.tokens.get(token) ?? 0) + 1);
          vocabulary.add(token);
        }
      }
      await yieldToEventLoop();
    }

    return new NaiveBayesClassifier({
      kind: 'multinomialNaiveBayes',
      formatVersion: 1,
      destinations: [...counts.entries()].map(([destination, entry]) => ({
        destination,
        count: entry.count,
        tokens: [...entry.tokens.entries()],
      })),
      vocabulary: [...vocabulary].sort(),
    });
  }

  restore(artifact: string): DestinationModel {
    return NaiveBayesClassifier.fromJSON(artifact);
  }
}
