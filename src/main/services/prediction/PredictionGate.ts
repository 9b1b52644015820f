/**
 * Prediction Gate
 * Wraps the accepted destination model behind a fixed sequence of short-circuiting gates.
 * Only a prediction that clears every gate is returned; each suppression is logged and counted.
 */
import { PREDICTION_DEFAULTS } from '../../../shared/constants';
import { logger as baseLogger } from '../../../shared/logger';
import { PredictionError, getErrorMessage } from '../../../shared/errors';
import type { FileFact } from '../../../domain/models/FileFact';
import type { LearnedPattern } from '../../../domain/models/LearnedPattern';
import type {
  PredictedDestination,
  PredictionContext,
  PredictionExplanation,
} from '../../../domain/models/Suggestion';
import { isSuppressed } from '../patterns/PatternMatcher';
import type { DestinationModel, RankedDestination } from './DestinationModel';
import { batchKey, featuresForFile, toTokens, type DestinationFeatures } from './FeatureExtractor';
import type ModelSlot from './ModelSlot';

const logger = baseLogger.child('PredictionGate');

export type GateName = 'disabled' | 'noModel' | 'lowConfidence' | 'ambiguous' | 'notAllowed' | 'negative';

export interface GateStats {
  predicted: number;
  failed: number;
  suppressed: Record<GateName, number>;
}

export interface PredictionGateOptions {
  mlEnabled?: boolean;
  minimumMargin?: number;
  now?: () => Date;
}

function emptyStats(): GateStats {
  return {
    predicted: 0,
    failed: 0,
    suppressed: { disabled: 0, noModel: 0, lowConfidence: 0, ambiguous: 0, notAllowed: 0, negative: 0 },
  };
}

function explain(model: DestinationModel, destination: string, features: DestinationFeatures): PredictionExplanation {
  const label = features.extension ? features.extension.toUpperCase() : 'extensionless';
  const count = model.support(destination, `ext_${features.extension}`);
  const reasons = [`Based on ${count} similar ${label} files`];

  const keyword = features.keywords.find((word) => model.support(destination, `kw_${word}`) > 0);
  if (keyword) {
    reasons.push(`File name contains '${keyword}'`);
  }

  return {
    summary: `Similar to ${count} past ${label} files you moved to ${destination}`,
    reasons,
  };
}

class PredictionGate {
  private slot: ModelSlot;
  private mlEnabled: boolean;
  private minimumMargin: number;
  private now: () => Date;
  private stats: GateStats;

  constructor(slot: ModelSlot, options: PredictionGateOptions = {}) {
    this.slot = slot;
    this.mlEnabled = options.mlEnabled ?? true;
    this.minimumMargin = options.minimumMargin ?? PREDICTION_DEFAULTS.MINIMUM_MARGIN;
    this.now = options.now ?? (() => new Date());
    this.stats = emptyStats();
  }

  /**
   * Service-level kill switch, checked together with context.mlEnabled
   */
  setMlEnabled(enabled: boolean): void {
    this.mlEnabled = enabled;
    logger.info(`Destination prediction ${enabled ? 'enabled' : 'disabled'}`);
  }

  isMlEnabled(): boolean {
    return this.mlEnabled;
  }

  getGateStats(): GateStats {
    return { ...this.stats, suppressed: { ...this.stats.suppressed } };
  }

  resetGateStats(): void {
    this.stats = emptyStats();
  }

  async predict(
    file: FileFact,
    context: PredictionContext,
    negativePatterns: readonly LearnedPattern[],
  ): Promise<PredictedDestination | null> {
    return this.evaluate(file, featuresForFile(file, this.now()), context, negativePatterns);
  }

  /**
   * Predict for many files; files sharing a feature key share one evaluation. Results keep input order.
   */
  async predictBatch(
    files: readonly FileFact[],
    context: PredictionContext,
    negativePatterns: readonly LearnedPattern[],
  ): Promise<Array<PredictedDestination | null>> {
    const now = this.now();
    const cache = new Map<string, PredictedDestination | null>();
    const results: Array<PredictedDestination | null> = [];

    for (const file of files) {
      const features = featuresForFile(file, now);
      const key = batchKey(features);
      if (!cache.has(key)) {
        cache.set(key, await this.evaluate(file, features, context, negativePatterns));
      }
      results.push(cache.get(key) ?? null);
    }

    logger.debug('Batch prediction complete', { files: files.length, groups: cache.size });
    return results;
  }

  private suppress(gate: GateName, file: FileFact, details: Record<string, unknown> = {}): null {
    this.stats.suppressed[gate] += 1;
    logger.debug(`Prediction suppressed: ${gate}`, { file: file.name, ...details });
    return null;
  }

  private async evaluate(
    file: FileFact,
    features: DestinationFeatures,
    context: PredictionContext,
    negativePatterns: readonly LearnedPattern[],
  ): Promise<PredictedDestination | null> {
    if (!context.mlEnabled || !this.mlEnabled) {
      return this.suppress('disabled', file);
    }

    const snapshot = this.slot.current();
    if (!snapshot) {
      return this.suppress('noModel', file);
    }

    let ranked: RankedDestination[];
    try {
      ranked = snapshot.model.rank(toTokens(features));
    } catch (error) {
      const failure = new PredictionError(snapshot.record.version, getErrorMessage(error));
      this.stats.failed += 1;
      logger.error('Inference failed', failure.toLogEntry());
      return null;
    }

    const [top, runnerUp] = ranked;
    if (!top || top.score < context.minimumConfidence) {
      return this.suppress('lowConfidence', file, {
        confidence: top?.score ?? null,
        threshold: context.minimumConfidence,
      });
    }

    if (runnerUp && top.score - runnerUp.score < this.minimumMargin) {
      return this.suppress('ambiguous', file, {
        top: top.score,
        runnerUp: runnerUp.score,
      });
    }

    if (context.allowedDestinations.length > 0 && !context.allowedDestinations.includes(top.destination)) {
      return this.suppress('notAllowed', file, { destination: top.destination });
    }

    if (isSuppressed(file.extension, top.destination, negativePatterns)) {
      return this.suppress('negative', file, { destination: top.destination });
    }

    this.stats.predicted += 1;
    return {
      destination: top.destination,
      confidence: top.score,
      explanation: explain(snapshot.model, top.destination, features),
      modelVersion: snapshot.record.version,
    };
  }
}

export default PredictionGate;
