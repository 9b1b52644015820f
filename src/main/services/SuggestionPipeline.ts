/**
 * Suggestion Pipeline
 * Rule Engine → Pattern Matcher → Prediction Gate, in strict precedence.
 * At most one suggestion per file; a failing stage counts as "no suggestion" from that stage.
 */
import pLimit from 'p-limit';
import { BATCH_DEFAULTS } from '../../shared/constants';
import { logger as baseLogger } from '../../shared/logger';
import { getErrorMessage } from '../../shared/errors';
import type { FileFact } from '../../domain/models/FileFact';
import type { LearnedPattern } from '../../domain/models/LearnedPattern';
import type { Rule } from '../../domain/models/Rule';
import {
  pendingResult,
  readyResult,
  type PredictionContext,
  type SuggestionResult,
} from '../../domain/models/Suggestion';
import type RuleEngine from './rules/RuleEngine';
import type PatternMatcher from './patterns/PatternMatcher';
import type PredictionGate from './prediction/PredictionGate';

const logger = baseLogger.child('SuggestionPipeline');

export interface SuggestionPipelineOptions {
  ruleEngine: RuleEngine;
  patternMatcher: PatternMatcher;
  predictionGate: PredictionGate;
  concurrency?: number;
}

class SuggestionPipeline {
  private ruleEngine: RuleEngine;
  private patternMatcher: PatternMatcher;
  private predictionGate: PredictionGate;
  private concurrency: number;

  constructor(options: SuggestionPipelineOptions) {
    this.ruleEngine = options.ruleEngine;
    this.patternMatcher = options.patternMatcher;
    this.predictionGate = options.predictionGate;
    this.concurrency = Math.max(1, options.concurrency ?? BATCH_DEFAULTS.CONCURRENCY);
  }

  /**
   * Never rejects: the worst outcome is a pending result
   */
  async suggest(
    file: FileFact,
    rules: readonly Rule[],
    patterns: readonly LearnedPattern[],
    negativePatterns: readonly LearnedPattern[],
    context: PredictionContext,
  ): Promise<SuggestionResult> {
    try {
      const ruleResult = this.ruleEngine.evaluateFile(file, rules);
      if (ruleResult.provenance === 'rule') {
        return ruleResult;
      }
    } catch (error) {
      logger.error('Rule stage failed', { file: file.path, error: getErrorMessage(error) });
    }

    try {
      const patternMatch = this.patternMatcher.match(file, patterns, negativePatterns);
      if (patternMatch) {
        return readyResult(file, {
          destination: patternMatch.destination,
          confidence: patternMatch.confidence,
          matchReason: patternMatch.reason,
          provenance: 'pattern',
          matchedPatternId: patternMatch.patternId,
        });
      }
    } catch (error) {
      logger.error('Pattern stage failed', { file: file.path, error: getErrorMessage(error) });
    }

    try {
      const prediction = await this.predictionGate.predict(file, context, negativePatterns);
      if (prediction) {
        return readyResult(file, {
          destination: prediction.destination,
          confidence: prediction.confidence,
          matchReason: prediction.explanation.summary,
          provenance: 'mlPrediction',
          explanation: prediction.explanation,
          modelVersion: prediction.modelVersion,
        });
      }
    } catch (error) {
      logger.error('Prediction stage failed', { file: file.path, error: getErrorMessage(error) });
    }

    return pendingResult(file);
  }

  /**
   * Suggest for many files with bounded concurrency; results keep the input order
   */
  async suggestBatch(
    files: readonly FileFact[],
    rules: readonly Rule[],
    patterns: readonly LearnedPattern[],
    negativePatterns: readonly LearnedPattern[],
    context: PredictionContext,
  ): Promise<SuggestionResult[]> {
    const startTime = Date.now();
    const limit = pLimit(this.concurrency);

    const results = await Promise.all(
      files.map((file) => limit(() => this.suggest(file, rules, patterns, negativePatterns, context))),
    );

    const byProvenance = results.reduce<Record<string, number>>((acc, result) => {
      acc[result.provenance] = (acc[result.provenance] ?? 0) + 1;
      return acc;
    }, {});
    logger.performance('suggestBatch', Date.now() - startTime, { files: files.length, ...byProvenance });
    return results;
  }
}

export default SuggestionPipeline;
