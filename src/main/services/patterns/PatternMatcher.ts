/**
 * Pattern Matcher
 * Picks the strongest learned (extension → destination) pattern for a file.
 * Negative patterns only suppress; they never redirect to another destination.
 */
import { PATTERN_DEFAULTS } from '../../../shared/constants';
import { logger as baseLogger } from '../../../shared/logger';
import { normalizeExtension } from '../../../shared/filenameMatching';
import { suppresses, type LearnedPattern } from '../../../domain/models/LearnedPattern';
import type { FileFact } from '../../../domain/models/FileFact';
import { evaluateCondition } from '../rules/ConditionEvaluator';

const logger = baseLogger.child('PatternMatcher');

export interface PatternMatch {
  destination: string;
  confidence: number;
  patternId: string;
  reason: string;
}

export function describePattern(pattern: LearnedPattern): string {
  const moves = pattern.occurrenceCount === 1 ? 'move' : 'moves';
  return `Based on learned pattern: .${pattern.extension} files → ${pattern.destination} (${pattern.occurrenceCount} ${moves})`;
}

/**
 * True when any negative pattern for the file's extension names `destination`
 */
export function isSuppressed(
  extension: string,
  destination: string,
  negativePatterns: readonly LearnedPattern[],
): boolean {
  return negativePatterns.some((pattern) => suppresses(pattern, extension, destination));
}

function isCandidate(pattern: LearnedPattern, file: FileFact, now: Date): boolean {
  if (pattern.isNegative) return false;
  if (pattern.rejectionCount >= PATTERN_DEFAULTS.MAX_REJECTIONS) return false;
  if (pattern.extension !== normalizeExtension(file.extension)) return false;
  return pattern.conditions.every((condition) => evaluateCondition(condition, file, now));
}

/**
 * Strictly better: more occurrences, then higher confidence. Ties keep the earlier pattern.
 */
function outranks(challenger: LearnedPattern, incumbent: LearnedPattern): boolean {
  if (challenger.occurrenceCount !== incumbent.occurrenceCount) {
    return challenger.occurrenceCount > incumbent.occurrenceCount;
  }
  return challenger.confidence > incumbent.confidence;
}

class PatternMatcher {
  private now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  match(
    file: FileFact,
    patterns: readonly LearnedPattern[],
    negativePatterns: readonly LearnedPattern[],
  ): PatternMatch | null {
    const now = this.now();
    let best: LearnedPattern | null = null;

    for (const pattern of patterns) {
      if (!isCandidate(pattern, file, now)) continue;
      if (!best || outranks(pattern, best)) {
        best = pattern;
      }
    }

    if (!best) return null;

    if (isSuppressed(file.extension, best.destination, negativePatterns)) {
      logger.debug('Pattern suppressed by negative pattern', {
        file: file.name,
        patternId: best.id,
        destination: best.destination,
      });
      return null;
    }

    return {
      destination: best.destination,
      confidence: best.confidence,
      patternId: best.id,
      reason: describePattern(best),
    };
  }
}

export default PatternMatcher;
