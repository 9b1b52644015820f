/**
 * LearnedPattern Domain Model
 * Frequency-based (extension → destination) patterns observed from user behaviour.
 * Negative patterns record rejected pairings and only ever suppress.
 */
import { normalizeExtension } from '../../shared/filenameMatching';
import type { Condition } from './Condition';

export interface LearnedPattern {
  readonly id: string;
  readonly extension: string;
  readonly destination: string;
  readonly occurrenceCount: number;
  /** Clamped to [0, 1] */
  readonly confidence: number;
  /** Extra conditions that must all hold for the pattern to apply */
  readonly conditions: readonly Condition[];
  readonly isNegative: boolean;
  readonly rejectionCount: number;
}

export interface LearnedPatternInput {
  id: string;
  extension: string;
  destination: string;
  occurrenceCount: number;
  confidence: number;
  conditions?: readonly Condition[];
  isNegative?: boolean;
  rejectionCount?: number;
}

export function createLearnedPattern(input: LearnedPatternInput): LearnedPattern {
  return Object.freeze({
    id: input.id,
    extension: normalizeExtension(input.extension),
    destination: input.destination,
    occurrenceCount: Math.max(0, input.occurrenceCount),
    confidence: Math.min(1, Math.max(0, input.confidence)),
    conditions: input.conditions ?? [],
    isNegative: input.isNegative ?? false,
    rejectionCount: input.rejectionCount ?? 0,
  });
}

/**
 * Whether a negative pattern blocks suggesting `destination` for files of `extension`
 */
export function suppresses(pattern: LearnedPattern, extension: string, destination: string): boolean {
  if (!pattern.isNegative) return false;
  return pattern.extension === normalizeExtension(extension) && pattern.destination === destination;
}
