/**
 * Suggestion Domain Model
 * Output of the suggestion pipeline and per-request prediction settings
 */
import { PREDICTION_DEFAULTS } from '../../shared/constants';
import type { FileFact, FileStatus } from './FileFact';

export type SuggestionProvenance = 'rule' | 'pattern' | 'mlPrediction' | 'none';

export interface PredictionExplanation {
  summary: string;
  reasons: string[];
}

export interface SuggestionResult {
  filePath: string;
  status: FileStatus;
  destination: string | null;
  confidence: number | null;
  matchReason: string | null;
  provenance: SuggestionProvenance;
  matchedRuleId: string | null;
  matchedPatternId: string | null;
  explanation: PredictionExplanation | null;
  modelVersion: string | null;
}

export interface PredictionContext {
  mlEnabled: boolean;
  minimumConfidence: number;
  /** Empty means unrestricted */
  allowedDestinations: string[];
}

export function createPredictionContext(overrides: Partial<PredictionContext> = {}): PredictionContext {
  return {
    mlEnabled: overrides.mlEnabled ?? true,
    minimumConfidence: overrides.minimumConfidence ?? PREDICTION_DEFAULTS.MINIMUM_CONFIDENCE,
    allowedDestinations: overrides.allowedDestinations ?? [],
  };
}

export interface PredictedDestination {
  destination: string;
  confidence: number;
  explanation: PredictionExplanation;
  modelVersion: string;
}

/**
 * The undecided outcome. Skipped files keep their status.
 */
export function pendingResult(file: FileFact): SuggestionResult {
  return {
    filePath: file.path,
    status: file.status === 'skipped' ? 'skipped' : 'pending',
    destination: null,
    confidence: null,
    matchReason: null,
    provenance: 'none',
    matchedRuleId: null,
    matchedPatternId: null,
    explanation: null,
    modelVersion: null,
  };
}

/**
 * A decided outcome; skipped files keep their status
 */
export function readyResult(
  file: FileFact,
  fields: Pick<SuggestionResult, 'destination' | 'confidence' | 'matchReason' | 'provenance'> &
    Partial<Pick<SuggestionResult, 'matchedRuleId' | 'matchedPatternId' | 'explanation' | 'modelVersion'>>,
): SuggestionResult {
  return {
    ...pendingResult(file),
    status: file.status === 'skipped' ? 'skipped' : 'ready',
    ...fields,
  };
}
