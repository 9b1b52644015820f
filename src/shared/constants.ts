/**
 * Shared Constants
 * Tunables for rule evaluation, pattern matching and destination prediction
 */
import fileKindTable from './fileKinds.json';

// ===== FILE KINDS =====

export const FILE_KINDS = [
  'image',
  'video',
  'audio',
  'document',
  'spreadsheet',
  'presentation',
  'archive',
  'code',
] as const;

export type FileKind = (typeof FILE_KINDS)[number];

/**
 * Static kind → extension table. Not user-editable.
 */
export const FILE_KIND_EXTENSIONS: Readonly<Record<FileKind, ReadonlySet<string>>> = {
  image: new Set(fileKindTable.image),
  video: new Set(fileKindTable.video),
  audio: new Set(fileKindTable.audio),
  document: new Set(fileKindTable.document),
  spreadsheet: new Set(fileKindTable.spreadsheet),
  presentation: new Set(fileKindTable.presentation),
  archive: new Set(fileKindTable.archive),
  code: new Set(fileKindTable.code),
};

export function isFileKind(value: string): value is FileKind {
  return (FILE_KINDS as readonly string[]).includes(value);
}

/**
 * Kind of a file extension, or null when the extension is in no category
 */
export function kindForExtension(extension: string): FileKind | null {
  const ext = extension.toLowerCase().replace(/^\./, '');
  for (const kind of FILE_KINDS) {
    if (FILE_KIND_EXTENSIONS[kind].has(ext)) {
      return kind;
    }
  }
  return null;
}

// ===== SOURCE LOCATIONS =====

export const FILE_LOCATIONS = [
  'desktop',
  'downloads',
  'documents',
  'pictures',
  'music',
  'movies',
  'home',
  'unknown',
] as const;

export type FileLocationKind = (typeof FILE_LOCATIONS)[number];

export function isFileLocationKind(value: string): value is FileLocationKind {
  return (FILE_LOCATIONS as readonly string[]).includes(value);
}

// ===== DESTINATIONS =====

/**
 * Pseudo-destination produced by delete rules so callers can render them like moves
 */
export const TRASH_DESTINATION = 'Trash';

// ===== RULES =====

export const RULE_DEFAULTS = {
  // Rules are deterministic ground truth
  CONFIDENCE: 0.95,
  SORT_ORDER: 0,
} as const;

// ===== LEARNED PATTERNS =====

export const PATTERN_DEFAULTS = {
  // A pattern rejected this many times is never proposed again
  MAX_REJECTIONS: 3,
} as const;

// ===== DESTINATION PREDICTION =====

export const PREDICTION_DEFAULTS = {
  MODEL_NAME: 'destinationPrediction',
  MINIMUM_CONFIDENCE: 0.7,
  // Required gap between the top-1 and top-2 candidate scores
  MINIMUM_MARGIN: 0.15,
} as const;

export const TRAINING_DEFAULTS = {
  MIN_EXAMPLES: 50,
  MIN_DESTINATIONS: 3,
  MAX_DATASET_SIZE: 5000,
  // Every Nth example of each destination is held out for validation (80/20)
  VALIDATION_STRIDE: 5,
  MIN_ACCURACY: 0.7,
  MAX_FALSE_POSITIVE_RATE: 0.2,
  MIN_CONFIDENCE_SEPARATION: 0.15,
  RETRAIN_AFTER_DAYS: 30,
  RETRAIN_MIN_NEW_EXAMPLES: 25,
  // Examples processed between event-loop yields while training
  TRAINING_CHUNK_SIZE: 250,
} as const;

export const DRIFT_DEFAULTS = {
  WINDOW_SIZE: 100,
  MIN_ACCEPTANCE_RATE: 0.5,
  MAX_OVERRIDE_RATE: 0.4,
} as const;

// ===== BATCH PROCESSING =====

export const BATCH_DEFAULTS = {
  CONCURRENCY: 8,
} as const;

export const SECONDS_PER_DAY = 86400;
