/**
 * Feature tokens for the destination classifier.
 * A file becomes a bag of tokens: ext_*, kw_*, cat_*, a time bucket and src_*.
 */
import { kindForExtension, type FileKind, type FileLocationKind } from '../../../shared/constants';
import { normalizeExtension } from '../../../shared/filenameMatching';
import type { FileFact } from '../../../domain/models/FileFact';
import type { TrainingExample } from '../../../domain/models/TrainingHistory';

export interface DestinationFeatures {
  extension: string;
  keywords: string[];
  category: FileKind | 'other';
  timeBucket: string;
  sourceLocation?: FileLocationKind;
}

function stripExtension(fileName: string, extension: string): string {
  if (!extension) return fileName;
  const suffix = `.${extension}`;
  return fileName.toLowerCase().endsWith(suffix) ? fileName.slice(0, -suffix.length) : fileName;
}

/**
 * Name words longer than two characters, split on underscores, hyphens and spaces
 */
export function extractKeywords(fileName: string, extension = ''): string[] {
  return stripExtension(fileName.trim().normalize('NFC'), extension)
    .toLowerCase()
    .split(/[_\- ]+/)
    .filter((word) => word.length > 2);
}

/**
 * Weekend, workday (09-17h) or evening, plus the hour. UTC so training and inference agree across machines.
 */
export function timeBucket(date: Date): string {
  const hour = date.getUTCHours();
  const weekday = date.getUTCDay();
  const isWeekend = weekday === 0 || weekday === 6;
  const label = isWeekend ? 'weekend' : hour >= 9 && hour <= 17 ? 'workday' : 'evening';
  return `${label}_hour_${hour}`;
}

function buildFeatures(
  fileName: string,
  extension: string,
  at: Date,
  sourceLocation?: FileLocationKind,
): DestinationFeatures {
  const ext = normalizeExtension(extension);
  return {
    extension: ext,
    keywords: extractKeywords(fileName, ext),
    category: kindForExtension(ext) ?? 'other',
    timeBucket: timeBucket(at),
    sourceLocation,
  };
}

export function featuresForFile(file: FileFact, now: Date): DestinationFeatures {
  return buildFeatures(file.name, file.extension, now, file.location);
}

export function featuresForExample(example: TrainingExample): DestinationFeatures {
  return buildFeatures(example.fileName, example.extension, example.timestamp, example.sourceLocation);
}

export function toTokens(features: DestinationFeatures): string[] {
  const tokens = [`ext_${features.extension}`];
  tokens.push(...features.keywords.map((keyword) => `kw_${keyword}`));
  tokens.push(`cat_${features.category}`);
  tokens.push(features.timeBucket);
  if (features.sourceLocation) {
    tokens.push(`src_${features.sourceLocation}`);
  }
  return tokens;
}

/**
 * Files with the same key share one batch prediction
 */
export function batchKey(features: DestinationFeatures): string {
  return [features.extension, features.category, features.sourceLocation ?? '', features.timeBucket].join('|');
}
