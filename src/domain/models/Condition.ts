/**
 * Condition Domain Model
 * A closed tagged union of single-file predicates, plus the validating factories
 * used by the rule editor and the natural-language rule parser.
 */
import {
  FILE_LOCATIONS,
  isFileKind,
  isFileLocationKind,
  type FileKind,
  type FileLocationKind,
} from '../../shared/constants';
import { formatByteSize, parseByteSize } from '../../shared/byteSize';
import { normalizeExtension } from '../../shared/filenameMatching';
import { ValidationError } from '../../shared/errors';

export type DateField = 'created' | 'modified' | 'accessed';

export type Condition =
  | { readonly type: 'extensionEquals'; readonly extension: string }
  | { readonly type: 'nameContains'; readonly text: string }
  | { readonly type: 'nameStartsWith'; readonly text: string }
  | { readonly type: 'nameEndsWith'; readonly text: string }
  | { readonly type: 'kindEquals'; readonly kind: FileKind }
  | {
      readonly type: 'olderThan';
      readonly days: number;
      readonly field: DateField;
      readonly extension?: string;
    }
  | { readonly type: 'largerThan'; readonly bytes: number }
  | { readonly type: 'sourceLocation'; readonly location: FileLocationKind }
  | { readonly type: 'not'; readonly condition: Condition };

export type ConditionType = Condition['type'];

function requireText(field: string, value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ValidationError(field, 'must not be empty', value);
  }
  return trimmed;
}

function requireDays(value: number): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError('days', 'must be a positive whole number of days', value);
  }
  return value;
}

function normalizeKind(value: string): FileKind {
  const kind = value.trim().toLowerCase();
  // "images", "videos", "documents" ... are accepted for their singular kind
  const singular = kind.endsWith('s') && kind !== 'code' ? kind.slice(0, -1) : kind;
  if (isFileKind(kind)) return kind;
  if (isFileKind(singular)) return singular;
  throw new ValidationError('kind', 'is not a known file kind', value);
}

/**
 * Validating constructors. Every factory throws ValidationError for malformed values,
 * so a Condition that exists is always safe to evaluate.
 */
export const Conditions = {
  extensionEquals(extension: string): Condition {
    const ext = normalizeExtension(requireText('extension', extension));
    if (!ext) {
      throw new ValidationError('extension', 'must not be empty', extension);
    }
    return { type: 'extensionEquals', extension: ext };
  },

  nameContains(text: string): Condition {
    return { type: 'nameContains', text: requireText('text', text) };
  },

  nameStartsWith(text: string): Condition {
    return { type: 'nameStartsWith', text: requireText('text', text) };
  },

  nameEndsWith(text: string): Condition {
    return { type: 'nameEndsWith', text: requireText('text', text) };
  },

  kindEquals(kind: string): Condition {
    return { type: 'kindEquals', kind: normalizeKind(kind) };
  },

  olderThan(days: number, field: DateField = 'created', extension?: string): Condition {
    const validDays = requireDays(days);
    if (extension === undefined) {
      return { type: 'olderThan', days: validDays, field };
    }
    const ext = normalizeExtension(requireText('extension', extension));
    return { type: 'olderThan', days: validDays, field, extension: ext };
  },

  largerThan(bytes: number | string): Condition {
    const parsed = typeof bytes === 'string' ? parseByteSize(bytes) : bytes;
    if (parsed === null) {
      throw new ValidationError('size', 'expected a number with a unit such as 100MB or 1.5GB', bytes);
    }
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new ValidationError('size', 'must be greater than zero', bytes);
    }
    return { type: 'largerThan', bytes: Math.floor(parsed) };
  },

  sourceLocation(location: string): Condition {
    const value = location.trim().toLowerCase();
    if (!isFileLocationKind(value)) {
      throw new ValidationError('location', `must be one of ${FILE_LOCATIONS.join(', ')}`, location);
    }
    return { type: 'sourceLocation', location: value };
  },

  not(condition: Condition): Condition {
    return { type: 'not', condition };
  },
};

/**
 * String-typed condition kinds as produced by the rule editor and the NL parser
 */
export type ConditionLiteralType =
  | 'extension'
  | 'nameContains'
  | 'nameStartsWith'
  | 'nameEndsWith'
  | 'kind'
  | 'olderThan'
  | 'modifiedOlderThan'
  | 'accessedOlderThan'
  | 'largerThan'
  | 'sourceLocation';

function parseDays(literal: string): number {
  if (!/^-?\d+(\.\d+)?$/.test(literal)) {
    throw new ValidationError('days', 'must be a number', literal);
  }
  return requireDays(Number(literal));
}

/**
 * Build a condition from its editor form, e.g. ("olderThan", "pdf:30") or ("largerThan", "1.5GB")
 */
export function parseCondition(type: ConditionLiteralType, value: string): Condition {
  const trimmed = value.trim();

  switch (type) {
    case 'extension':
      return Conditions.extensionEquals(trimmed);
    case 'nameContains':
      return Conditions.nameContains(trimmed);
    case 'nameStartsWith':
      return Conditions.nameStartsWith(trimmed);
    case 'nameEndsWith':
      return Conditions.nameEndsWith(trimmed);
    case 'kind':
      return Conditions.kindEquals(trimmed);
    case 'olderThan': {
      const parts = trimmed.split(':');
      if (parts.length === 2) {
        return Conditions.olderThan(parseDays(parts[1].trim()), 'created', parts[0]);
      }
      return Conditions.olderThan(parseDays(trimmed), 'created');
    }
    case 'modifiedOlderThan':
      return Conditions.olderThan(parseDays(trimmed), 'modified');
    case 'accessedOlderThan':
      return Conditions.olderThan(parseDays(trimmed), 'accessed');
    case 'largerThan':
      return Conditions.largerThan(trimmed);
    case 'sourceLocation':
      return Conditions.sourceLocation(trimmed);
  }
}

/**
 * Canonical structural key; equal conditions produce equal keys
 */
export function conditionKey(condition: Condition): string {
  switch (condition.type) {
    case 'extensionEquals':
      return `ext:${condition.extension}`;
    case 'nameContains':
    case 'nameStartsWith':
    case 'nameEndsWith':
      return `${condition.type}:${condition.text.normalize('NFC').toLowerCase()}`;
    case 'kindEquals':
      return `kind:${condition.kind}`;
    case 'olderThan':
      return `older:${condition.field}:${condition.days}:${condition.extension ?? ''}`;
    case 'largerThan':
      return `larger:${condition.bytes}`;
    case 'sourceLocation':
      return `location:${condition.location}`;
    case 'not':
      return `not(${conditionKey(condition.condition)})`;
  }
}

export function conditionsEqual(a: Condition, b: Condition): boolean {
  return conditionKey(a) === conditionKey(b);
}

const LOCATION_LABELS: Record<FileLocationKind, string> = {
  desktop: 'Desktop',
  downloads: 'Downloads',
  documents: 'Documents',
  pictures: 'Pictures',
  music: 'Music',
  movies: 'Movies',
  home: 'Home',
  unknown: 'Unknown',
};

/**
 * Lower-case human-readable description, e.g. "extension: .pdf"
 */
export function describeCondition(condition: Condition): string {
  switch (condition.type) {
    case 'extensionEquals':
      return `extension: .${condition.extension}`;
    case 'nameContains':
      return `contains: '${condition.text}'`;
    case 'nameStartsWith':
      return `starts with: '${condition.text}'`;
    case 'nameEndsWith':
      return `ends with: '${condition.text}'`;
    case 'kindEquals':
      return `kind: ${condition.kind}`;
    case 'olderThan': {
      const scope = condition.extension ? `.${condition.extension} ` : '';
      if (condition.field === 'modified') {
        return `${scope}not modified in ${condition.days} days`;
      }
      if (condition.field === 'accessed') {
        return `${scope}not opened in ${condition.days} days`;
      }
      return `${scope}older than ${condition.days} days`;
    }
    case 'largerThan':
      return `larger than ${formatByteSize(condition.bytes)}`;
    case 'sourceLocation':
      return `from ${LOCATION_LABELS[condition.location]}`;
    case 'not':
      return `not (${describeCondition(condition.condition)})`;
  }
}
