/**
 * Condition Evaluator
 * Decides whether a single condition holds for a single file.
 * Pure and total: no I/O, no exceptions for any well-formed condition.
 */
import { FILE_KIND_EXTENSIONS, SECONDS_PER_DAY } from '../../../shared/constants';
import {
  containsLiteral,
  endsWithLiteral,
  normalizeExtension,
  startsWithLiteral,
} from '../../../shared/filenameMatching';
import type { Condition, DateField } from '../../../domain/models/Condition';
import type { FileFact } from '../../../domain/models/FileFact';

function timestampFor(file: FileFact, field: DateField): Date {
  switch (field) {
    case 'modified':
      return file.modifiedAt;
    case 'accessed':
      return file.accessedAt;
    case 'created':
      return file.createdAt;
  }
}

export function evaluateCondition(condition: Condition, file: FileFact, now: Date = new Date()): boolean {
  switch (condition.type) {
    case 'extensionEquals':
      return normalizeExtension(file.extension) === condition.extension;

    case 'nameContains':
      return containsLiteral(file.name, condition.text);

    case 'nameStartsWith':
      return startsWithLiteral(file.name, condition.text);

    case 'nameEndsWith':
      return endsWithLiteral(file.name, condition.text);

    case 'kindEquals':
      return FILE_KIND_EXTENSIONS[condition.kind].has(normalizeExtension(file.extension));

    case 'olderThan': {
      if (condition.extension !== undefined && normalizeExtension(file.extension) !== condition.extension) {
        return false;
      }
      const ageMs = now.getTime() - timestampFor(file, condition.field).getTime();
      // Strictly older: a file exactly N days old does not match
      return ageMs > condition.days * SECONDS_PER_DAY * 1000;
    }

    case 'largerThan':
      return file.size > condition.bytes;

    case 'sourceLocation':
      return file.location !== undefined && file.location === condition.location;

    case 'not':
      return !evaluateCondition(condition.condition, file, now);
  }
}
