/**
 * Condition Tree Evaluator
 * Combines conditions with AND / OR / SINGLE, applies exclusions and builds the match reason.
 */
import { describeCondition, type Condition } from '../../../domain/models/Condition';
import type { ConditionTree } from '../../../domain/models/Rule';
import type { FileFact } from '../../../domain/models/FileFact';
import { evaluateCondition } from './ConditionEvaluator';

export interface TreeMatch {
  matched: boolean;
  reason: string | null;
}

const NO_MATCH: Readonly<TreeMatch> = Object.freeze({ matched: false, reason: null });

function capitalize(text: string): string {
  return text.charAt(0).toUpperCase() + text.slice(1);
}

export function formatMatchReason(conditions: readonly Condition[], joiner: 'AND' | 'OR'): string {
  return conditions.map((condition) => capitalize(describeCondition(condition))).join(` ${joiner} `);
}

/**
 * Primary conditions that held, or null when the tree as a whole did not match
 */
function matchPrimary(tree: ConditionTree, file: FileFact, now: Date): Condition[] | null {
  switch (tree.operator) {
    case 'single': {
      const [only] = tree.conditions;
      if (tree.conditions.length !== 1 || !only) return null;
      return evaluateCondition(only, file, now) ? [only] : null;
    }
    case 'and':
      if (tree.conditions.length === 0) return null;
      return tree.conditions.every((c) => evaluateCondition(c, file, now)) ? [...tree.conditions] : null;
    case 'or': {
      const held = tree.conditions.filter((c) => evaluateCondition(c, file, now));
      return held.length > 0 ? held : null;
    }
  }
}

export function evaluateTree(
  tree: ConditionTree,
  exclusions: readonly Condition[],
  file: FileFact,
  now: Date = new Date(),
): TreeMatch {
  const held = matchPrimary(tree, file, now);
  if (!held) return { ...NO_MATCH };

  // Exclusions are OR'd: any one that holds vetoes the whole rule
  if (exclusions.some((exclusion) => evaluateCondition(exclusion, file, now))) {
    return { ...NO_MATCH };
  }

  return {
    matched: true,
    reason: formatMatchReason(held, tree.operator === 'or' ? 'OR' : 'AND'),
  };
}
