/**
 * Rule Engine
 * Evaluates user-defined rules against files in priority order; the first match wins.
 */
import { RULE_DEFAULTS, TRASH_DESTINATION } from '../../../shared/constants';
import { logger as baseLogger } from '../../../shared/logger';
import type { FileFact } from '../../../domain/models/FileFact';
import type { Rule, RuleCategory } from '../../../domain/models/Rule';
import { pendingResult, readyResult, type SuggestionResult } from '../../../domain/models/Suggestion';
import { evaluateTree } from './ConditionTreeEvaluator';

const logger = baseLogger.child('RuleEngine');

export interface RuleEngineOptions {
  /** Clock used for date conditions */
  now?: () => Date;
}

function stripTrailingSeparators(folder: string): string {
  return folder.replace(/[\\/]+$/, '');
}

function isInsideFolder(filePath: string, folder: string): boolean {
  const base = stripTrailingSeparators(folder);
  if (!base) return false;
  return filePath.startsWith(`${base}/`) || filePath.startsWith(`${base}\\`);
}

/**
 * Whether a rule's category lets it run for this file
 */
export function categoryAllows(category: RuleCategory | undefined, file: FileFact): boolean {
  if (!category) return true;
  if (!category.enabled) return false;
  if (category.scope.type === 'global') return true;
  return category.scope.folders.some((folder) => isInsideFolder(file.path, folder));
}

/**
 * Enabled rules in ascending sortOrder. Array.prototype.sort is stable, so equal
 * sortOrder keeps the caller's order.
 */
export function orderRules(rules: readonly Rule[]): Rule[] {
  return rules.filter((rule) => rule.enabled).sort((a, b) => a.sortOrder - b.sortOrder);
}

class RuleEngine {
  private now: () => Date;

  constructor(options: RuleEngineOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  evaluateFile(file: FileFact, rules: readonly Rule[]): SuggestionResult {
    return this.evaluateOrdered(file, orderRules(rules), this.now());
  }

  /**
   * Evaluate many files against the same rule set; results keep the input order
   */
  evaluateFiles(files: readonly FileFact[], rules: readonly Rule[]): SuggestionResult[] {
    const ordered = orderRules(rules);
    const now = this.now();
    const startTime = Date.now();

    const results = files.map((file) => this.evaluateOrdered(file, ordered, now));

    logger.performance('evaluateFiles', Date.now() - startTime, {
      files: files.length,
      rules: ordered.length,
      matched: results.filter((result) => result.provenance === 'rule').length,
    });
    return results;
  }

  /**
   * Rule preview: does this one rule match the file, ignoring every other rule?
   */
  fileMatchesRule(file: FileFact, rule: Rule): boolean {
    if (!rule.enabled || !categoryAllows(rule.category, file)) return false;
    return evaluateTree(rule.tree, rule.exclusions, file, this.now()).matched;
  }

  private evaluateOrdered(file: FileFact, ordered: readonly Rule[], now: Date): SuggestionResult {
    for (const rule of ordered) {
      if (!categoryAllows(rule.category, file)) continue;

      const match = evaluateTree(rule.tree, rule.exclusions, file, now);
      if (!match.matched) continue;

      logger.debug('Rule matched', { file: file.name, ruleId: rule.id, reason: match.reason });
      return readyResult(file, {
        destination: rule.action.type === 'move' ? rule.action.destination : TRASH_DESTINATION,
        confidence: RULE_DEFAULTS.CONFIDENCE,
        matchReason: match.reason,
        provenance: 'rule',
        matchedRuleId: rule.id,
      });
    }

    return pendingResult(file);
  }
}

export default RuleEngine;
