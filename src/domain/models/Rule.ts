/**
 * Rule Domain Model
 * A rule wraps a primary condition tree, optional exclusions and an action.
 * Rules are read-only to the suggestion core; they are never mutated during evaluation.
 */
import { z } from 'zod';
import { RULE_DEFAULTS } from '../../shared/constants';
import { ValidationError } from '../../shared/errors';
import { conditionKey, type Condition } from './Condition';

export type LogicalOperator = 'and' | 'or' | 'single';

export interface ConditionTree {
  readonly operator: LogicalOperator;
  readonly conditions: readonly Condition[];
}

export type RuleAction = { readonly type: 'move'; readonly destination: string } | { readonly type: 'delete' };

/**
 * Where a category's rules apply: everywhere, or only to files inside the listed folders
 */
export type CategoryScope = { readonly type: 'global' } | { readonly type: 'folders'; readonly folders: readonly string[] };

export interface RuleCategory {
  readonly id: string;
  readonly name: string;
  readonly enabled: boolean;
  readonly scope: CategoryScope;
}

export interface Rule {
  readonly id: string;
  readonly name: string;
  readonly tree: ConditionTree;
  /** Any exclusion that holds vetoes the rule */
  readonly exclusions: readonly Condition[];
  readonly action: RuleAction;
  readonly enabled: boolean;
  /** Ascending: lower values are evaluated first */
  readonly sortOrder: number;
  readonly category?: RuleCategory;
}

// Conditions are built through the validating factories, so the schema only checks they are objects
const ConditionSchema = z.custom<Condition>(
  (value) => typeof value === 'object' && value !== null && 'type' in value,
  { message: 'Condition must be built with Conditions.* or parseCondition' },
);

const CategorySchema = z.object({
  id: z.string().min(1, 'Category id is required'),
  name: z.string().min(1, 'Category name is required'),
  enabled: z.boolean().default(true),
  scope: z
    .discriminatedUnion('type', [
      z.object({ type: z.literal('global') }),
      z.object({ type: z.literal('folders'), folders: z.array(z.string().min(1)).min(1) }),
    ])
    .default({ type: 'global' }),
});

export const RuleInputSchema = z.object({
  id: z.string().min(1, 'Rule id is required'),
  name: z.string().trim().min(1, 'Rule name is required'),
  operator: z.enum(['and', 'or', 'single']).default('single'),
  conditions: z.array(ConditionSchema).min(1, 'At least one condition is required'),
  exclusions: z.array(ConditionSchema).default([]),
  action: z.discriminatedUnion('type', [
    z.object({ type: z.literal('move'), destination: z.string().trim().min(1, 'Destination is required') }),
    z.object({ type: z.literal('delete') }),
  ]),
  enabled: z.boolean().default(true),
  sortOrder: z.number().int().default(RULE_DEFAULTS.SORT_ORDER),
  category: CategorySchema.optional(),
});

export type RuleInput = z.input<typeof RuleInputSchema>;

/**
 * Check the operator/arity invariant of a condition tree
 */
export function validateConditionTree(tree: ConditionTree): ConditionTree {
  if (tree.operator === 'single' && tree.conditions.length !== 1) {
    throw new ValidationError('conditions', 'a single-condition rule needs exactly one condition', tree.conditions.length);
  }
  if (tree.conditions.length < 1) {
    throw new ValidationError('conditions', 'at least one condition is required', 0);
  }
  return tree;
}

/**
 * Validate and freeze a rule. Structurally duplicate exclusions are collapsed.
 */
export function createRule(input: RuleInput): Rule {
  const parsed = RuleInputSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join('.') : 'rule';
    throw new ValidationError(field, issue.message);
  }

  const data = parsed.data;
  const tree = validateConditionTree({ operator: data.operator, conditions: data.conditions });

  const seen = new Set<string>();
  const exclusions = data.exclusions.filter((condition) => {
    const key = conditionKey(condition);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });

  return Object.freeze({
    id: data.id,
    name: data.name,
    tree,
    exclusions,
    action: data.action,
    enabled: data.enabled,
    sortOrder: data.sortOrder,
    category: data.category,
  });
}
