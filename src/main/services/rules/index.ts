export { evaluateCondition } from './ConditionEvaluator';
export { evaluateTree, formatMatchReason, type TreeMatch } from './ConditionTreeEvaluator';
export { default as RuleEngine, categoryAllows, orderRules, type RuleEngineOptions } from './RuleEngine';
