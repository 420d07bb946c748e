export { evaluate, isActiveOn } from './rules-engine.js';
export { evaluateCondition } from './condition-evaluator.js';
export { loadRulesFromFile, loadRulesFromDirectory } from './rule-loader.js';
export { REQUEST_POLICY_RULES, TITLE_MAX_LENGTH } from './request-rules.js';
export type {
  Rule,
  Condition,
  ConditionOperator,
  RuleOperation,
  RuleAction,
  RuleContext,
  EvaluationResult,
  EvaluationTrace,
} from './types.js';
