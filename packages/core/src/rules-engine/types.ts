export type ConditionOperator =
  | 'eq'
  | 'neq'
  | 'not_empty'
  | 'in'
  | 'not_in'
  | 'exists'
  | 'gt'
  | 'lt'
  | 'gte'
  | 'lte'
  | 'matches';

export type RuleOperation = 'request.submit' | 'request.edit';

export type RuleAction = 'pass' | 'reject';

export interface Condition {
  field: string;
  operator: ConditionOperator;
  value?: unknown;
}

export interface Rule {
  id: string;
  name: string;
  description: string;
  priority: number;
  operations: RuleOperation[];
  conditions: Condition[];
  action: RuleAction;
  rejection_message?: string;
  /** Input field reported on the ValidationError when the rule rejects. */
  field?: string;
  effective_from?: string; // YYYY-MM-DD
  effective_to?: string; // YYYY-MM-DD
}

export interface RuleContext {
  operation: RuleOperation;
  data: Record<string, unknown>;
}

export interface EvaluationTrace {
  rule_id: string;
  rule_name: string;
  result: 'fired' | 'condition_false' | 'skipped_inactive';
  evaluation_ms: number;
}

export interface EvaluationResult {
  decision: 'pass' | 'reject';
  traces: EvaluationTrace[];
  rejected_by?: Rule;
}
