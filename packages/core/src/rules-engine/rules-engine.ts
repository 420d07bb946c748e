import { evaluateCondition } from './condition-evaluator.js';
import type { Rule, RuleContext, EvaluationResult, EvaluationTrace } from './types.js';

/**
 * A rule is active when effective_from <= date and (effective_to is unset or date < effective_to).
 */
export function isActiveOn(rule: Rule, effectiveDate: string): boolean {
  if (rule.effective_from && effectiveDate < rule.effective_from) return false;
  if (rule.effective_to && effectiveDate >= rule.effective_to) return false;
  return true;
}

/**
 * Evaluates the rules for the context's operation in priority order. The
 * first rejecting rule whose conditions all hold stops evaluation.
 */
export function evaluate(
  rules: Rule[],
  context: RuleContext,
  effectiveDate: string = new Date().toISOString().slice(0, 10),
): EvaluationResult {
  const applicable = rules
    .filter((r) => r.operations.includes(context.operation))
    .sort((a, b) => a.priority - b.priority);

  const traces: EvaluationTrace[] = [];

  for (const rule of applicable) {
    if (!isActiveOn(rule, effectiveDate)) {
      traces.push({ rule_id: rule.id, rule_name: rule.name, result: 'skipped_inactive', evaluation_ms: 0 });
      continue;
    }

    const start = performance.now();
    const allConditionsMet = rule.conditions.every((condition) =>
      evaluateCondition(condition, context.data),
    );
    const evaluationMs = performance.now() - start;

    traces.push({
      rule_id: rule.id,
      rule_name: rule.name,
      result: allConditionsMet ? 'fired' : 'condition_false',
      evaluation_ms: evaluationMs,
    });

    if (allConditionsMet && rule.action === 'reject') {
      return { decision: 'reject', traces, rejected_by: rule };
    }
  }

  return { decision: 'pass', traces };
}
