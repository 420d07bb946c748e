import { readFileSync, readdirSync } from 'node:fs';
import { join, extname } from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ValidationError } from '../shared/errors.js';
import type { Rule } from './types.js';

const conditionSchema = z.object({
  field: z.string().min(1),
  operator: z.enum(['eq', 'neq', 'not_empty', 'in', 'not_in', 'exists', 'gt', 'lt', 'gte', 'lte', 'matches']),
  value: z.unknown().optional(),
});

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);

const ruleSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(''),
  priority: z.number().int(),
  operations: z.array(z.enum(['request.submit', 'request.edit'])).min(1),
  conditions: z.array(conditionSchema),
  action: z.enum(['pass', 'reject']),
  rejection_message: z.string().optional(),
  field: z.string().optional(),
  effective_from: isoDate.optional(),
  effective_to: isoDate.optional(),
});

const ruleFileSchema = z.object({ rules: z.array(ruleSchema) });

function parseRuleFile(filePath: string, raw: unknown): Rule[] {
  const parsed = ruleFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      `Invalid rule file ${filePath}: ${issue.path.join('.')} ${issue.message}`,
      issue.path.join('.'),
    );
  }
  return parsed.data.rules;
}

/**
 * Load rules from a single YAML or JSON file.
 */
export function loadRulesFromFile(filePath: string): Rule[] {
  const content = readFileSync(filePath, 'utf-8');
  const ext = extname(filePath).toLowerCase();

  if (ext === '.yaml' || ext === '.yml') {
    return parseRuleFile(filePath, yaml.load(content));
  }
  if (ext === '.json') {
    return parseRuleFile(filePath, JSON.parse(content));
  }
  throw new ValidationError(
    `Unsupported rule file format: ${ext} (expected .yaml, .yml, or .json)`,
    'rules_file',
  );
}

/**
 * Load and merge rules from all YAML/JSON files in a directory.
 */
export function loadRulesFromDirectory(dirPath: string): Rule[] {
  const files = readdirSync(dirPath).filter((f) => {
    const ext = extname(f).toLowerCase();
    return ext === '.yaml' || ext === '.yml' || ext === '.json';
  });

  return files.sort().flatMap((file) => loadRulesFromFile(join(dirPath, file)));
}
