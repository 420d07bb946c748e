import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadRulesFromFile, loadRulesFromDirectory } from './rule-loader.js';
import { ValidationError } from '../shared/errors.js';

const SHIPPED_RULES = fileURLToPath(new URL('../../../../rules/request-policy.yaml', import.meta.url));

describe('rule loader', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'rules-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load the shipped request policy file', () => {
    const rules = loadRulesFromFile(SHIPPED_RULES);

    expect(rules.map((r) => r.id)).toEqual(['request-quantity-cap', 'request-total-cap']);
    expect(rules[0].operations).toEqual(['request.submit', 'request.edit']);
    expect(rules[0].conditions).toEqual([{ field: 'max_quantity', operator: 'gt', value: 10000 }]);
    expect(rules[0].field).toBe('items');
  });

  it('should default a missing description to an empty string', () => {
    const file = join(dir, 'minimal.json');
    writeFileSync(
      file,
      JSON.stringify({
        rules: [{ id: 'r1', name: 'R1', priority: 1, operations: ['request.edit'], conditions: [], action: 'pass' }],
      }),
    );

    expect(loadRulesFromFile(file)[0].description).toBe('');
  });

  it('should reject an unknown operation', () => {
    const file = join(dir, 'bad.yaml');
    writeFileSync(
      file,
      [
        'rules:',
        '  - id: r1',
        '    name: R1',
        '    priority: 1',
        '    operations: [request.delete]',
        '    conditions: []',
        '    action: reject',
      ].join('\n'),
    );

    expect(() => loadRulesFromFile(file)).toThrow(ValidationError);
  });

  it('should refuse unsupported extensions', () => {
    const file = join(dir, 'rules.txt');
    writeFileSync(file, 'rules: []');

    expect(() => loadRulesFromFile(file)).toThrow('Unsupported rule file format: .txt');
  });

  it('should merge rule files from a directory in name order', () => {
    const sub = mkdtempSync(join(dir, 'merge-'));
    const entry = (id: string) =>
      JSON.stringify({ rules: [{ id, name: id, priority: 1, operations: ['request.submit'], conditions: [], action: 'pass' }] });
    writeFileSync(join(sub, 'b.json'), entry('from-b'));
    writeFileSync(join(sub, 'a.json'), entry('from-a'));
    writeFileSync(join(sub, 'notes.md'), '# ignored');

    expect(loadRulesFromDirectory(sub).map((r) => r.id)).toEqual(['from-a', 'from-b']);
  });
});
