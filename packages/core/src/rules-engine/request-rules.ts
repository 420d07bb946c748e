import type { Rule } from './types.js';

export const TITLE_MAX_LENGTH = 255;

/** Built-in request policy; deployments may add rules from RULES_FILE. */
export const REQUEST_POLICY_RULES: Rule[] = [
  {
    id: 'request-items-required',
    name: 'At least one item',
    description: 'Rejects a request without line items',
    priority: 1,
    operations: ['request.submit', 'request.edit'],
    conditions: [{ field: 'item_count', operator: 'eq', value: 0 }],
    action: 'reject',
    rejection_message: 'A purchase request needs at least one item',
    field: 'items',
  },
  {
    id: 'request-title-required',
    name: 'Title is required',
    description: 'Rejects a request whose title is blank',
    priority: 2,
    operations: ['request.submit'],
    conditions: [{ field: 'title_length', operator: 'eq', value: 0 }],
    action: 'reject',
    rejection_message: 'title is required',
    field: 'title',
  },
  {
    id: 'request-title-length',
    name: 'Title length',
    description: `Rejects titles longer than ${TITLE_MAX_LENGTH} characters`,
    priority: 3,
    operations: ['request.submit'],
    conditions: [{ field: 'title_length', operator: 'gt', value: TITLE_MAX_LENGTH }],
    action: 'reject',
    rejection_message: `title must be at most ${TITLE_MAX_LENGTH} characters`,
    field: 'title',
  },
];
