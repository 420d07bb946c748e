export const DEFAULT_PO_PREFIX = 'PO';

/** `{prefix}-{YYYYMMDD}-{sequence:6}`, date in UTC. */
export function formatPoNumber(prefix: string, issuedAt: Date, sequence: number): string {
  const date = issuedAt.toISOString().slice(0, 10).replaceAll('-', '');
  return `${prefix}-${date}-${String(sequence).padStart(6, '0')}`;
}
