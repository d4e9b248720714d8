/**
 * Deterministic JSON stringify:
 * - Sorts object keys recursively
 * - Preserves array order (callers decide the order of lists)
 *
 * Output is stable across runs, so reports and models diff cleanly.
 */
export function stableStringify(value: unknown, space: number = 2): string {
  const normalized = sortKeysDeep(value);
  return JSON.stringify(normalized, null, space) + '\n';
}

function sortKeysDeep(v: unknown): unknown {
  if (Array.isArray(v)) return v.map(sortKeysDeep);
  if (v === null || typeof v !== 'object') return v;

  const entries = Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  // fromEntries defines own keys, so a `__proto__` key survives.
  return Object.fromEntries(entries.map(([k, val]): [string, unknown] => [k, sortKeysDeep(val)]));
}
