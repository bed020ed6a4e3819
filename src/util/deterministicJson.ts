/**
 * Deterministic JSON stringify:
 * - Sorts object keys recursively
 * - Preserves array order (problem lists are already in traversal order)
 *
 * This guarantees stable output for tests and version control.
 */
export function stableStringify(value: unknown, space: number = 2): string {
  const normalized = sortKeysDeep(value);
  return JSON.stringify(normalized, null, space) + '\n';
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function sortKeysDeep(v: unknown): unknown {
  if (v === null || v === undefined) return v;
  if (Array.isArray(v)) return v.map(sortKeysDeep);
  if (!isPlainObject(v)) return v;

  const out: Record<string, unknown> = {};
  for (const k of Object.keys(v).sort()) {
    out[k] = sortKeysDeep(v[k]);
  }
  return out;
}
