/**
 * Association end multiplicities: `*`, `n`, `l..u`, `l..*`.
 *
 * `upper === null` means unbounded.
 */
export type Multiplicity = {
  lower: number;
  upper: number | null;
};

export type MultiplicityParse =
  | { ok: true; value: Multiplicity }
  | { ok: false; reason: 'absent' | 'syntax' };

const NATURAL = /^\d+$/;

function parseBound(text: string): number | undefined {
  const t = text.trim();
  if (!NATURAL.test(t)) return undefined;
  const n = Number(t);
  return Number.isSafeInteger(n) ? n : undefined;
}

export function parseMultiplicity(text: string): MultiplicityParse {
  const t = text.trim();
  if (t === '') return { ok: false, reason: 'absent' };
  if (t === '*') return { ok: true, value: { lower: 0, upper: null } };

  const sep = t.indexOf('..');
  if (sep < 0) {
    const n = parseBound(t);
    return n === undefined ? { ok: false, reason: 'syntax' } : { ok: true, value: { lower: n, upper: n } };
  }

  const lower = parseBound(t.slice(0, sep));
  const upperText = t.slice(sep + 2).trim();
  if (lower === undefined) return { ok: false, reason: 'syntax' };
  if (upperText === '*') return { ok: true, value: { lower, upper: null } };
  const upper = parseBound(upperText);
  if (upper === undefined) return { ok: false, reason: 'syntax' };
  return { ok: true, value: { lower, upper } };
}

/** False when the upper bound is below the lower bound. */
export function isConsistent(m: Multiplicity): boolean {
  return m.upper === null || m.upper >= m.lower;
}

export function isExactlyOne(m: Multiplicity): boolean {
  return m.lower === 1 && m.upper === 1;
}

export function formatMultiplicity(m: Multiplicity): string {
  return `${m.lower}..${m.upper === null ? '*' : m.upper}`;
}
