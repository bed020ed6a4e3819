import type { ReportFormat } from '../report/writeReport';

/**
 * Boolean option value: a bare flag (`--errors`) is true; `1/true/yes/y/on`
 * and `0/false/no/n/off` are accepted case-insensitively; anything else keeps
 * the default.
 */
export function parseBoolish(v: unknown, defaultValue: boolean): boolean {
  if (v === undefined || v === null) return defaultValue;
  if (typeof v === 'boolean') return v;
  const s = String(v).trim().toLowerCase();
  if (s === '') return true; // presence of option with no value
  if (['1', 'true', 'yes', 'y', 'on'].includes(s)) return true;
  if (['0', 'false', 'no', 'n', 'off'].includes(s)) return false;
  return defaultValue;
}

export function parseIntish(v: unknown): number | undefined {
  if (v === undefined || v === null || v === '') return undefined;
  const n = Number(v);
  if (!Number.isFinite(n)) return undefined;
  return Math.trunc(n);
}

export function parseReportFormat(v: unknown): ReportFormat {
  return String(v ?? '').trim().toLowerCase() === 'json' ? 'json' : 'md';
}

/** Empty or whitespace-only option values count as absent. */
export function optionalPath(v: unknown): string | undefined {
  if (v === undefined || v === null) return undefined;
  const s = String(v).trim();
  return s === '' ? undefined : s;
}
