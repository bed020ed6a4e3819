import fg from 'fast-glob';
import path from 'node:path';

/** Normalize to posix-style path separators. */
export function toPosixPath(p: string): string {
  return p.replace(/\\/g, '/');
}

export type ModelScanOptions = {
  sourceRoot: string;
  /** Additional exclude globs (evaluated relative to sourceRoot). */
  excludeGlobs?: string[];
  /** Include globs; defaults to OntoUML model documents. */
  includeGlobs?: string[];
  /** Optional safety cap; if set, results are truncated deterministically after sorting. */
  maxFiles?: number;
};

export const DEFAULT_MODEL_GLOBS = ['**/*.ontouml.json'];

const DEFAULT_EXCLUDES = [
  '**/node_modules/**',
  '**/dist/**',
  '**/build/**',
  '**/coverage/**',
  '**/.git/**',
  '**/.cache/**',
];

/**
 * Deterministically discovers model documents under a directory.
 * Returns a stable, sorted list of relative paths (posix-style) from sourceRoot.
 */
export async function scanModelFiles(opts: ModelScanOptions): Promise<string[]> {
  const sourceRoot = path.resolve(opts.sourceRoot);
  const exclude = [...DEFAULT_EXCLUDES, ...(opts.excludeGlobs ?? [])];
  const include = opts.includeGlobs && opts.includeGlobs.length > 0 ? opts.includeGlobs : DEFAULT_MODEL_GLOBS;

  const matches = await fg(include, {
    cwd: sourceRoot,
    onlyFiles: true,
    unique: true,
    dot: true,
    followSymbolicLinks: false,
    ignore: exclude,
  });

  // fast-glob usually returns posix paths even on Windows, but normalize anyway
  const rel = matches.map((p) => toPosixPath(p));

  rel.sort((a, b) => a.localeCompare(b));
  if (opts.maxFiles && opts.maxFiles > 0 && rel.length > opts.maxFiles) {
    return rel.slice(0, opts.maxFiles);
  }
  return rel;
}
