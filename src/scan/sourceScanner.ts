import fg from 'fast-glob';
import path from 'node:path';
import { toPosixPath } from '../util/paths';

export type SourceScanOptions = {
  sourceRoot: string;
  /** Include globs relative to sourceRoot; default `**\/*.odx`. */
  includeGlobs?: string[];
  /** Additional exclude globs (evaluated relative to sourceRoot). */
  excludeGlobs?: string[];
  /** Optional safety cap; if set, results are truncated deterministically after sorting. */
  maxFiles?: number;
};

export const DEFAULT_INCLUDES = ['**/*.odx'];

const DEFAULT_EXCLUDES = ['**/node_modules/**', '**/bin/**', '**/obj/**', '**/.git/**'];

/**
 * Deterministically discovers orchestration files under a folder.
 * Returns a stable, sorted list of relative paths (posix-style) from sourceRoot.
 */
export async function scanOrchestrationFiles(opts: SourceScanOptions): Promise<string[]> {
  const sourceRoot = path.resolve(opts.sourceRoot);
  const include = opts.includeGlobs && opts.includeGlobs.length > 0 ? opts.includeGlobs : DEFAULT_INCLUDES;

  const matches = await fg(include, {
    cwd: sourceRoot,
    onlyFiles: true,
    unique: true,
    dot: true,
    caseSensitiveMatch: false,
    followSymbolicLinks: false,
    ignore: [...DEFAULT_EXCLUDES, ...(opts.excludeGlobs ?? [])],
  });

  const rel = matches.map(toPosixPath);
  rel.sort((a, b) => a.localeCompare(b));
  if (opts.maxFiles && opts.maxFiles > 0 && rel.length > opts.maxFiles) {
    return rel.slice(0, opts.maxFiles);
  }
  return rel;
}
