/**
 * Allow/ignore filtering of a repository listing.
 *
 * A path is included when the allow set is empty or one allow pattern
 * matches, and no ignore pattern matches. Ignore always wins.
 */

import { compilePattern, matchPattern } from './pattern-matcher.js';
import type { CompiledPattern, FilterCheckResult, FilterOptions } from './types.js';

/**
 * Decide whether a path survives compiled allow/ignore sets.
 */
export function checkPath(
  relativePath: string,
  allow: readonly CompiledPattern[],
  ignore: readonly CompiledPattern[]
): FilterCheckResult {
  const ignoredBy = ignore.find((pattern) => matchPattern(pattern, relativePath));
  if (ignoredBy) {
    return { included: false, reason: 'ignored', matchedPattern: ignoredBy.source };
  }

  if (allow.length === 0) {
    return { included: true, reason: 'allowed' };
  }

  const allowedBy = allow.find((pattern) => matchPattern(pattern, relativePath));
  if (allowedBy) {
    return { included: true, reason: 'allowed', matchedPattern: allowedBy.source };
  }
  return { included: false, reason: 'not-allowed' };
}

/**
 * Compiled allow/ignore sets applied to many paths.
 */
export class FileFilter {
  private readonly allow: readonly CompiledPattern[];
  private readonly ignore: readonly CompiledPattern[];

  constructor(options: FilterOptions = {}) {
    this.allow = (options.allowPatterns ?? []).map(compilePattern);
    this.ignore = (options.ignorePatterns ?? []).map(compilePattern);
  }

  /** Whether any pattern is configured */
  get isEmpty(): boolean {
    return this.allow.length === 0 && this.ignore.length === 0;
  }

  check(relativePath: string): FilterCheckResult {
    return checkPath(relativePath, this.allow, this.ignore);
  }

  includes(relativePath: string): boolean {
    return this.check(relativePath).included;
  }

  /**
   * Keep the entries whose path is included, in their original order.
   */
  apply<T extends { readonly path: string }>(files: readonly T[]): T[] {
    return files.filter((file) => this.includes(file.path));
  }
}

/**
 * One-shot form of FileFilter.apply.
 *
 * @throws DownloadError INVALID_ARGUMENT for an empty pattern
 */
export function filterFiles<T extends { readonly path: string }>(
  files: readonly T[],
  options: FilterOptions = {}
): T[] {
  return new FileFilter(options).apply(files);
}
