/**
 * Types for allow/ignore filtering of repository listings.
 *
 * Patterns are matched against the full relative path, segment by segment:
 * `*` and `?` never cross a `/`, `**` spans zero or more whole segments.
 */

/** One token inside a pattern segment */
export type GlobToken =
  | { type: 'literal'; char: string }
  | { type: 'any' }
  | { type: 'star' }
  | { type: 'class'; negated: boolean; ranges: ReadonlyArray<readonly [string, string]> };

/** One `/`-separated piece of a compiled pattern */
export type PatternSegment =
  | { kind: 'globstar' }
  | { kind: 'glob'; tokens: readonly GlobToken[] };

/** A pattern compiled into segments, ready for matching */
export interface CompiledPattern {
  /** Pattern as the caller wrote it */
  source: string;

  /** Compiled segments */
  segments: readonly PatternSegment[];
}

/** Allow/ignore pattern sets for a snapshot */
export interface FilterOptions {
  /** When absent or empty, every path is allowed */
  allowPatterns?: readonly string[];

  /** Paths matching any of these are excluded, even when allowed */
  ignorePatterns?: readonly string[];
}

/** Why a path was included or excluded */
export type FilterReason = 'allowed' | 'not-allowed' | 'ignored';

/** Result of checking one path */
export interface FilterCheckResult {
  /** Whether the path survives the filter */
  included: boolean;

  reason: FilterReason;

  /** The allow or ignore pattern that decided the outcome, if any */
  matchedPattern?: string;
}
