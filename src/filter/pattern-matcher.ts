/**
 * Glob pattern compiler and matcher.
 *
 * Patterns compile to a list of segments instead of a RegExp. Matching
 * walks pattern segments against path segments, so single-segment
 * wildcards can never consume a `/`.
 *
 * Supports:
 * - `*` matches any run of characters inside one segment
 * - `?` matches one character inside one segment
 * - `**` as a whole segment matches zero or more segments
 * - `[abc]`, `[a-z]`, `[!abc]` / `[^abc]` character classes
 * - Trailing `/` matches everything below the directory
 * - Leading `./` and `/` are dropped (paths are always relative)
 */

import { DownloadError } from '../errors/index.js';
import type { CompiledPattern, GlobToken, PatternSegment } from './types.js';

/**
 * Compile a pattern string.
 *
 * @throws DownloadError INVALID_ARGUMENT for an empty pattern
 */
export function compilePattern(pattern: string): CompiledPattern {
  if (pattern.length === 0) {
    throw new DownloadError('INVALID_ARGUMENT', 'Pattern must not be empty');
  }

  let work = pattern.replace(/\\/g, '/');
  if (work.endsWith('/')) {
    work += '**';
  }
  while (work.startsWith('./')) {
    work = work.slice(2);
  }
  work = work.replace(/^\/+/, '');

  const segments: PatternSegment[] = [];
  for (const part of work.split('/')) {
    if (part === '') {
      continue;
    }
    if (part === '**') {
      // Consecutive globstars behave as one
      if (segments[segments.length - 1]?.kind !== 'globstar') {
        segments.push({ kind: 'globstar' });
      }
      continue;
    }
    segments.push({ kind: 'glob', tokens: tokenizeSegment(part) });
  }

  if (segments.length === 0) {
    throw new DownloadError('INVALID_ARGUMENT', `Pattern matches nothing: ${JSON.stringify(pattern)}`);
  }

  return { source: pattern, segments };
}

/**
 * Split one segment into tokens.
 */
function tokenizeSegment(segment: string): GlobToken[] {
  const chars = Array.from(segment);
  const tokens: GlobToken[] = [];
  let i = 0;

  while (i < chars.length) {
    const char = chars[i] ?? '';

    if (char === '*') {
      // `a**b` inside a segment is the same as `a*b`
      if (tokens[tokens.length - 1]?.type !== 'star') {
        tokens.push({ type: 'star' });
      }
      i += 1;
    } else if (char === '?') {
      tokens.push({ type: 'any' });
      i += 1;
    } else if (char === '[') {
      const parsed = parseClass(chars, i);
      if (parsed === null) {
        // No closing bracket, treat literally
        tokens.push({ type: 'literal', char });
        i += 1;
      } else {
        tokens.push(parsed.token);
        i = parsed.next;
      }
    } else {
      tokens.push({ type: 'literal', char });
      i += 1;
    }
  }

  return tokens;
}

/**
 * Parse a character class starting at `chars[start] === '['`.
 * Returns null when the class is never closed.
 */
function parseClass(
  chars: readonly string[],
  start: number
): { token: GlobToken; next: number } | null {
  let i = start + 1;
  let negated = false;
  if (chars[i] === '!' || chars[i] === '^') {
    negated = true;
    i += 1;
  }

  const ranges: Array<readonly [string, string]> = [];
  let first = true;

  while (i < chars.length) {
    const char = chars[i] ?? '';
    // A `]` right after the opening bracket is a member, not the end
    if (char === ']' && !first) {
      return { token: { type: 'class', negated, ranges }, next: i + 1 };
    }
    first = false;

    const after = chars[i + 2];
    if (chars[i + 1] === '-' && after !== undefined && after !== ']') {
      ranges.push([char, after]);
      i += 3;
    } else {
      ranges.push([char, char]);
      i += 1;
    }
  }

  return null;
}

function tokenMatches(token: GlobToken, char: string): boolean {
  switch (token.type) {
    case 'literal':
      return token.char === char;
    case 'any':
      return true;
    case 'star':
      return false;
    case 'class': {
      const inClass = token.ranges.some(([from, to]) => char >= from && char <= to);
      return token.negated ? !inClass : inClass;
    }
  }
}

/**
 * Match one path segment against the tokens of one pattern segment.
 * Star backtracking keeps this linear in practice.
 */
function matchSegment(tokens: readonly GlobToken[], segment: string): boolean {
  const chars = Array.from(segment);
  let t = 0;
  let s = 0;
  let starToken = -1;
  let starChar = 0;

  while (s < chars.length) {
    const token = tokens[t];
    if (token?.type === 'star') {
      starToken = t;
      starChar = s;
      t += 1;
      continue;
    }
    if (token !== undefined && tokenMatches(token, chars[s] ?? '')) {
      t += 1;
      s += 1;
      continue;
    }
    if (starToken !== -1) {
      t = starToken + 1;
      starChar += 1;
      s = starChar;
      continue;
    }
    return false;
  }

  while (tokens[t]?.type === 'star') {
    t += 1;
  }
  return t === tokens.length;
}

/**
 * Test a relative path against a pattern (string or compiled).
 */
export function matchPattern(pattern: string | CompiledPattern, relativePath: string): boolean {
  const compiled = typeof pattern === 'string' ? compilePattern(pattern) : pattern;
  const parts = relativePath.split('/').filter((part) => part !== '');
  const segments = compiled.segments;

  // Failed (segmentIndex, partIndex) pairs, so globstars stay polynomial
  const failed = new Set<number>();
  const width = parts.length + 1;

  const walk = (p: number, s: number): boolean => {
    if (p === segments.length) {
      return s === parts.length;
    }
    const key = p * width + s;
    if (failed.has(key)) {
      return false;
    }

    const segment = segments[p];
    let matched = false;
    if (segment?.kind === 'globstar') {
      for (let k = s; k <= parts.length && !matched; k++) {
        matched = walk(p + 1, k);
      }
    } else if (segment !== undefined && s < parts.length) {
      matched = matchSegment(segment.tokens, parts[s] ?? '') && walk(p + 1, s + 1);
    }

    if (!matched) {
      failed.add(key);
    }
    return matched;
  };

  return walk(0, 0);
}
