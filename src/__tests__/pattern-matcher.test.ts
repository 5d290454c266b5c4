import { describe, it, expect } from 'vitest';
import { compilePattern, matchPattern } from '../filter/pattern-matcher.js';
import { DownloadError } from '../errors/index.js';

describe('pattern-matcher', () => {
  describe('compilePattern', () => {
    it('should keep the source pattern', () => {
      expect(compilePattern('**/*.bin').source).toBe('**/*.bin');
    });

    it('should compile ** segments to a single globstar', () => {
      const compiled = compilePattern('a/**/**/b');
      expect(compiled.segments.map((segment) => segment.kind)).toEqual(['glob', 'globstar', 'glob']);
    });

    it('should treat a trailing slash as everything below', () => {
      const compiled = compilePattern('docs/');
      expect(compiled.segments.map((segment) => segment.kind)).toEqual(['glob', 'globstar']);
    });

    it('should reject an empty pattern', () => {
      expect(() => compilePattern('')).toThrow(DownloadError);
      expect(() => compilePattern('')).toThrow('Pattern must not be empty');
    });
  });

  describe('single-segment wildcards', () => {
    it('should match * within one segment', () => {
      expect(matchPattern('*.bin', 'c.bin')).toBe(true);
      expect(matchPattern('b/*', 'b/c.bin')).toBe(true);
    });

    it('should not let * cross a slash', () => {
      expect(matchPattern('*.bin', 'b/c.bin')).toBe(false);
      expect(matchPattern('b/*', 'b/x/y')).toBe(false);
    });

    it('should match ? as exactly one character', () => {
      expect(matchPattern('a?c', 'abc')).toBe(true);
      expect(matchPattern('a?c', 'ac')).toBe(false);
      expect(matchPattern('a?c', 'a/c')).toBe(false);
    });

    it('should backtrack across several stars', () => {
      expect(matchPattern('a*b*c', 'aXXbYYc')).toBe(true);
      expect(matchPattern('a*b*c', 'abcx')).toBe(false);
    });

    it('should be case-sensitive', () => {
      expect(matchPattern('*.TXT', 'a.txt')).toBe(false);
      expect(matchPattern('*.txt', 'a.txt')).toBe(true);
    });
  });

  describe('globstar', () => {
    it('should match zero or more segments', () => {
      expect(matchPattern('**/*.bin', 'c.bin')).toBe(true);
      expect(matchPattern('**/*.bin', 'b/c.bin')).toBe(true);
      expect(matchPattern('**/*.bin', 'a/b/c/d.bin')).toBe(true);
      expect(matchPattern('**/*.bin', 'a/b/c/d.json')).toBe(false);
    });

    it('should match in the middle of a pattern', () => {
      expect(matchPattern('a/**/b', 'a/b')).toBe(true);
      expect(matchPattern('a/**/b', 'a/x/y/b')).toBe(true);
      expect(matchPattern('a/**/b', 'a/x/y/c')).toBe(false);
    });

    it('should match everything on its own', () => {
      expect(matchPattern('**', 'x')).toBe(true);
      expect(matchPattern('**', 'x/y/z')).toBe(true);
    });

    it('should match everything below a directory given with a trailing slash', () => {
      expect(matchPattern('docs/', 'docs/a/b.md')).toBe(true);
      expect(matchPattern('docs/', 'src/docs.md')).toBe(false);
    });
  });

  describe('character classes', () => {
    it('should match ranges and sets', () => {
      expect(matchPattern('file[0-9].txt', 'file7.txt')).toBe(true);
      expect(matchPattern('file[abc].txt', 'fileb.txt')).toBe(true);
      expect(matchPattern('file[abc].txt', 'filed.txt')).toBe(false);
    });

    it('should support ! and ^ negation', () => {
      expect(matchPattern('file[!0-9].txt', 'file7.txt')).toBe(false);
      expect(matchPattern('file[^0-9].txt', 'fileA.txt')).toBe(true);
    });

    it('should accept ] as the first member', () => {
      expect(matchPattern('[]]x', ']x')).toBe(true);
    });

    it('should treat an unclosed bracket literally', () => {
      expect(matchPattern('[abc', '[abc')).toBe(true);
      expect(matchPattern('[abc', 'a')).toBe(false);
    });
  });

  describe('path prefixes', () => {
    it('should drop a leading ./ or /', () => {
      expect(matchPattern('./a.txt', 'a.txt')).toBe(true);
      expect(matchPattern('/a.txt', 'a.txt')).toBe(true);
    });

    it('should accept a precompiled pattern', () => {
      const compiled = compilePattern('b/*.json');
      expect(matchPattern(compiled, 'b/d.json')).toBe(true);
      expect(matchPattern(compiled, 'b/c.bin')).toBe(false);
    });
  });
});
