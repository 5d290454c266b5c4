import { describe, it, expect } from 'vitest';
import { FileFilter, filterFiles } from '../filter/file-filter.js';
import { DownloadError } from '../errors/index.js';

const files = [
  { path: 'a.txt', size: 1 },
  { path: 'b/c.bin', size: 2 },
  { path: 'b/d.json', size: 3 },
];

function paths(entries: ReadonlyArray<{ path: string }>): string[] {
  return entries.map((entry) => entry.path);
}

describe('file-filter', () => {
  describe('filterFiles', () => {
    it('should keep everything when no patterns are given', () => {
      expect(paths(filterFiles(files))).toEqual(['a.txt', 'b/c.bin', 'b/d.json']);
      expect(paths(filterFiles(files, { allowPatterns: [] }))).toEqual(['a.txt', 'b/c.bin', 'b/d.json']);
    });

    it('should keep only allowed files', () => {
      expect(paths(filterFiles(files, { allowPatterns: ['**/*.bin'] }))).toEqual(['b/c.bin']);
    });

    it('should let ignore win over allow', () => {
      const result = filterFiles(files, { allowPatterns: ['**/*.bin'], ignorePatterns: ['b/*'] });
      expect(result).toEqual([]);
    });

    it('should not let a single-segment ignore reach into directories', () => {
      expect(paths(filterFiles(files, { ignorePatterns: ['*.json'] }))).toEqual([
        'a.txt',
        'b/c.bin',
        'b/d.json',
      ]);
      expect(paths(filterFiles(files, { ignorePatterns: ['**/*.json'] }))).toEqual(['a.txt', 'b/c.bin']);
    });

    it('should keep listing order across several allow patterns', () => {
      const result = filterFiles(files, { allowPatterns: ['b/**', '*.txt'] });
      expect(paths(result)).toEqual(['a.txt', 'b/c.bin', 'b/d.json']);
    });

    it('should return the same entry objects', () => {
      const [first] = filterFiles(files, { allowPatterns: ['a.txt'] });
      expect(first).toBe(files[0]);
    });

    it('should reject an empty pattern', () => {
      expect(() => filterFiles(files, { ignorePatterns: [''] })).toThrow(DownloadError);
    });
  });

  describe('FileFilter.check', () => {
    const filter = new FileFilter({ allowPatterns: ['*.txt'], ignorePatterns: ['secret*'] });

    it('should report the ignore pattern that excluded a path', () => {
      expect(filter.check('secret.txt')).toEqual({
        included: false,
        reason: 'ignored',
        matchedPattern: 'secret*',
      });
    });

    it('should report the allow pattern that included a path', () => {
      expect(filter.check('a.txt')).toEqual({
        included: true,
        reason: 'allowed',
        matchedPattern: '*.txt',
      });
    });

    it('should report paths matching no allow pattern', () => {
      expect(filter.check('b/c.bin')).toEqual({ included: false, reason: 'not-allowed' });
    });

    it('should allow everything without allow patterns', () => {
      const open = new FileFilter();
      expect(open.isEmpty).toBe(true);
      expect(open.check('anything/at/all')).toEqual({ included: true, reason: 'allowed' });
    });
  });
});
