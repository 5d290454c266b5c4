export { compilePattern, matchPattern } from './pattern-matcher.js';
export { FileFilter, checkPath, filterFiles } from './file-filter.js';
export type {
  CompiledPattern,
  FilterCheckResult,
  FilterOptions,
  FilterReason,
  GlobToken,
  PatternSegment,
} from './types.js';
