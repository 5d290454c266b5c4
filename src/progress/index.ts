export { ProgressAggregator } from './progress-aggregator.js';
export type { ProgressAggregatorOptions } from './progress-aggregator.js';
export type {
  CurrentFileProgress,
  ProgressFile,
  ProgressHandler,
  ProgressPhase,
  ProgressSinkResolver,
  ProgressSubscription,
  ProgressUpdate,
} from './types.js';
