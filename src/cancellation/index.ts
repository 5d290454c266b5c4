export {
  CancellationGate,
  CancellationSource,
  NEVER_CANCELLED,
  fromAbortSignal,
} from './cancellation.js';
export type { CancellationToken } from './cancellation.js';
