export { DownloadScheduler } from './download-scheduler.js';
export type { DownloadSchedulerOptions, ScheduleRequest, ScheduleResult } from './download-scheduler.js';
export { Finalizer } from './finalizer.js';
export type { MaterializeSource } from './finalizer.js';
export { SnapshotStateManager, STATE_DIR_NAME, STATE_FILE_NAME } from './snapshot-state.js';
export type {
  FileOutcome,
  FileSource,
  FileTaskState,
  SchedulerStats,
  SnapshotState,
  SnapshotStateEntry,
} from './types.js';
