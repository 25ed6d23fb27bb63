/**
 * @docextract/task-store
 *
 * Job model, status state machine and the TaskStore abstraction shared by
 * the api-gateway and the worker.
 */

// ── Model ───────────────────────────────────────────────────
export { JobStatus } from './enums/job-status.enum';
export type {
  Job,
  JobResult,
  ExtractedTable,
  NewJob,
  StatusUpdate,
  TerminalUpdate,
} from './interfaces/job.interface';
export {
  applyStatusUpdate,
  canTransition,
  compareBySubmission,
  createPendingJob,
  isTerminal,
} from './job-state';

// ── Store ───────────────────────────────────────────────────
export { TaskStore } from './task-store';
export { MemoryTaskStore } from './backends/memory-task-store';
export { RedisTaskStore } from './backends/redis-task-store';
export {
  ConflictError,
  InvalidTransitionError,
  JobNotFoundError,
  TaskStoreUnavailableError,
} from './task-store.errors';
export { TASK_INDEX_KEY, TASK_KEY_PREFIX } from './task-store.constants';
export type { TaskStoreBackend } from './task-store.constants';

// ── Module ──────────────────────────────────────────────────
export { TaskStoreModule } from './task-store.module';
export { TaskStoreHealthIndicator } from './health/task-store.health';
