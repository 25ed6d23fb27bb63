/**
 * @docextract/jobs
 *
 * Everything that turns a stored upload into a terminal job: the worker
 * pool, the extraction worker, the AI provider, Markdown rendering, the
 * upload policy and sandbox, and recovery of orphaned jobs.
 */

// ── Module ──────────────────────────────────────────────────
export { JobsModule } from './jobs.module';

// ── Queue ───────────────────────────────────────────────────
export {
  JobQueueService,
  QueueFullError,
  DEFAULT_MAX_QUEUE_DEPTH,
  DEFAULT_WORKER_CONCURRENCY,
} from './queue/job-queue.service';
export type { ExtractionJobPayload, QueueStats } from './queue/job-payload';
export { JobRecoveryService } from './recovery/job-recovery.service';
export type { RecoveryReport } from './recovery/job-recovery.service';

// ── Worker & extraction ─────────────────────────────────────
export { ExtractionWorkerService } from './worker/extraction-worker.service';
export { ExtractionTimeoutError, JobCancelledError } from './worker/job-errors';
export { ExtractionFailure, ExtractionProvider } from './extraction/extraction-provider';
export type {
  ExtractedPage,
  ExtractedPageTable,
  ExtractionFailureReason,
  ExtractionInput,
  ExtractionOutput,
} from './extraction/extraction-provider';
export { OpenAiExtractionProvider } from './extraction/openai-extraction.provider';
export { parseModelResponse } from './extraction/response-parser';
export { renderMarkdown } from './markdown/render-markdown';

// ── Uploads ─────────────────────────────────────────────────
export {
  ALLOWED_MEDIA_TYPES,
  DEFAULT_MAX_UPLOAD_BYTES,
  UploadRejectedError,
  assertAcceptableUpload,
} from './policy/upload-policy';
export type { UploadRejectionReason } from './policy/upload-policy';
export { UploadStorageModule } from './storage/upload-storage.module';
export { UploadStorageService } from './storage/upload-storage.service';
export { UploadStorageError } from './storage/upload-storage.errors';
