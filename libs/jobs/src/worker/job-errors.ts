/**
 * Signals used inside a worker attempt. Neither ever escapes
 * ExtractionWorkerService.process(); both are mapped to a terminal status.
 */

/** The job was stopped by a client (or shutdown) while in flight. */
export class JobCancelledError extends Error {
  constructor(readonly jobId?: string) {
    super(jobId ? `Job ${jobId} was cancelled` : 'Job was cancelled');
    this.name = 'JobCancelledError';
  }
}

/** The extraction did not finish within EXTRACTION_TIMEOUT_MS. */
export class ExtractionTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Extraction timed out after ${timeoutMs / 1000} seconds`);
    this.name = 'ExtractionTimeoutError';
  }
}
