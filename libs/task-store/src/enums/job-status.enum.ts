/**
 * Status of an extraction job.
 *
 * Transitions:
 *   PENDING → STARTED → SUCCESS
 *                     → FAILURE
 *                     → REVOKED
 *   PENDING → REVOKED
 *   PENDING → FAILURE   (worker found the upload unusable before starting)
 *
 * SUCCESS, FAILURE and REVOKED are terminal.
 */
export enum JobStatus {
  /** Job created at upload time, waiting for a worker */
  PENDING = 'PENDING',

  /** A worker has claimed the job and is extracting */
  STARTED = 'STARTED',

  /** Markdown result persisted */
  SUCCESS = 'SUCCESS',

  /** Extraction failed (see error for details) */
  FAILURE = 'FAILURE',

  /** Stopped on request before a result was persisted */
  REVOKED = 'REVOKED',
}
