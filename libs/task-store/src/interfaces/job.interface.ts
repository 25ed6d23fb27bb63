import { JobStatus } from '../enums/job-status.enum';

/** A table detected by the extraction provider, tagged with its page. */
export interface ExtractedTable {
  page: number;
  headers: string[];
  rows: string[][];
}

/** Payload of a SUCCESS job. */
export interface JobResult {
  markdown: string;
  tables: ExtractedTable[];
}

/**
 * Job — one upload-to-result unit of asynchronous work.
 *
 * Stored as plain JSON so every back end (in-memory, Redis) holds the same shape.
 *
 * Invariants:
 * - result is set only when status === SUCCESS
 * - error is set only when status === FAILURE
 * - finishedAt is set only in a terminal status
 * - id, sourceName, mediaType, sizeBytes, submittedAt and storagePath never change
 */
export interface Job {
  id: string;
  status: JobStatus;

  /** Original filename, for display only */
  sourceName: string;

  /** Media type sniffed from the uploaded bytes */
  mediaType: string;
  sizeBytes: number;

  /** ISO 8601 timestamps */
  submittedAt: string;
  startedAt: string | null;
  finishedAt: string | null;

  /** Location of the uploaded bytes inside the upload sandbox */
  storagePath: string;

  /** Set when a stop request reached a job running in another process */
  cancelRequested: boolean;

  result: JobResult | null;
  error: string | null;
}

/** Fields supplied when a job is first recorded. */
export type NewJob = Pick<
  Job,
  'id' | 'sourceName' | 'mediaType' | 'sizeBytes' | 'storagePath'
> & { submittedAt?: string };

/**
 * A status change. The union ties each terminal status to the one field
 * it is allowed to carry.
 */
export type StatusUpdate =
  | { status: JobStatus.STARTED }
  | { status: JobStatus.SUCCESS; result: JobResult }
  | { status: JobStatus.FAILURE; error: string }
  | { status: JobStatus.REVOKED };

export type TerminalUpdate = Exclude<StatusUpdate, { status: JobStatus.STARTED }>;
