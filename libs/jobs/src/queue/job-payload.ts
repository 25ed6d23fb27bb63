/**
 * What travels through the queue (and over gRPC): a reference to the
 * uploaded bytes, never the bytes themselves.
 */
export interface ExtractionJobPayload {
  jobId: string;
  storagePath: string;
  mediaType: string;
}

export interface QueueStats {
  /** Payloads waiting for a worker slot */
  queued: number;
  /** Payloads currently being processed */
  running: number;
  concurrency: number;
  maxDepth: number;
}
