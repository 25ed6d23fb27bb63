/**
 * TypeScript interfaces mirroring extraction.proto.
 *
 * Hand-written to match the proto contract without a code-generation step.
 * @grpc/proto-loader parses the proto at runtime and converts field names
 * to camelCase; these types give both sides compile-time safety.
 */
import { Observable } from 'rxjs';

// ── Request / Response Interfaces ───────────────────────

export interface SubmitJobRequest {
  jobId: string;
  storagePath: string;
  mediaType: string;
}

export interface SubmitJobResponse {
  jobId: string;
  accepted: boolean;
  queueDepth: number;
}

export interface CancelJobRequest {
  jobId: string;
}

export interface CancelJobResponse {
  jobId: string;
  cancelled: boolean;
}

export type QueueStatsRequest = Record<string, never>;

export interface QueueStatsMessage {
  queued: number;
  running: number;
  concurrency: number;
  maxDepth: number;
}

// ── Service Client Interface ────────────────────────────
// Client stubs return Observables; the server side may return plain values.

export interface ExtractionJobServiceClient {
  submitJob(request: SubmitJobRequest): Observable<SubmitJobResponse>;
  cancelJob(request: CancelJobRequest): Observable<CancelJobResponse>;
  getQueueStats(request: QueueStatsRequest): Observable<QueueStatsMessage>;
}
