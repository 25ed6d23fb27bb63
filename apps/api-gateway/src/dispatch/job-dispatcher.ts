import type { ExtractionJobPayload, QueueStats } from '@docextract/jobs';

export type DispatchMode = 'local' | 'grpc';

/**
 * JobDispatcher — how the api-gateway hands jobs to workers.
 *
 * The gateway never runs extractions itself. It records the job, then asks
 * a dispatcher to get it executed:
 *   - LocalJobDispatcher: in-process worker pool (JOB_DISPATCH_MODE=local)
 *   - GrpcJobDispatcher:  remote worker over gRPC (JOB_DISPATCH_MODE=grpc)
 */
export abstract class JobDispatcher {
  abstract readonly mode: DispatchMode;

  /** @throws JobDispatchError or QueueFullError; the job stays PENDING either way */
  abstract submit(payload: ExtractionJobPayload): Promise<void>;

  /**
   * Returns false when the job had already finished.
   *
   * @throws JobNotFoundError, JobDispatchError
   */
  abstract cancel(jobId: string): Promise<boolean>;

  /** @throws JobDispatchError */
  abstract stats(): Promise<QueueStats>;
}
