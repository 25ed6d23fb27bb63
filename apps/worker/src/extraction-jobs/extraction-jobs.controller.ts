import { Controller, Logger } from '@nestjs/common';
import { GrpcMethod } from '@nestjs/microservices';
import { isUUID } from 'class-validator';
import { JobQueueService, QueueFullError } from '@docextract/jobs';
import {
  CancelJobRequest,
  CancelJobResponse,
  EXTRACTION_JOB_SERVICE_NAME,
  GrpcInternalException,
  GrpcInvalidArgumentException,
  GrpcNotFoundException,
  GrpcResourceExhaustedException,
  GrpcUnavailableException,
  QueueStatsMessage,
  SubmitJobRequest,
  SubmitJobResponse,
} from '@docextract/proto';
import {
  JobNotFoundError,
  TaskStoreUnavailableError,
} from '@docextract/task-store';

/**
 * gRPC controller for ExtractionJobService.
 *
 * Maps proto RPC methods onto the local worker pool:
 * - SubmitJob      → JobQueueService.submit()
 * - CancelJob      → JobQueueService.cancel()
 * - GetQueueStats  → JobQueueService.stats()
 *
 * Domain errors become gRPC status codes from @docextract/proto so the
 * api-gateway can map them back.
 */
@Controller()
export class ExtractionJobsController {
  private readonly logger = new Logger(ExtractionJobsController.name);

  constructor(private readonly jobQueue: JobQueueService) {}

  @GrpcMethod(EXTRACTION_JOB_SERVICE_NAME, 'SubmitJob')
  submitJob(request: SubmitJobRequest): SubmitJobResponse {
    this.assertJobId(request.jobId);
    if (!request.storagePath || !request.mediaType) {
      throw new GrpcInvalidArgumentException(
        'storage_path and media_type are required',
      );
    }

    try {
      this.jobQueue.submit({
        jobId: request.jobId,
        storagePath: request.storagePath,
        mediaType: request.mediaType,
      });
    } catch (error) {
      if (error instanceof QueueFullError) {
        this.logger.warn(`Rejected job ${request.jobId}: ${error.message}`);
        throw new GrpcResourceExhaustedException(error.message);
      }
      throw error;
    }

    return {
      jobId: request.jobId,
      accepted: true,
      queueDepth: this.jobQueue.stats().queued,
    };
  }

  @GrpcMethod(EXTRACTION_JOB_SERVICE_NAME, 'CancelJob')
  async cancelJob(request: CancelJobRequest): Promise<CancelJobResponse> {
    this.assertJobId(request.jobId);

    try {
      const cancelled = await this.jobQueue.cancel(request.jobId);
      return { jobId: request.jobId, cancelled };
    } catch (error) {
      if (error instanceof JobNotFoundError) {
        throw new GrpcNotFoundException(error.message);
      }
      if (error instanceof TaskStoreUnavailableError) {
        throw new GrpcUnavailableException(error.message);
      }
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`CancelJob failed for ${request.jobId}: ${message}`);
      throw new GrpcInternalException('Failed to cancel job');
    }
  }

  @GrpcMethod(EXTRACTION_JOB_SERVICE_NAME, 'GetQueueStats')
  getQueueStats(): QueueStatsMessage {
    return this.jobQueue.stats();
  }

  private assertJobId(jobId: string): void {
    if (!isUUID(jobId, 4)) {
      throw new GrpcInvalidArgumentException('job_id must be a UUID v4');
    }
  }
}
