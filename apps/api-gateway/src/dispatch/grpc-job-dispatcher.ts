import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ClientGrpc } from '@nestjs/microservices';
import { status as GrpcStatus } from '@grpc/grpc-js';
import { Observable, lastValueFrom, timeout } from 'rxjs';
import type { ExtractionJobPayload, QueueStats } from '@docextract/jobs';
import {
  EXTRACTION_JOB_SERVICE_NAME,
  ExtractionJobServiceClient,
  WORKER_GRPC_CLIENT,
} from '@docextract/proto';
import { JobNotFoundError } from '@docextract/task-store';
import { DispatchMode, JobDispatcher } from './job-dispatcher';
import { JobDispatchError } from './job-dispatch.errors';

/** Default timeout for unary gRPC calls (in milliseconds) */
const GRPC_UNARY_TIMEOUT_MS = 10_000;

function grpcCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'number' ? error.code : undefined;
  }
  return undefined;
}

/**
 * JobDispatcher talking to a worker's ExtractionJobService.
 *
 * Resolves the service stub on module init; the channel itself connects
 * lazily on the first call. Every call is bounded by GRPC_UNARY_TIMEOUT_MS
 * so an unreachable worker surfaces as JobDispatchError instead of a hang.
 */
@Injectable()
export class GrpcJobDispatcher extends JobDispatcher implements OnModuleInit {
  readonly mode: DispatchMode = 'grpc';
  private readonly logger = new Logger(GrpcJobDispatcher.name);
  private grpcService!: ExtractionJobServiceClient;

  constructor(
    @Inject(WORKER_GRPC_CLIENT)
    private readonly client: ClientGrpc,
  ) {
    super();
  }

  onModuleInit(): void {
    this.grpcService = this.client.getService<ExtractionJobServiceClient>(
      EXTRACTION_JOB_SERVICE_NAME,
    );
    this.logger.log(`gRPC client initialized for ${EXTRACTION_JOB_SERVICE_NAME}`);
  }

  async submit(payload: ExtractionJobPayload): Promise<void> {
    const response = await this.call('submit', () =>
      this.grpcService.submitJob(payload),
    );
    this.logger.debug(
      `Worker accepted job ${response.jobId} (queue depth ${response.queueDepth})`,
    );
  }

  async cancel(jobId: string): Promise<boolean> {
    try {
      const response = await this.call('cancel', () =>
        this.grpcService.cancelJob({ jobId }),
      );
      return response.cancelled;
    } catch (error) {
      if (
        error instanceof JobDispatchError &&
        grpcCode(error.cause) === GrpcStatus.NOT_FOUND
      ) {
        throw new JobNotFoundError(jobId);
      }
      throw error;
    }
  }

  async stats(): Promise<QueueStats> {
    return this.call('stats', () => this.grpcService.getQueueStats({}));
  }

  private async call<T>(operation: string, rpc: () => Observable<T>): Promise<T> {
    try {
      return await lastValueFrom(rpc().pipe(timeout(GRPC_UNARY_TIMEOUT_MS)));
    } catch (error) {
      const code = grpcCode(error);
      if (code !== GrpcStatus.NOT_FOUND) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`gRPC ${operation} failed: ${message}`);
      }
      throw new JobDispatchError(operation, error);
    }
  }
}
