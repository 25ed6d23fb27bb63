import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as async from 'async';
import {
  InvalidTransitionError,
  Job,
  JobNotFoundError,
  JobStatus,
  TaskStore,
  isTerminal,
} from '@docextract/task-store';
import { UploadStorageService } from '../storage/upload-storage.service';
import { ExtractionWorkerService } from '../worker/extraction-worker.service';
import { JobCancelledError } from '../worker/job-errors';
import { ExtractionJobPayload, QueueStats } from './job-payload';

export const DEFAULT_WORKER_CONCURRENCY = 2;
export const DEFAULT_MAX_QUEUE_DEPTH = 100;

/** The queue already holds MAX_QUEUE_DEPTH waiting payloads. */
export class QueueFullError extends Error {
  constructor(readonly maxDepth: number) {
    super(`Job queue is full (${maxDepth} jobs waiting)`);
    this.name = 'QueueFullError';
  }
}

/**
 * JobQueueService — the in-process worker pool.
 *
 * A fixed-concurrency `async.queue` feeds payloads to
 * ExtractionWorkerService. Each running job owns an AbortController used
 * as its cancellation token.
 *
 * The queue holds references only; bytes stay on disk. Anything lost when
 * the process dies is still PENDING (or STARTED) in the task store and is
 * picked up again by JobRecoveryService.
 */
@Injectable()
export class JobQueueService implements OnModuleDestroy {
  private readonly logger = new Logger(JobQueueService.name);
  private readonly queue: async.QueueObject<ExtractionJobPayload>;
  private readonly queued = new Set<string>();
  private readonly running = new Map<string, AbortController>();
  readonly concurrency: number;
  readonly maxDepth: number;

  constructor(
    private readonly taskStore: TaskStore,
    private readonly storage: UploadStorageService,
    private readonly worker: ExtractionWorkerService,
    configService: ConfigService,
  ) {
    this.concurrency = configService.get<number>(
      'WORKER_CONCURRENCY',
      DEFAULT_WORKER_CONCURRENCY,
    );
    this.maxDepth = configService.get<number>(
      'MAX_QUEUE_DEPTH',
      DEFAULT_MAX_QUEUE_DEPTH,
    );

    this.queue = async.queue<ExtractionJobPayload>(
      async (payload: ExtractionJobPayload) => this.run(payload),
      this.concurrency,
    );

    this.queue.error((error, payload) => {
      this.logger.error(`Queue error for job ${payload?.jobId}: ${error.message}`);
    });

    this.logger.log(
      `Worker pool ready (concurrency ${this.concurrency}, max depth ${this.maxDepth})`,
    );
  }

  /**
   * Enqueues a payload and returns immediately. A job already queued or
   * running here is ignored.
   *
   * @throws QueueFullError
   */
  submit(payload: ExtractionJobPayload): void {
    if (this.isTracked(payload.jobId)) {
      this.logger.debug(`Job ${payload.jobId} is already in this pool, ignoring`);
      return;
    }
    if (!this.hasCapacity()) {
      throw new QueueFullError(this.maxDepth);
    }

    this.queued.add(payload.jobId);
    this.queue.push(payload);
    this.logger.debug(`Queued job ${payload.jobId} (${this.queued.size} waiting)`);
  }

  /**
   * Best-effort stop. Returns false when the job had already finished.
   *
   * @throws JobNotFoundError for unknown or expired ids
   */
  async cancel(jobId: string): Promise<boolean> {
    const job = await this.taskStore.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    if (isTerminal(job.status)) {
      return false;
    }

    if (this.queued.delete(jobId)) {
      this.queue.remove((node) => node.data.jobId === jobId);
      this.logger.log(`Removed job ${jobId} from the queue`);
    }

    // A local worker may be mid-claim; the compare-and-set decides the race.
    const controller = this.running.get(jobId);
    if (job.status === JobStatus.PENDING && (await this.revokePending(job))) {
      controller?.abort(new JobCancelledError(jobId));
      return true;
    }

    if (controller) {
      controller.abort(new JobCancelledError(jobId));
      this.logger.log(`Stop requested for running job ${jobId}`);
      return true;
    }

    // STARTED in another process: its worker checks the flag at the safe point.
    const flagged = await this.taskStore.requestCancellation(jobId);
    if (isTerminal(flagged.status)) {
      return false;
    }
    this.logger.log(`Flagged job ${jobId} for cancellation by its owner`);
    return true;
  }

  stats(): QueueStats {
    return {
      queued: this.queued.size,
      running: this.running.size,
      concurrency: this.concurrency,
      maxDepth: this.maxDepth,
    };
  }

  /** Queued or running in this process. */
  isTracked(jobId: string): boolean {
    return this.queued.has(jobId) || this.running.has(jobId);
  }

  hasCapacity(): boolean {
    return this.queued.size < this.maxDepth;
  }

  /**
   * Drops waiting payloads (they stay PENDING for recovery). Running jobs
   * are left to finish.
   */
  onModuleDestroy(): void {
    if (this.queued.size > 0) {
      this.logger.warn(`Shutting down with ${this.queued.size} job(s) still queued`);
    }
    this.queue.kill();
    this.queued.clear();
  }

  // ── Helpers ──────────────────────────────────────────────

  private async run(payload: ExtractionJobPayload): Promise<void> {
    this.queued.delete(payload.jobId);
    const controller = new AbortController();
    this.running.set(payload.jobId, controller);

    try {
      await this.worker.process(payload, controller.signal);
    } finally {
      this.running.delete(payload.jobId);
    }
  }

  /** PENDING → REVOKED. Returns false if a worker claimed it first. */
  private async revokePending(job: Job): Promise<boolean> {
    try {
      await this.taskStore.updateStatus(job.id, { status: JobStatus.REVOKED });
    } catch (error) {
      if (error instanceof InvalidTransitionError) {
        return false;
      }
      throw error;
    }

    await this.storage.remove(job.storagePath);
    this.logger.log(`Job ${job.id} revoked before it started`);
    return true;
  }
}
