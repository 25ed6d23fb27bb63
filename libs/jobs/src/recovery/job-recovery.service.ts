import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnModuleDestroy,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  InvalidTransitionError,
  Job,
  JobNotFoundError,
  JobStatus,
  TaskStore,
} from '@docextract/task-store';
import { JobQueueService } from '../queue/job-queue.service';
import { UploadStorageService } from '../storage/upload-storage.service';
import { DEFAULT_EXTRACTION_TIMEOUT_MS } from '../worker/extraction-worker.service';

export const DEFAULT_RECOVERY_INTERVAL_MS = 30_000;
export const DEFAULT_PENDING_REDISPATCH_AFTER_MS = 30_000;
export const DEFAULT_STALE_JOB_GRACE_MS = 30_000;

export interface RecoveryReport {
  redispatched: string[];
  failed: string[];
}

/**
 * JobRecoveryService — makes sure no job stays PENDING or STARTED forever.
 *
 * Runs once when the application boots and then every
 * JOB_RECOVERY_INTERVAL_MS (0 disables the timer):
 *
 * - PENDING jobs nobody here is tracking, older than
 *   PENDING_REDISPATCH_AFTER_MS, are submitted to the local pool while it
 *   has room. Covers dispatch failures, restarts and queue overflow.
 * - STARTED jobs not running here whose start is older than
 *   EXTRACTION_TIMEOUT_MS + STALE_JOB_GRACE_MS belonged to a worker that
 *   died. They are failed and their upload removed.
 */
@Injectable()
export class JobRecoveryService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(JobRecoveryService.name);
  private readonly intervalMs: number;
  private readonly redispatchAfterMs: number;
  private readonly staleAfterMs: number;
  private readonly timeoutMs: number;
  private timer: NodeJS.Timeout | null = null;
  private sweeping = false;

  constructor(
    private readonly taskStore: TaskStore,
    private readonly queue: JobQueueService,
    private readonly storage: UploadStorageService,
    configService: ConfigService,
  ) {
    this.intervalMs = configService.get<number>(
      'JOB_RECOVERY_INTERVAL_MS',
      DEFAULT_RECOVERY_INTERVAL_MS,
    );
    this.redispatchAfterMs = configService.get<number>(
      'PENDING_REDISPATCH_AFTER_MS',
      DEFAULT_PENDING_REDISPATCH_AFTER_MS,
    );
    this.timeoutMs = configService.get<number>(
      'EXTRACTION_TIMEOUT_MS',
      DEFAULT_EXTRACTION_TIMEOUT_MS,
    );
    this.staleAfterMs =
      this.timeoutMs +
      configService.get<number>('STALE_JOB_GRACE_MS', DEFAULT_STALE_JOB_GRACE_MS);
  }

  async onApplicationBootstrap(): Promise<void> {
    try {
      await this.sweep(0);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Startup recovery sweep failed: ${message}`);
    }

    if (this.intervalMs > 0) {
      this.timer = setInterval(() => {
        this.sweep().catch((error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          this.logger.error(`Recovery sweep failed: ${message}`);
        });
      }, this.intervalMs);
      this.timer.unref();
    }
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * One pass over the task store. Overlapping calls return an empty report.
   *
   * @param pendingAfterMs minimum age of a PENDING job before re-dispatch
   */
  async sweep(pendingAfterMs: number = this.redispatchAfterMs): Promise<RecoveryReport> {
    const report: RecoveryReport = { redispatched: [], failed: [] };
    if (this.sweeping) return report;
    this.sweeping = true;

    try {
      const now = Date.now();
      // listAll is newest first; re-dispatch oldest first
      const jobs = (await this.taskStore.listAll()).reverse();

      for (const job of jobs) {
        if (this.queue.isTracked(job.id)) continue;

        if (job.status === JobStatus.PENDING) {
          if (now - Date.parse(job.submittedAt) < pendingAfterMs) continue;
          if (!this.queue.hasCapacity()) continue;
          this.queue.submit({
            jobId: job.id,
            storagePath: job.storagePath,
            mediaType: job.mediaType,
          });
          report.redispatched.push(job.id);
        } else if (job.status === JobStatus.STARTED && this.isStale(job, now)) {
          if (await this.failStale(job)) {
            report.failed.push(job.id);
          }
        }
      }
    } finally {
      this.sweeping = false;
    }

    if (report.redispatched.length > 0 || report.failed.length > 0) {
      this.logger.log(
        `Recovery: re-dispatched ${report.redispatched.length}, failed ${report.failed.length} stale job(s)`,
      );
    }
    return report;
  }

  private isStale(job: Job, now: number): boolean {
    const startedAt = job.startedAt ? Date.parse(job.startedAt) : Date.parse(job.submittedAt);
    return now - startedAt >= this.staleAfterMs;
  }

  private async failStale(job: Job): Promise<boolean> {
    await this.storage.remove(job.storagePath);
    try {
      await this.taskStore.updateStatus(job.id, {
        status: JobStatus.FAILURE,
        error: `Extraction did not finish within ${this.timeoutMs / 1000} seconds`,
      });
    } catch (error) {
      if (error instanceof InvalidTransitionError || error instanceof JobNotFoundError) {
        return false;
      }
      throw error;
    }
    this.logger.warn(`Job ${job.id} was abandoned by its worker, marked FAILURE`);
    return true;
  }
}
