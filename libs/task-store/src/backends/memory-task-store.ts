import { Logger, OnModuleDestroy } from '@nestjs/common';
import { Job, NewJob, StatusUpdate } from '../interfaces/job.interface';
import {
  applyStatusUpdate,
  compareBySubmission,
  createPendingJob,
  isTerminal,
} from '../job-state';
import { ConflictError, JobNotFoundError } from '../task-store.errors';
import { TaskStore } from '../task-store';

interface Entry {
  job: Job;
  /** Epoch ms; fixed at creation */
  expiresAt: number;
}

/**
 * In-process TaskStore backed by a Map.
 *
 * Each mutating method reads, validates and replaces the entry without an
 * intervening await, so on the single JS thread it is atomic with respect to
 * every other caller. Only valid when the gateway and the workers share a
 * process (JOB_DISPATCH_MODE=local).
 */
export class MemoryTaskStore extends TaskStore implements OnModuleDestroy {
  private readonly logger = new Logger(MemoryTaskStore.name);
  private readonly entries = new Map<string, Entry>();
  private readonly sweepTimer: NodeJS.Timeout | null;

  constructor(
    private readonly retentionMs: number,
    sweepIntervalMs: number,
  ) {
    super();
    if (sweepIntervalMs > 0) {
      this.sweepTimer = setInterval(() => this.sweep(), sweepIntervalMs);
      this.sweepTimer.unref();
    } else {
      this.sweepTimer = null;
    }
  }

  async create(input: NewJob): Promise<Job> {
    if (this.readEntry(input.id)) {
      throw new ConflictError(input.id);
    }

    const job = createPendingJob(input);
    this.entries.set(job.id, {
      job,
      expiresAt: Date.now() + this.retentionMs,
    });
    return structuredClone(job);
  }

  async get(jobId: string): Promise<Job | null> {
    const entry = this.readEntry(jobId);
    return entry ? structuredClone(entry.job) : null;
  }

  async updateStatus(jobId: string, update: StatusUpdate): Promise<Job> {
    const entry = this.readEntry(jobId);
    if (!entry) {
      throw new JobNotFoundError(jobId);
    }

    const next = applyStatusUpdate(entry.job, update);
    this.entries.set(jobId, { job: next, expiresAt: entry.expiresAt });
    return structuredClone(next);
  }

  async requestCancellation(jobId: string): Promise<Job> {
    const entry = this.readEntry(jobId);
    if (!entry) {
      throw new JobNotFoundError(jobId);
    }
    if (isTerminal(entry.job.status) || entry.job.cancelRequested) {
      return structuredClone(entry.job);
    }

    const next: Job = { ...entry.job, cancelRequested: true };
    this.entries.set(jobId, { job: next, expiresAt: entry.expiresAt });
    return structuredClone(next);
  }

  async listAll(): Promise<Job[]> {
    this.sweep();
    return [...this.entries.values()]
      .map((entry) => structuredClone(entry.job))
      .sort(compareBySubmission);
  }

  async ping(): Promise<void> {
    // Always reachable.
  }

  /** Physically drops expired entries. Returns how many were removed. */
  sweep(): number {
    const now = Date.now();
    let removed = 0;
    for (const [jobId, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(jobId);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.debug(`Reclaimed ${removed} expired job(s)`);
    }
    return removed;
  }

  onModuleDestroy(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
    }
  }

  private readEntry(jobId: string): Entry | undefined {
    const entry = this.entries.get(jobId);
    if (!entry) return undefined;

    if (entry.expiresAt <= Date.now()) {
      this.entries.delete(jobId);
      return undefined;
    }
    return entry;
  }
}
