import { Logger, OnModuleDestroy } from '@nestjs/common';
import Redis from 'ioredis';
import { JobStatus } from '../enums/job-status.enum';
import { Job, NewJob, StatusUpdate } from '../interfaces/job.interface';
import {
  applyStatusUpdate,
  compareBySubmission,
  createPendingJob,
  isTerminal,
} from '../job-state';
import { TASK_INDEX_KEY, TASK_KEY_PREFIX } from '../task-store.constants';
import {
  ConflictError,
  JobNotFoundError,
  TaskStoreUnavailableError,
} from '../task-store.errors';
import { TaskStore } from '../task-store';

/** Give up after this many lost compare-and-set races on one key */
const MAX_CAS_ATTEMPTS = 5;

/**
 * Replaces KEYS[1] with ARGV[2] only if it still holds ARGV[1], keeping the
 * key's remaining TTL. Returns 1 on success, 0 on a lost race, -1 if missing.
 */
const COMPARE_AND_SET_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if not current then
  return -1
end
if current ~= ARGV[1] then
  return 0
end
local ttl = redis.call('PTTL', KEYS[1])
if ttl > 0 then
  redis.call('SET', KEYS[1], ARGV[2], 'PX', ttl)
else
  redis.call('SET', KEYS[1], ARGV[2])
end
return 1
`;

const JOB_STATUSES: readonly string[] = Object.values(JobStatus);

function isStoredJob(value: unknown): value is Job {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'id' in value &&
    typeof value.id === 'string' &&
    'status' in value &&
    typeof value.status === 'string' &&
    JOB_STATUSES.includes(value.status) &&
    'submittedAt' in value &&
    typeof value.submittedAt === 'string'
  );
}

/**
 * TaskStore backed by Redis, shared by the api-gateway and any number of
 * worker processes.
 *
 * Key layout:
 *   docextract:task:{id}     — job JSON, PX = retention from creation
 *   docextract:task-index    — sorted set, score = submission epoch ms
 *
 * Writes after creation are optimistic: read the JSON, compute the next
 * state in TypeScript, then swap it in with a Lua compare-and-set that
 * fails if anyone else wrote in between. The index is trimmed lazily on
 * listAll(); job keys expire on their own.
 */
export class RedisTaskStore extends TaskStore implements OnModuleDestroy {
  private readonly logger = new Logger(RedisTaskStore.name);

  constructor(
    private readonly client: Redis,
    private readonly retentionMs: number,
  ) {
    super();
  }

  async create(input: NewJob): Promise<Job> {
    const job = createPendingJob(input);
    // One transaction, so a record never exists without its index entry.
    const replies = await this.run('create', () =>
      this.client
        .multi()
        .set(this.key(job.id), JSON.stringify(job), 'PX', this.retentionMs, 'NX')
        .zadd(TASK_INDEX_KEY, 'NX', Date.parse(job.submittedAt), job.id)
        .exec(),
    );

    if (replies === null) {
      throw new TaskStoreUnavailableError('create', new Error('transaction was discarded'));
    }
    const failure = replies.find(([error]) => error !== null)?.[0];
    if (failure) {
      this.logger.error(`Redis create failed: ${failure.message}`);
      throw new TaskStoreUnavailableError('create', failure);
    }
    if (replies[0]?.[1] !== 'OK') {
      throw new ConflictError(job.id);
    }
    return job;
  }

  async get(jobId: string): Promise<Job | null> {
    const raw = await this.run('get', () => this.client.get(this.key(jobId)));
    return raw === null ? null : this.decode(raw);
  }

  updateStatus(jobId: string, update: StatusUpdate): Promise<Job> {
    return this.compareAndSet(jobId, (job) => applyStatusUpdate(job, update));
  }

  requestCancellation(jobId: string): Promise<Job> {
    return this.compareAndSet(jobId, (job) =>
      isTerminal(job.status) || job.cancelRequested
        ? job
        : { ...job, cancelRequested: true },
    );
  }

  async listAll(): Promise<Job[]> {
    const cutoff = Date.now() - this.retentionMs;
    await this.run('trim index', () =>
      this.client.zremrangebyscore(TASK_INDEX_KEY, '-inf', cutoff),
    );

    const ids = await this.run('list', () =>
      this.client.zrevrange(TASK_INDEX_KEY, 0, -1),
    );
    if (ids.length === 0) return [];

    const raws = await this.run('list', () =>
      this.client.mget(...ids.map((id) => this.key(id))),
    );

    const jobs: Job[] = [];
    const stale: string[] = [];
    ids.forEach((id, index) => {
      const raw = raws[index];
      if (raw) {
        jobs.push(this.decode(raw));
      } else {
        stale.push(id);
      }
    });

    if (stale.length > 0) {
      await this.run('trim index', () =>
        this.client.zrem(TASK_INDEX_KEY, ...stale),
      );
      this.logger.debug(`Dropped ${stale.length} expired id(s) from the index`);
    }

    return jobs.sort(compareBySubmission);
  }

  async ping(): Promise<void> {
    await this.run('ping', () => this.client.ping());
  }

  async onModuleDestroy(): Promise<void> {
    this.logger.log('Closing Redis task store connection');
    await this.client.quit();
  }

  // ── Helpers ──────────────────────────────────────────────

  private async compareAndSet(
    jobId: string,
    mutate: (job: Job) => Job,
  ): Promise<Job> {
    const key = this.key(jobId);

    for (let attempt = 1; attempt <= MAX_CAS_ATTEMPTS; attempt++) {
      const raw = await this.run('read', () => this.client.get(key));
      if (raw === null) {
        throw new JobNotFoundError(jobId);
      }

      const current = this.decode(raw);
      const next = mutate(current);
      if (next === current) {
        return current;
      }

      const outcome = await this.run('write', () =>
        this.client.eval(COMPARE_AND_SET_SCRIPT, 1, key, raw, JSON.stringify(next)),
      );

      switch (Number(outcome)) {
        case 1:
          return next;
        case -1:
          throw new JobNotFoundError(jobId);
        default:
          this.logger.debug(
            `Concurrent write on job ${jobId}, retrying (${attempt}/${MAX_CAS_ATTEMPTS})`,
          );
      }
    }

    throw new TaskStoreUnavailableError(
      'write',
      new Error(`job ${jobId} kept changing under ${MAX_CAS_ATTEMPTS} attempts`),
    );
  }

  private decode(raw: string): Job {
    const parsed: unknown = JSON.parse(raw);
    if (!isStoredJob(parsed)) {
      throw new TaskStoreUnavailableError(
        'decode',
        new Error('stored job record is malformed'),
      );
    }
    return parsed;
  }

  private key(jobId: string): string {
    return `${TASK_KEY_PREFIX}${jobId}`;
  }

  private async run<T>(operation: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Redis ${operation} failed: ${cause.message}`);
      throw new TaskStoreUnavailableError(operation, cause);
    }
  }
}
