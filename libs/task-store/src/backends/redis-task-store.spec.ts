import RedisMock from 'ioredis-mock';
import { JobStatus } from '../enums/job-status.enum';
import { NewJob } from '../interfaces/job.interface';
import { TASK_INDEX_KEY, TASK_KEY_PREFIX } from '../task-store.constants';
import {
  ConflictError,
  InvalidTransitionError,
  JobNotFoundError,
  TaskStoreUnavailableError,
} from '../task-store.errors';
import { RedisTaskStore } from './redis-task-store';

const HOUR_MS = 60 * 60 * 1000;

function newJob(id: string, submittedAt: string): NewJob {
  return {
    id,
    sourceName: `${id}.pdf`,
    mediaType: 'application/pdf',
    sizeBytes: 1024,
    storagePath: `/tmp/uploads/${id}.pdf`,
    submittedAt,
  };
}

describe('RedisTaskStore', () => {
  let client: InstanceType<typeof RedisMock>;
  let store: RedisTaskStore;

  beforeEach(async () => {
    client = new RedisMock();
    // ioredis-mock shares data between instances
    await client.flushall();
    store = new RedisTaskStore(client, HOUR_MS);
  });

  it('stores the job JSON with a retention TTL and indexes it', async () => {
    const submittedAt = new Date().toISOString();
    await store.create(newJob('job-1', submittedAt));

    const ttl = await client.pttl(`${TASK_KEY_PREFIX}job-1`);
    const score = await client.zscore(TASK_INDEX_KEY, 'job-1');

    expect(ttl).toBeGreaterThan(0);
    expect(ttl).toBeLessThanOrEqual(HOUR_MS);
    expect(Number(score)).toBe(Date.parse(submittedAt));
    expect((await store.get('job-1'))?.status).toBe(JobStatus.PENDING);
  });

  it('refuses to create the same id twice', async () => {
    const submittedAt = new Date().toISOString();
    await store.create(newJob('job-1', submittedAt));

    await expect(store.create(newJob('job-1', submittedAt))).rejects.toBeInstanceOf(
      ConflictError,
    );
  });

  it('writes the record and its index entry in a single transaction', async () => {
    const transaction = jest.spyOn(client, 'multi');
    const submittedAt = new Date().toISOString();

    await store.create(newJob('job-1', submittedAt));

    expect(transaction).toHaveBeenCalledTimes(1);
    expect(await client.exists(`${TASK_KEY_PREFIX}job-1`)).toBe(1);
    expect(Number(await client.zscore(TASK_INDEX_KEY, 'job-1'))).toBe(Date.parse(submittedAt));
  });

  it('keeps the original index entry when a duplicate create is refused', async () => {
    const first = new Date(Date.now() - 5000).toISOString();
    await store.create(newJob('job-1', first));

    await expect(
      store.create(newJob('job-1', new Date().toISOString())),
    ).rejects.toBeInstanceOf(ConflictError);

    expect(Number(await client.zscore(TASK_INDEX_KEY, 'job-1'))).toBe(Date.parse(first));
    expect((await store.get('job-1'))?.submittedAt).toBe(first);
  });

  it('lets exactly one of two concurrent terminal writes win', async () => {
    await store.create(newJob('job-1', new Date().toISOString()));
    await store.updateStatus('job-1', { status: JobStatus.STARTED });

    const [success, revoked] = await Promise.allSettled([
      store.updateStatus('job-1', {
        status: JobStatus.SUCCESS,
        result: { markdown: 'Invoice total\n', tables: [] },
      }),
      store.updateStatus('job-1', { status: JobStatus.REVOKED }),
    ]);

    const outcomes = [success, revoked];
    const winners = outcomes.filter((outcome) => outcome.status === 'fulfilled');
    const losers = outcomes.flatMap((outcome) =>
      outcome.status === 'rejected' ? [outcome.reason] : [],
    );
    expect(winners).toHaveLength(1);
    expect(losers).toHaveLength(1);
    expect(losers[0]).toBeInstanceOf(InvalidTransitionError);

    const stored = await store.get('job-1');
    if (success.status === 'fulfilled') {
      expect(stored?.status).toBe(JobStatus.SUCCESS);
      expect(stored?.result?.markdown).toBe('Invoice total\n');
    } else {
      expect(stored?.status).toBe(JobStatus.REVOKED);
      expect(stored?.result).toBeNull();
    }
  });

  it('retries a write that lost the race to a concurrent writer', async () => {
    await store.create(newJob('job-1', new Date().toISOString()));
    const key = `${TASK_KEY_PREFIX}job-1`;
    const stale = await client.get(key);
    const read = jest.spyOn(client, 'get');
    // First read sees the record, then another writer flags it before our write lands.
    read.mockImplementationOnce(async () => {
      await store.requestCancellation('job-1');
      return stale;
    });

    const job = await store.updateStatus('job-1', { status: JobStatus.STARTED });

    expect(read).toHaveBeenCalledTimes(3);
    expect(job.status).toBe(JobStatus.STARTED);
    expect(job.cancelRequested).toBe(true);
    expect((await store.get('job-1'))?.cancelRequested).toBe(true);
  });

  it('returns null for unknown ids', async () => {
    expect(await store.get('missing')).toBeNull();
  });

  it('walks a job through to SUCCESS and refuses a later state', async () => {
    await store.create(newJob('job-1', new Date().toISOString()));
    await store.updateStatus('job-1', { status: JobStatus.STARTED });
    await store.updateStatus('job-1', {
      status: JobStatus.SUCCESS,
      result: { markdown: 'Quarterly figures\n', tables: [] },
    });

    await expect(
      store.updateStatus('job-1', { status: JobStatus.REVOKED }),
    ).rejects.toBeInstanceOf(InvalidTransitionError);

    const job = await store.get('job-1');
    expect(job?.status).toBe(JobStatus.SUCCESS);
    expect(job?.result?.markdown).toBe('Quarterly figures\n');
    expect(job?.startedAt).not.toBeNull();
    expect(job?.finishedAt).not.toBeNull();
  });

  it('throws JobNotFoundError when the key is gone', async () => {
    await expect(
      store.requestCancellation('missing'),
    ).rejects.toBeInstanceOf(JobNotFoundError);
  });

  it('lists newest first and drops ids whose keys expired', async () => {
    const now = Date.now();
    await store.create(newJob('a', new Date(now - 3000).toISOString()));
    await store.create(newJob('b', new Date(now - 1000).toISOString()));
    await store.create(newJob('c', new Date(now - 2000).toISOString()));
    await client.del(`${TASK_KEY_PREFIX}c`);

    const ids = (await store.listAll()).map((job) => job.id);

    expect(ids).toEqual(['b', 'a']);
    expect(await client.zrange(TASK_INDEX_KEY, 0, -1)).toEqual(['a', 'b']);
  });

  it('wraps client failures in TaskStoreUnavailableError', async () => {
    jest.spyOn(client, 'get').mockRejectedValueOnce(new Error('connection reset'));

    await expect(store.get('job-1')).rejects.toBeInstanceOf(TaskStoreUnavailableError);
  });

  it('rejects a malformed record', async () => {
    await client.set(`${TASK_KEY_PREFIX}bad`, JSON.stringify({ id: 'bad' }));

    await expect(store.get('bad')).rejects.toThrow(
      'Task store decode failed: stored job record is malformed',
    );
  });
});
