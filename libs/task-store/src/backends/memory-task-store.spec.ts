import { JobStatus } from '../enums/job-status.enum';
import { NewJob } from '../interfaces/job.interface';
import {
  ConflictError,
  InvalidTransitionError,
  JobNotFoundError,
} from '../task-store.errors';
import { MemoryTaskStore } from './memory-task-store';

const HOUR_MS = 60 * 60 * 1000;

function newJob(id: string): NewJob {
  return {
    id,
    sourceName: `${id}.pdf`,
    mediaType: 'application/pdf',
    sizeBytes: 1024,
    storagePath: `/tmp/uploads/${id}.pdf`,
  };
}

describe('MemoryTaskStore', () => {
  let store: MemoryTaskStore;

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-03-01T10:00:00.000Z'));
    store = new MemoryTaskStore(HOUR_MS, 0);
  });

  afterEach(() => {
    store.onModuleDestroy();
    jest.useRealTimers();
  });

  it('creates and reads back a PENDING job', async () => {
    await store.create(newJob('job-1'));

    const job = await store.get('job-1');
    expect(job?.status).toBe(JobStatus.PENDING);
    expect(job?.submittedAt).toBe('2026-03-01T10:00:00.000Z');
  });

  it('refuses to create the same id twice', async () => {
    await store.create(newJob('job-1'));

    await expect(store.create(newJob('job-1'))).rejects.toBeInstanceOf(ConflictError);
  });

  it('returns copies that cannot change stored state', async () => {
    const created = await store.create(newJob('job-1'));
    created.status = JobStatus.SUCCESS;

    const read = await store.get('job-1');
    if (!read) throw new Error('job missing');
    read.sourceName = 'tampered.pdf';

    expect((await store.get('job-1'))?.status).toBe(JobStatus.PENDING);
    expect((await store.get('job-1'))?.sourceName).toBe('job-1.pdf');
  });

  it('applies guarded transitions and keeps the first terminal state', async () => {
    await store.create(newJob('job-1'));
    await store.updateStatus('job-1', { status: JobStatus.STARTED });
    await store.updateStatus('job-1', { status: JobStatus.REVOKED });

    await expect(
      store.updateStatus('job-1', {
        status: JobStatus.SUCCESS,
        result: { markdown: 'late', tables: [] },
      }),
    ).rejects.toBeInstanceOf(InvalidTransitionError);

    const job = await store.get('job-1');
    expect(job?.status).toBe(JobStatus.REVOKED);
    expect(job?.result).toBeNull();
  });

  it('throws JobNotFoundError when updating an unknown job', async () => {
    await expect(
      store.updateStatus('missing', { status: JobStatus.STARTED }),
    ).rejects.toBeInstanceOf(JobNotFoundError);
  });

  it('expires jobs after the retention period whatever their status', async () => {
    await store.create(newJob('job-1'));
    await store.updateStatus('job-1', { status: JobStatus.STARTED });
    await store.updateStatus('job-1', {
      status: JobStatus.FAILURE,
      error: 'The extraction service could not be reached',
    });

    jest.advanceTimersByTime(HOUR_MS);

    expect(await store.get('job-1')).toBeNull();
    await expect(store.requestCancellation('job-1')).rejects.toBeInstanceOf(
      JobNotFoundError,
    );
  });

  it('keeps the creation expiry across updates', async () => {
    await store.create(newJob('job-1'));
    jest.advanceTimersByTime(HOUR_MS - 1000);
    await store.updateStatus('job-1', { status: JobStatus.STARTED });

    jest.advanceTimersByTime(1000);

    expect(await store.get('job-1')).toBeNull();
  });

  it('lists live jobs newest first and reclaims expired ones', async () => {
    await store.create(newJob('old'));
    jest.advanceTimersByTime(HOUR_MS / 2);
    await store.create(newJob('middle'));
    jest.advanceTimersByTime(HOUR_MS / 4);
    await store.create(newJob('new'));
    jest.advanceTimersByTime(HOUR_MS / 4);

    const ids = (await store.listAll()).map((job) => job.id);

    expect(ids).toEqual(['new', 'middle']);
    expect(store.sweep()).toBe(0);
  });

  it('sweep() physically removes expired entries', async () => {
    await store.create(newJob('job-1'));
    await store.create(newJob('job-2'));
    jest.advanceTimersByTime(HOUR_MS);

    expect(store.sweep()).toBe(2);
  });

  it('flags cancellation on live jobs only', async () => {
    await store.create(newJob('running'));
    await store.create(newJob('done'));
    await store.updateStatus('done', { status: JobStatus.REVOKED });

    const running = await store.requestCancellation('running');
    const done = await store.requestCancellation('done');

    expect(running.cancelRequested).toBe(true);
    expect(running.status).toBe(JobStatus.PENDING);
    expect(done.cancelRequested).toBe(false);
  });
});
