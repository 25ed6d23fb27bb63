import { JobStatus } from './enums/job-status.enum';
import {
  applyStatusUpdate,
  canTransition,
  compareBySubmission,
  createPendingJob,
  isTerminal,
} from './job-state';
import { InvalidTransitionError } from './task-store.errors';

const baseJob = () =>
  createPendingJob({
    id: 'job-1',
    sourceName: 'report.pdf',
    mediaType: 'application/pdf',
    sizeBytes: 2048,
    storagePath: '/tmp/uploads/job-1-report.pdf',
    submittedAt: '2026-03-01T10:00:00.000Z',
  });

describe('job state machine', () => {
  it('creates PENDING jobs with no terminal fields', () => {
    const job = baseJob();

    expect(job.status).toBe(JobStatus.PENDING);
    expect(job.result).toBeNull();
    expect(job.error).toBeNull();
    expect(job.startedAt).toBeNull();
    expect(job.finishedAt).toBeNull();
    expect(job.cancelRequested).toBe(false);
  });

  it.each([
    [JobStatus.PENDING, JobStatus.STARTED, true],
    [JobStatus.PENDING, JobStatus.REVOKED, true],
    [JobStatus.PENDING, JobStatus.FAILURE, true],
    [JobStatus.PENDING, JobStatus.SUCCESS, false],
    [JobStatus.STARTED, JobStatus.SUCCESS, true],
    [JobStatus.STARTED, JobStatus.FAILURE, true],
    [JobStatus.STARTED, JobStatus.REVOKED, true],
    [JobStatus.STARTED, JobStatus.PENDING, false],
    [JobStatus.SUCCESS, JobStatus.FAILURE, false],
    [JobStatus.FAILURE, JobStatus.SUCCESS, false],
    [JobStatus.REVOKED, JobStatus.STARTED, false],
    [JobStatus.REVOKED, JobStatus.SUCCESS, false],
  ])('%s → %s allowed: %s', (from, to, allowed) => {
    expect(canTransition(from, to)).toBe(allowed);
  });

  it('treats SUCCESS, FAILURE and REVOKED as terminal', () => {
    expect(isTerminal(JobStatus.PENDING)).toBe(false);
    expect(isTerminal(JobStatus.STARTED)).toBe(false);
    expect(isTerminal(JobStatus.SUCCESS)).toBe(true);
    expect(isTerminal(JobStatus.FAILURE)).toBe(true);
    expect(isTerminal(JobStatus.REVOKED)).toBe(true);
  });

  it('stamps startedAt and finishedAt on the way through', () => {
    const started = applyStatusUpdate(
      baseJob(),
      { status: JobStatus.STARTED },
      new Date('2026-03-01T10:00:05.000Z'),
    );
    const done = applyStatusUpdate(
      started,
      {
        status: JobStatus.SUCCESS,
        result: { markdown: '# Report\n', tables: [] },
      },
      new Date('2026-03-01T10:00:09.000Z'),
    );

    expect(started.startedAt).toBe('2026-03-01T10:00:05.000Z');
    expect(started.finishedAt).toBeNull();
    expect(done.finishedAt).toBe('2026-03-01T10:00:09.000Z');
    expect(done.result).toEqual({ markdown: '# Report\n', tables: [] });
    expect(done.error).toBeNull();
  });

  it('does not mutate the input job', () => {
    const job = baseJob();
    applyStatusUpdate(job, { status: JobStatus.REVOKED });

    expect(job.status).toBe(JobStatus.PENDING);
    expect(job.finishedAt).toBeNull();
  });

  it('rejects a second terminal state', () => {
    const failed = applyStatusUpdate(
      applyStatusUpdate(baseJob(), { status: JobStatus.STARTED }),
      { status: JobStatus.FAILURE, error: 'The extraction service is rate limited' },
    );

    expect(() =>
      applyStatusUpdate(failed, {
        status: JobStatus.SUCCESS,
        result: { markdown: 'late', tables: [] },
      }),
    ).toThrow(InvalidTransitionError);
  });

  it('orders newest submission first', () => {
    const older = { ...baseJob(), id: 'a', submittedAt: '2026-03-01T09:00:00.000Z' };
    const newer = { ...baseJob(), id: 'b', submittedAt: '2026-03-01T11:00:00.000Z' };

    expect([older, newer].sort(compareBySubmission).map((job) => job.id)).toEqual([
      'b',
      'a',
    ]);
  });
});
