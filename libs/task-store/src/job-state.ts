import { JobStatus } from './enums/job-status.enum';
import { Job, NewJob, StatusUpdate } from './interfaces/job.interface';
import { InvalidTransitionError } from './task-store.errors';

const TRANSITIONS: Readonly<Record<JobStatus, readonly JobStatus[]>> = {
  [JobStatus.PENDING]: [JobStatus.STARTED, JobStatus.REVOKED, JobStatus.FAILURE],
  [JobStatus.STARTED]: [JobStatus.SUCCESS, JobStatus.FAILURE, JobStatus.REVOKED],
  [JobStatus.SUCCESS]: [],
  [JobStatus.FAILURE]: [],
  [JobStatus.REVOKED]: [],
};

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/** Builds the initial PENDING record for a freshly uploaded file. */
export function createPendingJob(input: NewJob): Job {
  return {
    id: input.id,
    status: JobStatus.PENDING,
    sourceName: input.sourceName,
    mediaType: input.mediaType,
    sizeBytes: input.sizeBytes,
    submittedAt: input.submittedAt ?? new Date().toISOString(),
    startedAt: null,
    finishedAt: null,
    storagePath: input.storagePath,
    cancelRequested: false,
    result: null,
    error: null,
  };
}

/**
 * Returns the job as it looks after `update`, or throws
 * InvalidTransitionError. The input is never mutated.
 */
export function applyStatusUpdate(
  job: Job,
  update: StatusUpdate,
  now: Date = new Date(),
): Job {
  if (!canTransition(job.status, update.status)) {
    throw new InvalidTransitionError(job.id, job.status, update.status);
  }

  const timestamp = now.toISOString();

  switch (update.status) {
    case JobStatus.STARTED:
      return { ...job, status: JobStatus.STARTED, startedAt: timestamp };
    case JobStatus.SUCCESS:
      return {
        ...job,
        status: JobStatus.SUCCESS,
        finishedAt: timestamp,
        result: update.result,
        error: null,
      };
    case JobStatus.FAILURE:
      return {
        ...job,
        status: JobStatus.FAILURE,
        finishedAt: timestamp,
        result: null,
        error: update.error,
      };
    case JobStatus.REVOKED:
      return {
        ...job,
        status: JobStatus.REVOKED,
        finishedAt: timestamp,
        result: null,
        error: null,
      };
  }
}

/** Newest first; ties broken by id so the order is stable between polls. */
export function compareBySubmission(a: Job, b: Job): number {
  const delta = Date.parse(b.submittedAt) - Date.parse(a.submittedAt);
  return delta !== 0 ? delta : a.id.localeCompare(b.id);
}
