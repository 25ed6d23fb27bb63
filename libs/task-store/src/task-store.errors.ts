import { JobStatus } from './enums/job-status.enum';

/**
 * Domain errors raised by TaskStore implementations.
 *
 * These are transport-agnostic: the api-gateway maps them to HTTP
 * exceptions and the worker maps them to gRPC status codes.
 */

export class ConflictError extends Error {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} already exists`);
    this.name = 'ConflictError';
  }
}

export class JobNotFoundError extends Error {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} not found or expired`);
    this.name = 'JobNotFoundError';
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    readonly jobId: string,
    readonly from: JobStatus,
    readonly to: JobStatus,
  ) {
    super(`Job ${jobId} cannot move from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

/** The backing store could not be reached or refused the operation. */
export class TaskStoreUnavailableError extends Error {
  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Task store ${operation} failed: ${reason}`, { cause });
    this.name = 'TaskStoreUnavailableError';
  }
}
