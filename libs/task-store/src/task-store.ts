import { Job, NewJob, StatusUpdate } from './interfaces/job.interface';

/**
 * TaskStore — single source of truth for job state.
 *
 * The abstract class doubles as the Nest injection token, so the gateway
 * and the workers depend on this contract only and the back end (in-memory
 * or Redis) is chosen by configuration in TaskStoreModule.
 *
 * Every method returns copies; callers never hold a reference into the store.
 * Entries expire `retention` after creation whatever their status.
 */
export abstract class TaskStore {
  /** @throws ConflictError if the id is already present */
  abstract create(job: NewJob): Promise<Job>;

  /** Expired and unknown ids both read as null. */
  abstract get(jobId: string): Promise<Job | null>;

  /**
   * Compare-and-set status change guarded by the transition table.
   *
   * @throws JobNotFoundError
   * @throws InvalidTransitionError
   */
  abstract updateStatus(jobId: string, update: StatusUpdate): Promise<Job>;

  /**
   * Flags a non-terminal job so its worker revokes it at the next safe point.
   * Terminal jobs are returned unchanged.
   *
   * @throws JobNotFoundError
   */
  abstract requestCancellation(jobId: string): Promise<Job>;

  /** Live jobs, newest submission first. */
  abstract listAll(): Promise<Job[]>;

  /** @throws TaskStoreUnavailableError when the back end cannot be reached */
  abstract ping(): Promise<void>;
}
