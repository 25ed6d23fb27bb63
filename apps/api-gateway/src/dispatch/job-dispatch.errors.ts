/** The worker pool could not be reached or answered with an error. */
export class JobDispatchError extends Error {
  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Job ${operation} could not reach the worker: ${reason}`, { cause });
    this.name = 'JobDispatchError';
  }
}
