import { ExtractionTimeoutError } from './job-errors';

/**
 * Runs `task` under a hard deadline. The task gets a signal that aborts
 * when the deadline passes; the returned promise rejects with
 * ExtractionTimeoutError at that moment, whether or not the task has
 * noticed.
 */
export async function runWithDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new ExtractionTimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
