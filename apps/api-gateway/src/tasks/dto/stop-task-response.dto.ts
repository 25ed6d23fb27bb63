import { JobStatus } from '@docextract/task-store';

/** POST /tasks/:id/stop */
export class StopTaskResponseDto {
  message!: string;

  /** Status after the request: REVOKED, or STARTED while the worker winds down */
  status!: JobStatus;
}
