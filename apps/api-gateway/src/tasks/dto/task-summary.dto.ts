import { Job, JobStatus } from '@docextract/task-store';

/** One row of GET /api/tasks. */
export class TaskSummaryDto {
  id!: string;
  status!: JobStatus;
  filename!: string;
  submitted_at!: string;
  size!: number;
  media_type!: string;

  static fromJob(job: Job): TaskSummaryDto {
    return {
      id: job.id,
      status: job.status,
      filename: job.sourceName,
      submitted_at: job.submittedAt,
      size: job.sizeBytes,
      media_type: job.mediaType,
    };
  }
}

/** GET /api/tasks/:id: the summary plus timing and failure detail. */
export class TaskDetailDto extends TaskSummaryDto {
  started_at!: string | null;
  finished_at!: string | null;
  error!: string | null;

  static fromJob(job: Job): TaskDetailDto {
    return {
      ...TaskSummaryDto.fromJob(job),
      started_at: job.startedAt,
      finished_at: job.finishedAt,
      error: job.error,
    };
  }
}
