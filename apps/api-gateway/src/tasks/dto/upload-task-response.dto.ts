import { JobStatus } from '@docextract/task-store';

/** Response body for POST /uploadfile/ (HTTP 202 Accepted). */
export class UploadTaskResponseDto {
  /** UUID v4 to poll with GET /api/tasks/:id */
  task_id!: string;

  /** Always PENDING right after upload */
  status!: JobStatus;
}
