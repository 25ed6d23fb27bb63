import { ExtractedTable } from '@docextract/task-store';

/** GET /api/tasks/:id/result on a SUCCESS job. */
export class TaskResultDto {
  task_id!: string;
  markdown!: string;
  tables!: ExtractedTable[];
}
