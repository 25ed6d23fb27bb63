import { Injectable } from '@nestjs/common';
import {
  ExtractionJobPayload,
  JobQueueService,
  QueueStats,
} from '@docextract/jobs';
import { DispatchMode, JobDispatcher } from './job-dispatcher';

/** Dispatches to the worker pool running inside the gateway process. */
@Injectable()
export class LocalJobDispatcher extends JobDispatcher {
  readonly mode: DispatchMode = 'local';

  constructor(private readonly jobQueue: JobQueueService) {
    super();
  }

  async submit(payload: ExtractionJobPayload): Promise<void> {
    this.jobQueue.submit(payload);
  }

  cancel(jobId: string): Promise<boolean> {
    return this.jobQueue.cancel(jobId);
  }

  async stats(): Promise<QueueStats> {
    return this.jobQueue.stats();
  }
}
