import { Injectable } from '@nestjs/common';
import { HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { JobQueueService } from '@docextract/jobs';

/** Reports worker pool occupancy. The pool is up as long as the process is. */
@Injectable()
export class JobQueueHealthIndicator extends HealthIndicator {
  constructor(private readonly jobQueue: JobQueueService) {
    super();
  }

  isHealthy(key: string): HealthIndicatorResult {
    return this.getStatus(key, true, { ...this.jobQueue.stats() });
  }
}
