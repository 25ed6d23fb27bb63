import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';
import { TaskStoreHealthIndicator } from '@docextract/task-store';
import { JobQueueHealthIndicator } from './job-queue.health';

@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly taskStore: TaskStoreHealthIndicator,
    private readonly jobQueue: JobQueueHealthIndicator,
  ) {}

  @Get()
  @HealthCheck()
  check(): Promise<HealthCheckResult> {
    return this.health.check([
      () => this.taskStore.isHealthy('task_store'),
      () => this.jobQueue.isHealthy('job_queue'),
    ]);
  }
}
