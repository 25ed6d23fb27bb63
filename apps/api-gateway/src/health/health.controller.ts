import { Controller, Get } from '@nestjs/common';
import {
  HealthCheck,
  HealthCheckService,
  MemoryHealthIndicator,
} from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';
import { TaskStoreHealthIndicator } from '@docextract/task-store';
import { JobDispatcherHealthIndicator } from '../dispatch/job-dispatcher.health';

/** Heap ceiling for the readiness check */
const HEAP_LIMIT_BYTES = 512 * 1024 * 1024;

@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly taskStore: TaskStoreHealthIndicator,
    private readonly dispatcher: JobDispatcherHealthIndicator,
    private readonly memory: MemoryHealthIndicator,
  ) {}

  /** Liveness: the task store and the job workers answer. */
  @Get()
  @HealthCheck()
  check(): Promise<HealthCheckResult> {
    return this.health.check([
      () => this.taskStore.isHealthy('task_store'),
      () => this.dispatcher.isHealthy('job_queue'),
    ]);
  }

  /** Readiness: liveness plus queue occupancy and heap usage. */
  @Get('detailed')
  @HealthCheck()
  detailed(): Promise<HealthCheckResult> {
    return this.health.check([
      () => this.taskStore.isHealthy('task_store'),
      () => this.dispatcher.isHealthy('job_queue', true),
      () => this.memory.checkHeap('memory_heap', HEAP_LIMIT_BYTES),
    ]);
  }
}
