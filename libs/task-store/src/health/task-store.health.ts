import { Injectable } from '@nestjs/common';
import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { TaskStore } from '../task-store';

/** Terminus indicator: the task store answers a ping. */
@Injectable()
export class TaskStoreHealthIndicator extends HealthIndicator {
  constructor(private readonly taskStore: TaskStore) {
    super();
  }

  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    try {
      await this.taskStore.ping();
      return this.getStatus(key, true, {
        backend: this.taskStore.constructor.name,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new HealthCheckError(
        'Task store unreachable',
        this.getStatus(key, false, { message }),
      );
    }
  }
}
