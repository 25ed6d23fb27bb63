import { Injectable } from '@nestjs/common';
import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import { JobDispatcher } from './job-dispatcher';

/** Terminus indicator: the worker pool answers a stats request. */
@Injectable()
export class JobDispatcherHealthIndicator extends HealthIndicator {
  constructor(private readonly dispatcher: JobDispatcher) {
    super();
  }

  /** @param withStats include queue occupancy in the details */
  async isHealthy(key: string, withStats = false): Promise<HealthIndicatorResult> {
    try {
      const stats = await this.dispatcher.stats();
      return this.getStatus(key, true, {
        mode: this.dispatcher.mode,
        ...(withStats ? stats : {}),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new HealthCheckError(
        'Job queue unreachable',
        this.getStatus(key, false, { mode: this.dispatcher.mode, message }),
      );
    }
  }
}
