import { DynamicModule, Logger, Module, Provider } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { MemoryTaskStore } from './backends/memory-task-store';
import { RedisTaskStore } from './backends/redis-task-store';
import { TaskStoreHealthIndicator } from './health/task-store.health';
import {
  DEFAULT_RETENTION_SECONDS,
  DEFAULT_SWEEP_INTERVAL_MS,
  TaskStoreBackend,
} from './task-store.constants';
import { TaskStore } from './task-store';

/**
 * TaskStoreModule — provides the TaskStore chosen by TASK_STORE_BACKEND.
 *
 * Usage:
 *   TaskStoreModule.forRoot()  — once, in the application's root module
 *
 * The module is global: the api-gateway services, the job queue and the
 * extraction worker must all see the same instance (for the memory back end
 * it is the only copy of the data).
 *
 * Redis connection settings mirror the rest of the platform:
 *   REDIS_HOST, REDIS_PORT, REDIS_DB
 */
@Module({})
export class TaskStoreModule {
  static forRoot(): DynamicModule {
    const taskStoreProvider: Provider = {
      provide: TaskStore,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): TaskStore => {
        const logger = new Logger(TaskStoreModule.name);
        const backend = configService.get<TaskStoreBackend>(
          'TASK_STORE_BACKEND',
          'memory',
        );
        const retentionMs =
          configService.get<number>(
            'TASK_RETENTION_SECONDS',
            DEFAULT_RETENTION_SECONDS,
          ) * 1000;

        if (backend === 'redis') {
          const client = new Redis({
            host: configService.get<string>('REDIS_HOST', 'localhost'),
            port: configService.get<number>('REDIS_PORT', 6379),
            db: configService.get<number>('REDIS_DB', 0),
            // Retry strategy: exponential back-off capped at 10 s
            retryStrategy: (times: number) => Math.min(times * 100, 10_000),
            enableReadyCheck: true,
            maxRetriesPerRequest: 3,
            lazyConnect: false,
          });
          logger.log(`Using Redis task store (retention ${retentionMs} ms)`);
          return new RedisTaskStore(client, retentionMs);
        }

        logger.log(`Using in-memory task store (retention ${retentionMs} ms)`);
        return new MemoryTaskStore(
          retentionMs,
          configService.get<number>(
            'TASK_STORE_SWEEP_INTERVAL_MS',
            DEFAULT_SWEEP_INTERVAL_MS,
          ),
        );
      },
    };

    return {
      module: TaskStoreModule,
      imports: [ConfigModule],
      providers: [taskStoreProvider, TaskStoreHealthIndicator],
      exports: [TaskStore, TaskStoreHealthIndicator],
      global: true,
    };
  }
}
