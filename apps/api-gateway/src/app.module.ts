import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerModule } from '@nestjs/throttler';
import { validateEnv } from '@docextract/config';
import { TaskStoreModule } from '@docextract/task-store';
import { JobDispatchModule } from './dispatch/job-dispatch.module';
import { HealthModule } from './health/health.module';
import { TasksModule } from './tasks/tasks.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
      validate: validateEnv,
    }),

    // ── Rate limiting (upload & download) ─────────────────
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => [
        {
          ttl: configService.get<number>('THROTTLE_TTL_MS', 60000),
          limit: configService.get<number>('THROTTLE_LIMIT', 150),
        },
      ],
    }),

    // ── Job state & dispatch ──────────────────────────────
    TaskStoreModule.forRoot(),
    JobDispatchModule.forRoot(),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    TasksModule,
  ],
})
export class AppModule {}
