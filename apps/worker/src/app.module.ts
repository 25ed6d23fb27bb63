import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from '@docextract/config';
import { TaskStoreModule } from '@docextract/task-store';
import { HealthModule } from './health/health.module';
import { ExtractionJobsModule } from './extraction-jobs/extraction-jobs.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env', '../../.env'],
      validate: validateEnv,
    }),

    // ── Shared Task Store ────────────────────────────────
    TaskStoreModule.forRoot(),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    ExtractionJobsModule,
  ],
})
export class AppModule {}
