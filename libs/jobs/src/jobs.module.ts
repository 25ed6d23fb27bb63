import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import OpenAI from 'openai';
import {
  DEFAULT_OPENAI_MODEL,
  OpenAiExtractionProvider,
} from './extraction/openai-extraction.provider';
import { ExtractionProvider } from './extraction/extraction-provider';
import { JobQueueService } from './queue/job-queue.service';
import { JobRecoveryService } from './recovery/job-recovery.service';
import { UploadStorageModule } from './storage/upload-storage.module';
import { ExtractionWorkerService } from './worker/extraction-worker.service';

/**
 * JobsModule — worker pool, extraction worker and recovery.
 *
 * Imported by the worker app, and by the api-gateway when
 * JOB_DISPATCH_MODE=local. Requires a TaskStore in scope
 * (TaskStoreModule.forRoot() is global).
 *
 * The ExtractionProvider is built from OPENAI_API_KEY / OPENAI_MODEL; tests
 * replace it with overrideProvider(ExtractionProvider).
 */
@Module({
  imports: [ConfigModule, UploadStorageModule],
  providers: [
    {
      provide: ExtractionProvider,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): ExtractionProvider =>
        new OpenAiExtractionProvider(
          new OpenAI({
            apiKey: configService.getOrThrow<string>('OPENAI_API_KEY'),
            maxRetries: 2,
          }),
          configService.get<string>('OPENAI_MODEL', DEFAULT_OPENAI_MODEL),
        ),
    },
    ExtractionWorkerService,
    JobQueueService,
    JobRecoveryService,
  ],
  exports: [JobQueueService, UploadStorageModule],
})
export class JobsModule {}
