import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { JobsModule } from '@docextract/jobs';
import { HealthController } from './health.controller';
import { JobQueueHealthIndicator } from './job-queue.health';

@Module({
  imports: [TerminusModule, JobsModule],
  controllers: [HealthController],
  providers: [JobQueueHealthIndicator],
})
export class HealthModule {}
