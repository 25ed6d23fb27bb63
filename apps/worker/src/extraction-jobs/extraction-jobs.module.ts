import { Module } from '@nestjs/common';
import { JobsModule } from '@docextract/jobs';
import { ExtractionJobsController } from './extraction-jobs.controller';

/**
 * Registers the controller implementing the ExtractionJobService proto
 * definition on top of the local worker pool.
 */
@Module({
  imports: [JobsModule],
  controllers: [ExtractionJobsController],
})
export class ExtractionJobsModule {}
