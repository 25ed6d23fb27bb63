import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { UploadStorageModule } from '@docextract/jobs';
import { TasksController } from './tasks.controller';
import { TasksService } from './tasks.service';

/**
 * TasksModule — HTTP surface for uploads and job polling.
 *
 * TaskStore and JobDispatcher come from their global modules
 * (TaskStoreModule.forRoot(), JobDispatchModule.forRoot()).
 */
@Module({
  imports: [ConfigModule, UploadStorageModule],
  controllers: [TasksController],
  providers: [TasksService],
})
export class TasksModule {}
