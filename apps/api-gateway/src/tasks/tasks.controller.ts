import {
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  StreamableFile,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { ThrottlerGuard } from '@nestjs/throttler';
import { memoryStorage } from 'multer';
import { ListTasksQueryDto } from './dto/list-tasks-query.dto';
import { StopTaskResponseDto } from './dto/stop-task-response.dto';
import { TaskResultDto } from './dto/task-result.dto';
import { TaskDetailDto, TaskSummaryDto } from './dto/task-summary.dto';
import { UploadTaskResponseDto } from './dto/upload-task-response.dto';
import { TasksService } from './tasks.service';

/**
 * Multer configuration: memory storage so the bytes can be sniffed before
 * anything touches the upload directory.
 *
 * The real ceiling is MAX_UPLOAD_BYTES, checked in TasksService so the
 * client gets a 413 with the limit in the message. This cap only stops
 * absurd bodies from being buffered at all.
 */
const MULTER_OPTIONS = {
  storage: memoryStorage(),
  limits: {
    fileSize: 100 * 1024 * 1024,
  },
};

const UUID_V4 = new ParseUUIDPipe({ version: '4' });

/**
 * REST controller for extraction tasks.
 *
 * Routes:
 *   POST /uploadfile/               — Upload a PDF or image, start a job (202)
 *   GET  /api/tasks                 — List live jobs, newest first
 *   GET  /api/tasks/:id             — Job status and timing
 *   GET  /api/tasks/:id/result      — Markdown and tables of a SUCCESS job
 *   POST /tasks/:id/stop            — Stop a job
 *   GET  /download_markdown/:id     — Markdown as a file attachment
 *
 * Upload and download are rate limited per client.
 */
@Controller()
export class TasksController {
  private readonly logger = new Logger(TasksController.name);

  constructor(private readonly tasksService: TasksService) {}

  /**
   * Error responses:
   *   400 — No file attached, or an empty one
   *   413 — File exceeds MAX_UPLOAD_BYTES
   *   415 — Sniffed media type is not PDF or a supported image
   *   503 — Task store unavailable
   */
  @Post('uploadfile')
  @UseGuards(ThrottlerGuard)
  @UseInterceptors(FileInterceptor('file', MULTER_OPTIONS))
  @HttpCode(HttpStatus.ACCEPTED)
  async uploadFile(
    @UploadedFile() file: Express.Multer.File | undefined,
  ): Promise<UploadTaskResponseDto> {
    this.logger.log(
      `Upload request: file="${file?.originalname ?? 'none'}", size=${file?.size ?? 0}`,
    );
    return this.tasksService.upload(file);
  }

  @Get('api/tasks')
  listTasks(@Query() query: ListTasksQueryDto): Promise<TaskSummaryDto[]> {
    return this.tasksService.list(query);
  }

  @Get('api/tasks/:id')
  getTask(@Param('id', UUID_V4) id: string): Promise<TaskDetailDto> {
    return this.tasksService.detail(id);
  }

  /** 409 while PENDING/STARTED, 410 when revoked, 422 when failed. */
  @Get('api/tasks/:id/result')
  getTaskResult(@Param('id', UUID_V4) id: string): Promise<TaskResultDto> {
    return this.tasksService.result(id);
  }

  @Post('tasks/:id/stop')
  @HttpCode(HttpStatus.OK)
  stopTask(@Param('id', UUID_V4) id: string): Promise<StopTaskResponseDto> {
    return this.tasksService.stop(id);
  }

  @Get('download_markdown/:id')
  @UseGuards(ThrottlerGuard)
  async downloadMarkdown(@Param('id', UUID_V4) id: string): Promise<StreamableFile> {
    const { filename, markdown } = await this.tasksService.download(id);
    return new StreamableFile(Buffer.from(markdown, 'utf-8'), {
      type: 'text/markdown; charset=utf-8',
      disposition: `attachment; filename="${filename}"`,
    });
  }
}
