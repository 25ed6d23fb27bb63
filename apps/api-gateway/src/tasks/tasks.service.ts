import { HttpException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { extname } from 'path';
import {
  DEFAULT_MAX_UPLOAD_BYTES,
  UploadRejectedError,
  UploadStorageError,
  UploadStorageService,
  assertAcceptableUpload,
} from '@docextract/jobs';
import {
  Job,
  JobNotFoundError,
  JobResult,
  JobStatus,
  TaskStore,
  TaskStoreUnavailableError,
  isTerminal,
} from '@docextract/task-store';
import { JobDispatcher } from '../dispatch/job-dispatcher';
import { JobDispatchError } from '../dispatch/job-dispatch.errors';
import { ListTasksQueryDto } from './dto/list-tasks-query.dto';
import { StopTaskResponseDto } from './dto/stop-task-response.dto';
import { TaskResultDto } from './dto/task-result.dto';
import { TaskDetailDto, TaskSummaryDto } from './dto/task-summary.dto';
import { UploadTaskResponseDto } from './dto/upload-task-response.dto';
import {
  FileTooLargeException,
  MissingFileException,
  ServiceUnavailableException,
  TaskFailedException,
  TaskNotFoundException,
  TaskNotReadyException,
  TaskRevokedException,
  UnsupportedMediaTypeException,
  UploadPersistenceException,
} from './exceptions/task.exceptions';

/** Download name used when the original filename has no usable stem */
const FALLBACK_DOWNLOAD_STEM = 'extracted_data';

export interface MarkdownDownload {
  filename: string;
  markdown: string;
}

/**
 * TasksService — upload, polling, stop and download.
 *
 * Upload happy path:
 *   1. Validate the bytes (presence, size, sniffed media type)
 *   2. Write them to the upload sandbox
 *   3. Record a PENDING job in the task store
 *   4. Hand the payload reference to the job dispatcher (non-fatal if it fails)
 *   5. Return 202 with the task id
 *
 * Failure invariants:
 *   - Validation failure → 400/413/415, nothing stored
 *   - Sandbox write failure → 500, no job recorded
 *   - Task store failure → 503, the written file is removed again
 *   - Dispatch failure → job stays PENDING; recovery re-dispatches it
 */
@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name);
  private readonly maxUploadBytes: number;

  constructor(
    private readonly taskStore: TaskStore,
    private readonly storage: UploadStorageService,
    private readonly dispatcher: JobDispatcher,
    private readonly configService: ConfigService,
  ) {
    this.maxUploadBytes = this.configService.get<number>(
      'MAX_UPLOAD_BYTES',
      DEFAULT_MAX_UPLOAD_BYTES,
    );
  }

  async upload(file: Express.Multer.File | undefined): Promise<UploadTaskResponseDto> {
    // ── Step 1: Validate ───────────────────────────────────
    if (!file || !file.buffer) {
      throw new MissingFileException();
    }
    const mediaType = await this.validateUpload(file.buffer);

    // ── Step 2: Store bytes ────────────────────────────────
    const jobId = randomUUID();
    let storagePath: string;
    try {
      storagePath = await this.storage.save(jobId, file.originalname, file.buffer);
    } catch (error) {
      if (error instanceof UploadStorageError) {
        throw new UploadPersistenceException(error);
      }
      throw error;
    }

    // ── Step 3: Record the job ─────────────────────────────
    try {
      await this.taskStore.create({
        id: jobId,
        sourceName: file.originalname,
        mediaType,
        sizeBytes: file.buffer.length,
        storagePath,
      });
    } catch (error) {
      await this.storage.remove(storagePath);
      throw this.toHttpException(error, jobId);
    }

    // ── Step 4: Dispatch ───────────────────────────────────
    try {
      await this.dispatcher.submit({ jobId, storagePath, mediaType });
      this.logger.log(
        `Accepted job ${jobId}: "${file.originalname}" (${mediaType}, ${file.buffer.length} bytes)`,
      );
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.warn(
        `Dispatch failed for job ${jobId}: ${cause.message}. ` +
          `Job saved as PENDING, recovery will retry.`,
      );
    }

    return { task_id: jobId, status: JobStatus.PENDING };
  }

  async list(query: ListTasksQueryDto): Promise<TaskSummaryDto[]> {
    const jobs = await this.withStore(() => this.taskStore.listAll());
    const filtered = query.status
      ? jobs.filter((job) => job.status === query.status)
      : jobs;
    const limited = query.limit ? filtered.slice(0, query.limit) : filtered;
    return limited.map((job) => TaskSummaryDto.fromJob(job));
  }

  async detail(taskId: string): Promise<TaskDetailDto> {
    return TaskDetailDto.fromJob(await this.findJob(taskId));
  }

  async result(taskId: string): Promise<TaskResultDto> {
    const job = await this.findJob(taskId);
    const { markdown, tables } = this.requireResult(job);
    return { task_id: job.id, markdown, tables };
  }

  async download(taskId: string): Promise<MarkdownDownload> {
    const job = await this.findJob(taskId);
    const { markdown } = this.requireResult(job);
    return { filename: `${downloadStem(job.sourceName)}.md`, markdown };
  }

  /**
   * Stops a job. PENDING jobs are revoked at once; a running job finishes
   * as REVOKED at its next safe point. Terminal jobs are left untouched.
   */
  async stop(taskId: string): Promise<StopTaskResponseDto> {
    const job = await this.findJob(taskId);
    if (isTerminal(job.status)) {
      return {
        message: `Task ${taskId} already finished with status ${job.status}`,
        status: job.status,
      };
    }

    try {
      await this.dispatcher.cancel(taskId);
    } catch (error) {
      throw this.toHttpException(error, taskId);
    }

    const after = await this.findJob(taskId);
    if (after.status === JobStatus.REVOKED) {
      this.logger.log(`Job ${taskId} revoked on request`);
      return { message: `Task ${taskId} stopped`, status: after.status };
    }
    if (isTerminal(after.status)) {
      return {
        message: `Task ${taskId} already finished with status ${after.status}`,
        status: after.status,
      };
    }

    this.logger.log(`Stop requested for running job ${taskId}`);
    return {
      message: `Stop requested for task ${taskId}; it will end at its next checkpoint`,
      status: after.status,
    };
  }

  // ── Private methods ──────────────────────────────────────

  private async validateUpload(bytes: Buffer): Promise<string> {
    try {
      return await assertAcceptableUpload(bytes, this.maxUploadBytes);
    } catch (error) {
      if (!(error instanceof UploadRejectedError)) throw error;
      if (error.reason === 'empty') throw new MissingFileException(error.message);
      if (error.reason === 'too_large') throw new FileTooLargeException(error.message);
      throw new UnsupportedMediaTypeException(error.message);
    }
  }

  private async findJob(taskId: string): Promise<Job> {
    const job = await this.withStore(() => this.taskStore.get(taskId));
    if (!job) {
      throw new TaskNotFoundException(taskId);
    }
    return job;
  }

  /** Maps a non-SUCCESS job to 409/410/422. */
  private requireResult(job: Job): JobResult {
    switch (job.status) {
      case JobStatus.SUCCESS:
        if (job.result) return job.result;
        break;
      case JobStatus.FAILURE:
        throw new TaskFailedException(job.error ?? 'Extraction failed');
      case JobStatus.REVOKED:
        throw new TaskRevokedException(job.id);
    }
    throw new TaskNotReadyException(job.id, job.status);
  }

  private async withStore<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw this.toHttpException(error);
    }
  }

  /** Domain errors to HTTP; anything else is rethrown as is. */
  private toHttpException(error: unknown, taskId?: string): unknown {
    if (error instanceof HttpException) {
      return error;
    }
    if (error instanceof JobNotFoundError) {
      return new TaskNotFoundException(taskId ?? error.jobId);
    }
    if (error instanceof TaskStoreUnavailableError) {
      this.logger.error(error.message);
      return new ServiceUnavailableException('Task store is unavailable', error);
    }
    if (error instanceof JobDispatchError) {
      return new ServiceUnavailableException('Job workers are unavailable', error);
    }
    return error;
  }
}

/** Original filename without extension, reduced to header-safe characters. */
export function downloadStem(sourceName: string): string {
  const stem = sourceName
    .slice(0, sourceName.length - extname(sourceName).length)
    .replace(/[^a-zA-Z0-9._-]/g, '_')
    .replace(/^[._]+/, '');
  return stem.length > 0 ? stem : FALLBACK_DOWNLOAD_STEM;
}
