import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  InvalidTransitionError,
  Job,
  JobNotFoundError,
  JobResult,
  JobStatus,
  TaskStore,
  TerminalUpdate,
  isTerminal,
} from '@docextract/task-store';
import {
  ExtractionFailure,
  ExtractionProvider,
} from '../extraction/extraction-provider';
import { renderMarkdown } from '../markdown/render-markdown';
import {
  DEFAULT_MAX_UPLOAD_BYTES,
  checkUploadSize,
  isAllowedMediaType,
} from '../policy/upload-policy';
import { ExtractionJobPayload } from '../queue/job-payload';
import { UploadStorageService, isMissingFile } from '../storage/upload-storage.service';
import { runWithDeadline } from './deadline';
import { ExtractionTimeoutError, JobCancelledError } from './job-errors';

export const DEFAULT_EXTRACTION_TIMEOUT_MS = 120_000;

const UNEXPECTED_ERROR_MESSAGE = 'Unexpected error during extraction';
const MISSING_FILE_MESSAGE = 'The uploaded file is no longer available';

/**
 * ExtractionWorkerService — runs one job from claim to terminal state.
 *
 * Lifecycle of an attempt:
 *   1. Claim: PENDING → STARTED compare-and-set. Losing the race means
 *      another worker owns the job; this attempt leaves it alone.
 *   2. Validate the stored file against the upload policy.
 *   3. Call the ExtractionProvider under EXTRACTION_TIMEOUT_MS.
 *   4. Safe point: a stop request seen here turns the outcome into REVOKED.
 *   5. Render Markdown.
 *   6. Delete the temp file, then write exactly one terminal status.
 *
 * Cancellation is cooperative. The token is checked before the claim and
 * at the safe point; it never interrupts the provider call in flight.
 */
@Injectable()
export class ExtractionWorkerService {
  private readonly logger = new Logger(ExtractionWorkerService.name);
  private readonly timeoutMs: number;
  private readonly maxUploadBytes: number;

  constructor(
    private readonly taskStore: TaskStore,
    private readonly storage: UploadStorageService,
    private readonly provider: ExtractionProvider,
    configService: ConfigService,
  ) {
    this.timeoutMs = configService.get<number>(
      'EXTRACTION_TIMEOUT_MS',
      DEFAULT_EXTRACTION_TIMEOUT_MS,
    );
    this.maxUploadBytes = configService.get<number>(
      'MAX_UPLOAD_BYTES',
      DEFAULT_MAX_UPLOAD_BYTES,
    );
  }

  /**
   * Processes one payload. Never throws: every outcome ends up in the
   * task store, or is logged when the store itself cannot be reached.
   */
  async process(payload: ExtractionJobPayload, signal: AbortSignal): Promise<void> {
    let job: Job | null;
    try {
      job = await this.claim(payload, signal);
    } catch (error) {
      // Left PENDING; recovery re-dispatches it.
      this.logger.error(
        `Could not claim job ${payload.jobId}: ${errorMessage(error)}`,
      );
      return;
    }
    if (!job) return;

    this.logger.log(`Job ${job.id} started ("${job.sourceName}", ${job.mediaType})`);
    const startedAt = Date.now();

    let outcome: TerminalUpdate;
    try {
      outcome = await this.extract(job, signal);
    } catch (error) {
      outcome = this.classify(job.id, error);
    }

    await this.finish(job.id, job.storagePath, outcome, signal);
    this.logger.log(`Job ${job.id} finished in ${Date.now() - startedAt} ms`);
  }

  // ── Steps ────────────────────────────────────────────────

  /** Returns the STARTED job, or null when this attempt must not run it. */
  private async claim(
    payload: ExtractionJobPayload,
    signal: AbortSignal,
  ): Promise<Job | null> {
    const job = await this.taskStore.get(payload.jobId);

    if (!job) {
      this.logger.warn(`Job ${payload.jobId} vanished before it started`);
      await this.storage.remove(payload.storagePath);
      return null;
    }
    if (isTerminal(job.status)) {
      this.logger.debug(`Job ${job.id} is already ${job.status}, skipping`);
      await this.storage.remove(job.storagePath);
      return null;
    }
    if (job.status === JobStatus.STARTED) {
      this.logger.debug(`Job ${job.id} is owned by another worker, skipping`);
      return null;
    }
    if (signal.aborted || job.cancelRequested) {
      await this.finish(job.id, job.storagePath, { status: JobStatus.REVOKED }, signal);
      return null;
    }

    try {
      return await this.taskStore.updateStatus(job.id, { status: JobStatus.STARTED });
    } catch (error) {
      if (error instanceof InvalidTransitionError) {
        // Someone moved it off PENDING first; the re-read settles who.
        return this.claim(payload, signal);
      }
      throw error;
    }
  }

  private async extract(job: Job, signal: AbortSignal): Promise<TerminalUpdate> {
    if (signal.aborted) {
      this.logger.log(`Job ${job.id} was stopped as it started, skipping extraction`);
      return { status: JobStatus.REVOKED };
    }
    const bytes = await this.loadWithinPolicy(job);

    const output = await runWithDeadline(
      (deadline) =>
        this.provider.extract(
          { bytes, mediaType: job.mediaType, sourceName: job.sourceName },
          deadline,
        ),
      this.timeoutMs,
    );

    if (await this.cancellationRequested(job.id, signal)) {
      this.logger.log(`Job ${job.id} was stopped during extraction, discarding result`);
      return { status: JobStatus.REVOKED };
    }

    const result: JobResult = renderMarkdown(output.pages);
    if (result.markdown.length === 0) {
      throw new ExtractionFailure('empty', 'No text or tables were found in the document');
    }
    return { status: JobStatus.SUCCESS, result };
  }

  private async loadWithinPolicy(job: Job): Promise<Buffer> {
    if (!this.storage.isInsideSandbox(job.storagePath)) {
      throw new ExtractionFailure('unsupported', 'Invalid upload reference');
    }
    if (!isAllowedMediaType(job.mediaType)) {
      throw new ExtractionFailure(
        'unsupported',
        `Unsupported file type: ${job.mediaType}`,
      );
    }

    let bytes: Buffer;
    try {
      bytes = await this.storage.read(job.storagePath);
    } catch (error) {
      if (isMissingFile(error)) {
        throw new ExtractionFailure('missing_file', MISSING_FILE_MESSAGE, { cause: error });
      }
      throw error;
    }

    const sizeProblem = checkUploadSize(bytes.length, this.maxUploadBytes);
    if (sizeProblem) {
      throw new ExtractionFailure('unsupported', sizeProblem.message);
    }
    return bytes;
  }

  private async cancellationRequested(jobId: string, signal: AbortSignal): Promise<boolean> {
    if (signal.aborted) return true;
    const current = await this.taskStore.get(jobId);
    return current === null || current.cancelRequested || current.status === JobStatus.REVOKED;
  }

  /**
   * Deletes the payload, then records the outcome. A stop request observed
   * at any point before the write wins over the computed outcome.
   */
  private async finish(
    jobId: string,
    storagePath: string,
    outcome: TerminalUpdate,
    signal: AbortSignal,
  ): Promise<void> {
    await this.storage.remove(storagePath);
    const update: TerminalUpdate = signal.aborted ? { status: JobStatus.REVOKED } : outcome;

    try {
      await this.taskStore.updateStatus(jobId, update);
      if (update.status === JobStatus.FAILURE) {
        this.logger.warn(`Job ${jobId} failed: ${update.error}`);
      } else {
        this.logger.log(`Job ${jobId} → ${update.status}`);
      }
    } catch (error) {
      if (error instanceof InvalidTransitionError || error instanceof JobNotFoundError) {
        this.logger.debug(`Job ${jobId} outcome ${update.status} not recorded: ${error.message}`);
        return;
      }
      // Stays STARTED; recovery fails it once it is stale.
      this.logger.error(`Could not record ${update.status} for job ${jobId}: ${errorMessage(error)}`);
    }
  }

  private classify(jobId: string, error: unknown): TerminalUpdate {
    if (error instanceof JobCancelledError) {
      return { status: JobStatus.REVOKED };
    }
    if (error instanceof ExtractionTimeoutError) {
      return { status: JobStatus.FAILURE, error: error.message };
    }
    if (error instanceof ExtractionFailure) {
      const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
      this.logger.warn(`Job ${jobId} extraction failed (${error.reason})${cause}`);
      return { status: JobStatus.FAILURE, error: error.message };
    }

    this.logger.error(
      `Job ${jobId} hit an unexpected error`,
      error instanceof Error ? error.stack : String(error),
    );
    return { status: JobStatus.FAILURE, error: UNEXPECTED_ERROR_MESSAGE };
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
