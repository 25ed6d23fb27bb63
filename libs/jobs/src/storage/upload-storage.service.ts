import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, readFile, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { isAbsolute, join, relative, resolve } from 'path';
import {
  PathOutsideSandboxError,
  UploadStorageError,
} from './upload-storage.errors';

/** Max length of the sanitized file name suffix */
const MAX_FILENAME_LENGTH = 100;

/**
 * UploadStorageService — owns the upload sandbox directory.
 *
 * Uploaded bytes are written once by the gateway, read by exactly one
 * worker and removed when the job reaches a terminal state. In grpc
 * dispatch mode UPLOAD_DIR must be a volume shared with the workers.
 *
 * File pattern:  {UPLOAD_DIR}/{jobId}-{sanitized-filename}
 * Example:       /tmp/docextract-uploads/f3a2b1c0-…-my_report.pdf
 */
@Injectable()
export class UploadStorageService implements OnModuleInit {
  private readonly logger = new Logger(UploadStorageService.name);
  readonly uploadDir: string;

  constructor(private readonly configService: ConfigService) {
    this.uploadDir = resolve(
      this.configService.get<string>(
        'UPLOAD_DIR',
        join(tmpdir(), 'docextract-uploads'),
      ),
    );
  }

  async onModuleInit(): Promise<void> {
    await mkdir(this.uploadDir, { recursive: true });
    this.logger.log(`Upload sandbox ready at ${this.uploadDir}`);
  }

  /**
   * Writes the bytes for a new job and returns the payload reference.
   *
   * @throws UploadStorageError on any filesystem error
   */
  async save(jobId: string, originalName: string, bytes: Buffer): Promise<string> {
    const path = join(this.uploadDir, `${jobId}-${this.sanitizeFilename(originalName)}`);

    try {
      await writeFile(path, bytes, { flag: 'wx' });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Failed to write ${path}: ${cause.message}`);
      throw new UploadStorageError(originalName, cause);
    }

    this.logger.debug(`Stored ${bytes.length} bytes for job ${jobId}`);
    return path;
  }

  /** @throws PathOutsideSandboxError, or the fs error (ENOENT when gone) */
  async read(path: string): Promise<Buffer> {
    this.assertInsideSandbox(path);
    return readFile(path);
  }

  /** Size in bytes, or null when the file no longer exists. */
  async size(path: string): Promise<number | null> {
    this.assertInsideSandbox(path);
    try {
      return (await stat(path)).size;
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }
  }

  /**
   * Deletes a payload. Missing files are fine; other failures are logged,
   * never thrown.
   */
  async remove(path: string): Promise<void> {
    if (!this.isInsideSandbox(path)) {
      this.logger.warn(`Not removing ${path}: outside the upload directory`);
      return;
    }

    try {
      await rm(path, { force: true });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Failed to remove ${path}: ${message}`);
    }
  }

  isInsideSandbox(path: string): boolean {
    const rel = relative(this.uploadDir, resolve(path));
    return rel !== '' && !rel.startsWith('..') && !isAbsolute(rel);
  }

  // ── Helpers ────────────────────────────────────────────────

  private assertInsideSandbox(path: string): void {
    if (!this.isInsideSandbox(path)) {
      throw new PathOutsideSandboxError(path);
    }
  }

  /**
   * Strips path separators and anything outside [a-zA-Z0-9._-], and
   * truncates to MAX_FILENAME_LENGTH characters.
   */
  private sanitizeFilename(filename: string): string {
    const sanitized = filename
      .replace(/[^a-zA-Z0-9._-]/g, '_')
      .slice(0, MAX_FILENAME_LENGTH)
      .toLowerCase();
    return sanitized.length > 0 ? sanitized : 'upload';
  }
}

/** fs errors can come from another realm, so `instanceof Error` is not relied on. */
export function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}
