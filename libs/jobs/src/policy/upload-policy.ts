import { fromBuffer } from 'file-type';

/** Media types the extraction provider accepts. */
export const ALLOWED_MEDIA_TYPES: readonly string[] = [
  'application/pdf',
  'image/png',
  'image/jpeg',
  'image/webp',
  'image/gif',
];

/** 10 MiB */
export const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

export type UploadRejectionReason = 'empty' | 'too_large' | 'unsupported';

/** An upload that must be refused before any job is created. */
export class UploadRejectedError extends Error {
  constructor(
    readonly reason: UploadRejectionReason,
    message: string,
  ) {
    super(message);
    this.name = 'UploadRejectedError';
  }
}

export function isAllowedMediaType(mediaType: string): boolean {
  return ALLOWED_MEDIA_TYPES.includes(mediaType);
}

/**
 * Size checks shared by the gateway (on the upload) and the worker (on the
 * stored file). Returns the rejection, or null when the size is fine.
 */
export function checkUploadSize(
  sizeBytes: number,
  maxBytes: number,
): UploadRejectedError | null {
  if (sizeBytes === 0) {
    return new UploadRejectedError('empty', 'Empty file uploaded');
  }
  if (sizeBytes > maxBytes) {
    return new UploadRejectedError(
      'too_large',
      `File size ${sizeBytes} exceeds maximum allowed size of ${maxBytes} bytes`,
    );
  }
  return null;
}

/** Media type from the file's magic bytes, or null when unrecognised. */
export async function sniffMediaType(bytes: Buffer): Promise<string | null> {
  const detected = await fromBuffer(bytes);
  return detected?.mime ?? null;
}

/**
 * Validates an upload and returns its sniffed media type. The client's
 * declared Content-Type is never consulted.
 *
 * @throws UploadRejectedError
 */
export async function assertAcceptableUpload(
  bytes: Buffer,
  maxBytes: number,
): Promise<string> {
  const sizeProblem = checkUploadSize(bytes.length, maxBytes);
  if (sizeProblem) {
    throw sizeProblem;
  }

  const mediaType = await sniffMediaType(bytes);
  if (!mediaType || !isAllowedMediaType(mediaType)) {
    throw new UploadRejectedError(
      'unsupported',
      `Unsupported file type: ${mediaType ?? 'unknown'}. Supported types: ${ALLOWED_MEDIA_TYPES.join(', ')}`,
    );
  }
  return mediaType;
}
