/** Writing an upload to the sandbox failed. */
export class UploadStorageError extends Error {
  constructor(filename: string, cause: Error) {
    super(`Failed to store uploaded file "${filename}": ${cause.message}`, {
      cause,
    });
    this.name = 'UploadStorageError';
  }
}

/** A payload reference points outside the upload directory. */
export class PathOutsideSandboxError extends Error {
  constructor(readonly path: string) {
    super(`Refusing to touch ${path}: outside the upload directory`);
    this.name = 'PathOutsideSandboxError';
  }
}
