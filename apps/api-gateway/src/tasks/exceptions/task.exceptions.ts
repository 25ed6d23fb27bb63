import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * HTTP exceptions for the tasks feature. Every body has the shape
 * `{ statusCode, error, message }`.
 */

/** 400: no file in the "file" multipart field, or an empty one. */
export class MissingFileException extends HttpException {
  constructor(message = 'A file must be attached to the "file" multipart field') {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        message,
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/** 413: upload above MAX_UPLOAD_BYTES. */
export class FileTooLargeException extends HttpException {
  constructor(message: string) {
    super(
      {
        statusCode: HttpStatus.PAYLOAD_TOO_LARGE,
        error: 'Payload Too Large',
        message,
      },
      HttpStatus.PAYLOAD_TOO_LARGE,
    );
  }
}

/** 415: sniffed media type is not on the allowlist. */
export class UnsupportedMediaTypeException extends HttpException {
  constructor(message: string) {
    super(
      {
        statusCode: HttpStatus.UNSUPPORTED_MEDIA_TYPE,
        error: 'Unsupported Media Type',
        message,
      },
      HttpStatus.UNSUPPORTED_MEDIA_TYPE,
    );
  }
}

export class TaskNotFoundException extends HttpException {
  constructor(taskId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `Task ${taskId} not found or expired`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}

/** 409: result requested while the job is PENDING or STARTED. */
export class TaskNotReadyException extends HttpException {
  constructor(taskId: string, status: string) {
    super(
      {
        statusCode: HttpStatus.CONFLICT,
        error: 'Conflict',
        message: `Task ${taskId} is not finished yet (status: ${status})`,
      },
      HttpStatus.CONFLICT,
    );
  }
}

/** 410: the job was stopped, there will never be a result. */
export class TaskRevokedException extends HttpException {
  constructor(taskId: string) {
    super(
      {
        statusCode: HttpStatus.GONE,
        error: 'Gone',
        message: `Task ${taskId} was stopped before it produced a result`,
      },
      HttpStatus.GONE,
    );
  }
}

/** 422: the job failed; the message is the job's own error. */
export class TaskFailedException extends HttpException {
  constructor(reason: string) {
    super(
      {
        statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
        error: 'Unprocessable Entity',
        message: reason,
      },
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
  }
}

/**
 * Thrown when the upload could not be written to the sandbox.
 * Wraps filesystem errors without leaking paths.
 */
export class UploadPersistenceException extends HttpException {
  constructor(cause: Error) {
    super(
      {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'Internal Server Error',
        message: 'Failed to store the uploaded file. Please try again.',
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
      { cause },
    );
  }
}

/** 503: the task store or the worker pool cannot be reached. */
export class ServiceUnavailableException extends HttpException {
  constructor(message: string, cause: Error) {
    super(
      {
        statusCode: HttpStatus.SERVICE_UNAVAILABLE,
        error: 'Service Unavailable',
        message,
      },
      HttpStatus.SERVICE_UNAVAILABLE,
      { cause },
    );
  }
}
