/**
 * Reader Errors
 *
 * Typed error hierarchy for the Markdown reader. Every error carries an
 * {@link ErrorCode} so callers can branch on the failure kind without
 * matching on messages.
 *
 * @since 2026-10-18
 */

export enum ErrorCode {
  // File errors (1xxx)
  FILE_NOT_FOUND = 1000,
  FILE_INVALID_TYPE = 1001,
  FILE_READ_ERROR = 1002,

  // Content errors (2xxx)
  NO_CONTENT = 2000,
}

/**
 * Base class for every error thrown by the reader
 */
export class MarkdownReaderError extends Error {
  public readonly code: ErrorCode;
  public readonly filePath?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      filePath?: string;
      cause?: unknown;
    }
  ) {
    super(message);
    this.name = 'MarkdownReaderError';
    this.code = code;
    this.filePath = options?.filePath;

    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * The path given to a file load does not exist
 */
export class NotFoundError extends MarkdownReaderError {
  constructor(filePath: string) {
    super(ErrorCode.FILE_NOT_FOUND, `File not found: ${filePath}`, { filePath });
    this.name = 'NotFoundError';
  }
}

/**
 * The path exists but is not a regular file (directory, socket, ...)
 */
export class InvalidInputError extends MarkdownReaderError {
  constructor(filePath: string) {
    super(ErrorCode.FILE_INVALID_TYPE, `Path is not a file: ${filePath}`, { filePath });
    this.name = 'InvalidInputError';
  }
}

export class FileReadError extends MarkdownReaderError {
  constructor(filePath: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(ErrorCode.FILE_READ_ERROR, `Failed to read Markdown file ${filePath}: ${reason}`, {
      filePath,
      cause,
    });
    this.name = 'FileReadError';
  }
}

/**
 * An operation needing content was called before anything was loaded
 */
export class NoContentError extends MarkdownReaderError {
  constructor() {
    super(
      ErrorCode.NO_CONTENT,
      'No content to parse. Call loadFromFile() or loadFromString() first.'
    );
    this.name = 'NoContentError';
  }
}

export function isMarkdownReaderError(error: unknown): error is MarkdownReaderError {
  return error instanceof MarkdownReaderError;
}
