/**
 * Base error class for mailbox archive, upload and retention failures
 */
export class ArchiveError extends Error {
  public readonly code: string;
  public readonly originalError?: Error;

  constructor(code: string, message: string, originalError?: Error) {
    super(message);
    this.name = 'ArchiveError';
    this.code = code;
    this.originalError = originalError;

    Error.captureStackTrace?.(this, new.target);
  }
}

/**
 * A session with the mailbox or the share could not be established.
 * Fatal to the whole run.
 */
export class ConnectionError extends ArchiveError {
  public readonly target: 'mail' | 'nas';

  constructor(target: 'mail' | 'nas', message: string, originalError?: Error) {
    super('CONNECTION_FAILED', message, originalError);
    this.name = 'ConnectionError';
    this.target = target;
  }
}

/**
 * Selecting, searching or modifying one folder failed.
 * Fatal to that engine invocation only.
 */
export class FolderAccessError extends ArchiveError {
  public readonly folder: string;

  constructor(folder: string, message: string, originalError?: Error) {
    super('FOLDER_ACCESS_FAILED', message, originalError);
    this.name = 'FolderAccessError';
    this.folder = folder;
  }
}

/**
 * One message or one file failed; recorded and skipped.
 */
export class PerItemError extends ArchiveError {
  public readonly item: string;

  constructor(item: string, message: string, originalError?: Error) {
    super('ITEM_FAILED', message, originalError);
    this.name = 'PerItemError';
    this.item = item;
  }
}

/**
 * Missing credentials, unknown provider or malformed input.
 * Raised before any network activity.
 */
export class ConfigurationError extends ArchiveError {
  constructor(message: string, code: string = 'INVALID_CONFIGURATION') {
    super(code, message);
    this.name = 'ConfigurationError';
  }
}

export class InvalidFormatError extends ConfigurationError {
  public readonly input: string;

  constructor(input: string, message: string) {
    super(message, 'INVALID_FORMAT');
    this.name = 'InvalidFormatError';
    this.input = input;
  }
}

/**
 * Raised by share clients when a remote path does not exist
 */
export class RemoteNotFoundError extends ArchiveError {
  public readonly path: string;

  constructor(path: string, originalError?: Error) {
    super('REMOTE_NOT_FOUND', `No such file or directory: ${path}`, originalError);
    this.name = 'RemoteNotFoundError';
    this.path = path;
  }
}

/**
 * Normalise anything thrown by a library into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}

/**
 * Matches on shape so errors raised by Node's own fs bindings, which can
 * come from another realm under Jest, keep their plain message
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Technical error details for structured log entries
 */
export function formatErrorForLogs(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  const details: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };

  if (error instanceof ArchiveError) {
    details.code = error.code;
    if (error.originalError) {
      details.cause = formatErrorForLogs(error.originalError);
    }
  }

  return details;
}
