/**
 * Error types and helpers
 */

export type StorageErrorCode = 'READ_FAILED' | 'WRITE_FAILED';

export class StorageError extends Error {
  readonly code: StorageErrorCode;
  readonly path: string;

  constructor(code: StorageErrorCode, path: string, cause: unknown) {
    const action = code === 'READ_FAILED' ? 'read' : 'write';
    super(`Failed to ${action} calendar file ${path}: ${errorMessage(cause)}`, { cause });
    this.name = 'StorageError';
    this.code = code;
    this.path = path;
  }
}

export class EventValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EventValidationError';
  }
}

export class EventNotFoundError extends Error {
  readonly eventId: string;

  constructor(eventId: string) {
    super(`Event with ID '${eventId}' not found`);
    this.name = 'EventNotFoundError';
    this.eventId = eventId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
