export type RealtimeErrorCode = 'validation' | 'not_found' | 'forbidden' | 'storage';

/**
 * Base class for failures that are reported back to the acting connection
 * only. None of these are ever broadcast to a room.
 */
export class RealtimeError extends Error {
  readonly code: RealtimeErrorCode;

  constructor(code: RealtimeErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends RealtimeError {
  constructor(message: string) {
    super('validation', message);
  }
}

export class NotFoundError extends RealtimeError {
  constructor(message: string) {
    super('not_found', message);
  }
}

export class AuthorizationError extends RealtimeError {
  constructor(message = 'no permission') {
    super('forbidden', message);
  }
}

export class StorageError extends RealtimeError {
  readonly operation: string;

  constructor(operation: string, message = 'storage unavailable') {
    super('storage', message);
    this.operation = operation;
  }
}

export function isRealtimeError(err: unknown): err is RealtimeError {
  return err instanceof RealtimeError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}
