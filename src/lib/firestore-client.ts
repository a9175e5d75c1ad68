import { logger } from './logger';
import { StorageError } from './errors';

export const FIRESTORE_REQUEST_TIMEOUT_MS = 12000;

/**
 * Race a Firestore call against a timer. A timeout or a rejected call both
 * surface as `StorageError`, which handlers report to the acting connection.
 */
export async function withFirestoreTimeout<T>(
  operationLabel: string,
  promise: Promise<T>,
  timeoutMs = FIRESTORE_REQUEST_TIMEOUT_MS,
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        logger.error('STORAGE', `Firestore operation timed out after ${timeoutMs}ms: ${operationLabel}`, {
          operationLabel,
          timeoutMs,
        });
        reject(new StorageError(operationLabel, `${operationLabel} timed out`));
      }, timeoutMs);
    });
    return await Promise.race([promise, timeoutPromise]);
  } catch (err) {
    if (err instanceof StorageError) {
      throw err;
    }
    logger.error('STORAGE', `Firestore operation failed: ${operationLabel}: ${err instanceof Error ? err.message : 'Unknown error'}`, {
      operationLabel,
      code: firestoreErrorCode(err),
    });
    throw new StorageError(operationLabel, toFirestoreUserMessage(`${operationLabel} failed.`, err));
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

function firestoreErrorCode(err: unknown): string | null {
  if (err && typeof err === 'object' && 'code' in err) {
    const { code } = err;
    if (typeof code === 'string' || typeof code === 'number') {
      return String(code);
    }
  }
  return null;
}

export function toFirestoreUserMessage(fallback: string, err: unknown): string {
  const code = firestoreErrorCode(err);
  const message = err instanceof Error ? err.message.toLowerCase() : '';

  if (code === 'permission-denied' || code === '7') {
    return `${fallback} Permission denied for the service account.`;
  }

  if (
    code === 'unavailable' ||
    code === 'deadline-exceeded' ||
    code === '14' ||
    code === '4' ||
    message.includes('timed out')
  ) {
    return `${fallback} Storage is temporarily unavailable.`;
  }

  return fallback;
}
