import { describe, expect, it, vi } from 'vitest';
import { StorageError } from './errors';
import { toFirestoreUserMessage, withFirestoreTimeout } from './firestore-client';

describe('withFirestoreTimeout', () => {
  it('resolves when the promise resolves before timeout', async () => {
    const result = await withFirestoreTimeout('test', Promise.resolve('ok'), 1000);
    expect(result).toBe('ok');
  });

  it('rejects with a StorageError when the promise is slower than the timeout', async () => {
    const slow = new Promise<never>(() => {});

    const failure = withFirestoreTimeout('listCards', slow, 10);

    await expect(failure).rejects.toBeInstanceOf(StorageError);
    await expect(failure).rejects.toThrow('listCards timed out');
  });

  it('wraps a rejected call and keeps the operation label', async () => {
    const failing = Promise.reject(new Error('socket hang up'));

    await expect(withFirestoreTimeout('insertCard', failing, 5000)).rejects.toMatchObject({
      name: 'StorageError',
      code: 'storage',
      operation: 'insertCard',
      message: 'insertCard failed.',
    });
  });

  it('clears the timeout after the promise resolves', async () => {
    const clearSpy = vi.spyOn(globalThis, 'clearTimeout');

    await withFirestoreTimeout('test', Promise.resolve(42), 5000);

    expect(clearSpy).toHaveBeenCalled();
  });

  it('uses the default timeout when none is provided', async () => {
    const result = await withFirestoreTimeout('test', Promise.resolve('fast'));
    expect(result).toBe('fast');
  });
});

describe('toFirestoreUserMessage', () => {
  it('returns permission-denied message for permission errors', () => {
    expect(toFirestoreUserMessage('Could not load board.', { code: 'permission-denied' })).toBe(
      'Could not load board. Permission denied for the service account.',
    );
  });

  it('flags unavailable errors as temporary', () => {
    expect(toFirestoreUserMessage('Could not save.', { code: 'unavailable' })).toBe(
      'Could not save. Storage is temporarily unavailable.',
    );
  });

  it('maps numeric gRPC deadline codes', () => {
    expect(toFirestoreUserMessage('Could not save.', { code: 4 })).toBe(
      'Could not save. Storage is temporarily unavailable.',
    );
  });

  it('returns the fallback for unknown errors', () => {
    expect(toFirestoreUserMessage('Could not save.', new Error('boom'))).toBe('Could not save.');
  });
});
