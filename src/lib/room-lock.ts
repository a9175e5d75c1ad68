import { logger } from './logger';

export interface RoomLock {
  /**
   * Run `task` once every task queued earlier for the same room has settled.
   * Tasks for different rooms do not wait on each other.
   */
  run<T>(roomKey: string, task: () => Promise<T> | T): Promise<T>;
  /** Number of rooms with a queued or running task. */
  activeRooms: () => number;
  /** Resolves when every queued task has settled. */
  drain: () => Promise<void>;
}

export function createRoomLock(): RoomLock {
  const tails = new Map<string, Promise<void>>();

  return {
    run<T>(roomKey: string, task: () => Promise<T> | T): Promise<T> {
      const previous = tails.get(roomKey) ?? Promise.resolve();
      const result = previous.then(() => task());
      // The queue only cares that the task settled; its outcome goes to the caller.
      const tail = result.then(
        () => undefined,
        () => undefined,
      );
      tails.set(roomKey, tail);
      void tail.then(() => {
        if (tails.get(roomKey) === tail) {
          tails.delete(roomKey);
          logger.debug('ROOM', `Room lock released for ${roomKey}`, { roomKey });
        }
      });
      return result;
    },
    activeRooms() {
      return tails.size;
    },
    async drain() {
      while (tails.size > 0) {
        await Promise.all(Array.from(tails.values()));
      }
    },
  };
}
