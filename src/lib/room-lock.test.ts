import { describe, expect, it } from 'vitest';
import { createRoomLock } from './room-lock';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('createRoomLock', () => {
  it('runs tasks for one room in submission order', async () => {
    const lock = createRoomLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run('board_a', async () => {
      await gate.promise;
      order.push('first');
    });
    const second = lock.run('board_a', () => {
      order.push('second');
    });

    gate.resolve();
    await Promise.all([first, second]);
    expect(order).toEqual(['first', 'second']);
  });

  it('does not hold other rooms behind a busy one', async () => {
    const lock = createRoomLock();
    const gate = deferred();
    const slow = lock.run('board_a', () => gate.promise);

    await expect(lock.run('board_b', () => 'done')).resolves.toBe('done');

    gate.resolve();
    await slow;
    await lock.drain();
    expect(lock.activeRooms()).toBe(0);
  });

  it('keeps the queue moving after a task fails', async () => {
    const lock = createRoomLock();
    const failed = lock.run('board_a', () => {
      throw new Error('boom');
    });
    const next = lock.run('board_a', () => 42);

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe(42);
  });

  it('drains every queued task', async () => {
    const lock = createRoomLock();
    const seen: number[] = [];
    void lock.run('board_a', async () => {
      seen.push(1);
    });
    void lock.run('group_lobby', async () => {
      seen.push(2);
    });

    await lock.drain();
    expect(seen).toEqual([1, 2]);
    expect(lock.activeRooms()).toBe(0);
  });
});
