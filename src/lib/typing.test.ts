import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BroadcastRouter, type RealtimeTransport } from './broadcast-router';
import { createRoomLock } from './room-lock';
import { directRoom } from './room-keys';
import { RoomRegistry } from './room-registry';
import { publishTyping, TypingSweeper } from './typing';

const ROOM = 'board_abc123';

function setup() {
  const sent: Array<{ connId: string; event: string; payload: unknown }> = [];
  const transport: RealtimeTransport = {
    deliver(connId, event, payload) {
      sent.push({ connId, event, payload });
    },
  };
  const registry = new RoomRegistry();
  const lock = createRoomLock();
  const router = new BroadcastRouter(registry, transport);
  const sweeper = new TypingSweeper({ registry, lock, router }, 6000);
  return { sent, registry, lock, router, sweeper };
}

describe('publishTyping', () => {
  it('uses the payload shape of each room kind', () => {
    const { sent, registry, router } = setup();
    for (const room of [ROOM, directRoom('uid-a', 'uid-b'), 'group_lobby']) {
      registry.join(room, 'c1', 'Zoe');
      registry.setTyping(room, 'c1', 'Zoe');
      publishTyping(router, registry, room);
    }

    expect(sent.map((entry) => [entry.event, entry.payload])).toEqual([
      ['typing', { code: 'abc123', authors: ['Zoe'] }],
      ['dm_typing', { authors: ['Zoe'] }],
      ['group_typing', ['Zoe']],
    ]);
  });
});

describe('TypingSweeper', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('clears a stale typing flag and tells the room', async () => {
    const { sent, registry, lock, sweeper } = setup();
    registry.join(ROOM, 'c1', 'Zoe');
    registry.join(ROOM, 'c2', 'Adam');
    const expiresAt = sweeper.expiryFromNow();
    registry.setTyping(ROOM, 'c1', 'Zoe', expiresAt);
    sweeper.schedule(ROOM, expiresAt);

    await vi.advanceTimersByTimeAsync(5999);
    await lock.drain();
    expect(sent).toEqual([]);

    await vi.advanceTimersByTimeAsync(1);
    await lock.drain();
    expect(registry.typingAuthors(ROOM)).toEqual([]);
    expect(sent).toEqual([
      { connId: 'c1', event: 'typing', payload: { code: 'abc123', authors: [] } },
      { connId: 'c2', event: 'typing', payload: { code: 'abc123', authors: [] } },
    ]);
    expect(sweeper.pendingRooms()).toBe(0);
  });

  it('waits for a refreshed flag', async () => {
    const { sent, registry, lock, sweeper } = setup();
    registry.join(ROOM, 'c1', 'Zoe');
    const first = sweeper.expiryFromNow();
    registry.setTyping(ROOM, 'c1', 'Zoe', first);
    sweeper.schedule(ROOM, first);

    await vi.advanceTimersByTimeAsync(3000);
    const refreshed = sweeper.expiryFromNow();
    registry.setTyping(ROOM, 'c1', 'Zoe', refreshed);
    sweeper.schedule(ROOM, refreshed);

    await vi.advanceTimersByTimeAsync(3000);
    await lock.drain();
    expect(sent).toEqual([]);
    expect(registry.typingAuthors(ROOM)).toEqual(['Zoe']);

    await vi.advanceTimersByTimeAsync(3000);
    await lock.drain();
    expect(sent).toEqual([{ connId: 'c1', event: 'typing', payload: { code: 'abc123', authors: [] } }]);
  });

  it('cancels pending sweeps on stop', () => {
    const { sweeper } = setup();
    sweeper.schedule(ROOM, sweeper.expiryFromNow());
    sweeper.schedule('group_lobby', sweeper.expiryFromNow());
    expect(sweeper.pendingRooms()).toBe(2);

    sweeper.stop();
    expect(sweeper.pendingRooms()).toBe(0);
  });
});
