import { describe, expect, it } from 'vitest';
import { ALICE, BOB, createHarness, identityOf } from '../realtime/test-utils';
import { boardRoom, directRoom } from './room-keys';

describe('SessionManager', () => {
  it('tracks how many connections each user has open', async () => {
    const { services, connect, disconnect } = createHarness();
    connect('c1', ALICE);
    connect('c2', ALICE);
    connect('g1', null, 'Robin');

    expect(services.sessions.connectionsOf(ALICE.id)).toEqual(['c1', 'c2']);
    expect(services.sessions.isOnline(ALICE.id)).toBe(true);
    expect(services.sessions.guestNameOf('g1')).toBe('Robin');
    expect(services.sessions.connectionCount()).toBe(3);

    await disconnect('c1');
    expect(services.sessions.isOnline(ALICE.id)).toBe(true);
    await disconnect('c2');
    expect(services.sessions.isOnline(ALICE.id)).toBe(false);
  });

  it('ignores a disconnect for an unknown connection', async () => {
    const { services, disconnect } = createHarness();
    await expect(disconnect('nobody')).resolves.toBeUndefined();
    expect(services.sessions.connectionCount()).toBe(0);
  });

  it('removes a closed connection from every room and updates presence', async () => {
    const { storage, services, transport, connect, disconnect } = createHarness();
    const board = await storage.createBoard({ code: 'abc123', ownerId: null, template: null });
    const room = boardRoom('abc123');
    const dm = directRoom(ALICE.id, BOB.id);
    connect('c1', ALICE);
    connect('c2', BOB);
    services.registry.join(room, 'c1', 'Alice');
    services.registry.join(room, 'c2', 'Bob');
    services.registry.join(dm, 'c1', 'alice');
    services.registry.join(dm, 'c2', 'bob');
    services.registry.setTyping(dm, 'c1', 'alice');

    await disconnect('c1');

    expect(services.registry.roomsOf('c1')).toEqual([]);
    expect(transport.last('c2', 'presence')).toEqual({ count: 1, names: ['Bob'] });
    expect(transport.last('c2', 'dm_typing')).toEqual({ authors: [] });
    expect(transport.eventsFor('c1')).toEqual([]);
    const history = await storage.listPresenceHistory(board.id, 5);
    expect(history[0]).toMatchObject({ userId: ALICE.id, action: 'leave' });
  });

  it('reports whether a leave removed anything', async () => {
    const { services, connect } = createHarness();
    connect('c1', ALICE);
    services.registry.join('group_lobby', 'c1', 'alice');

    expect(await services.sessions.leaveRoom('group_lobby', 'c1', identityOf(ALICE))).toBe(true);
    expect(await services.sessions.leaveRoom('group_lobby', 'c1', identityOf(ALICE))).toBe(false);
  });
});
