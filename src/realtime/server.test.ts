import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { io as connectClient, type Socket } from 'socket.io-client';
import { MemoryStorage } from '../lib/memory-storage';
import { createRealtimeServer, type RealtimeServer } from './server';
import { ALICE, BOB } from './test-utils';

const TOKENS: Record<string, string> = {
  'test-token-alice': ALICE.id,
  'test-token-bob': BOB.id,
};

function nextEvent(socket: Socket, event: string): Promise<unknown> {
  return new Promise((resolve) => {
    socket.once(event, (payload: unknown) => resolve(payload));
  });
}

describe('realtime server', () => {
  let server: RealtimeServer;
  let url: string;
  const clients: Socket[] = [];

  function connect(auth: Record<string, unknown>): Socket {
    const socket = connectClient(url, { auth, transports: ['websocket'], forceNew: true, reconnection: false });
    clients.push(socket);
    return socket;
  }

  async function connected(auth: Record<string, unknown>): Promise<Socket> {
    const socket = connect(auth);
    await nextEvent(socket, 'connect');
    return socket;
  }

  beforeEach(async () => {
    const storage = new MemoryStorage({ users: [ALICE, BOB] });
    await storage.createBoard({ code: 'abc123', ownerId: ALICE.id, template: null });
    server = createRealtimeServer({
      config: { corsOrigin: '*', filesBaseUrl: '/u/files', voiceBaseUrl: '/u/voices', typingTimeoutMs: 6000 },
      storage,
      verifyToken: async (token) => {
        const uid = TOKENS[token];
        if (!uid) {
          throw new Error('invalid token');
        }
        return { uid, name: null, email: null };
      },
    });
    const port = await server.listen(0, '127.0.0.1');
    url = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    for (const socket of clients.splice(0)) {
      socket.disconnect();
    }
    await server.close();
  });

  it('refuses a handshake without a token or guest flag', async () => {
    const socket = connect({});
    const error = await nextEvent(socket, 'connect_error');
    expect(error).toBeInstanceOf(Error);
    expect(error instanceof Error ? error.message : '').toBe('Authentication failed');
  });

  it('sends the snapshot and fans out card events', async () => {
    const alice = await connected({ token: 'test-token-alice' });
    const bob = await connected({ token: 'test-token-bob' });

    const aliceState = nextEvent(alice, 'board_state');
    await alice.emitWithAck('join_board', { code: 'abc123' });
    expect(await aliceState).toMatchObject({ role: 'owner', cards: [] });

    const bobState = nextEvent(bob, 'board_state');
    const alicePresence = nextEvent(alice, 'presence');
    await bob.emitWithAck('join_board', { code: 'abc123' });
    expect(await bobState).toMatchObject({ role: 'member' });
    expect(await alicePresence).toEqual({ count: 2, names: ['Alice', 'Bob'] });

    const cardAdded = nextEvent(bob, 'card_added');
    const ack = await alice.emitWithAck('create_card', { code: 'abc123', text: 'Ship it', author: 'Alice' });
    expect(ack).toEqual({ ok: true });
    expect(await cardAdded).toMatchObject({ id: 1, text: 'Ship it', votes: 0, orderIndex: 0 });
  });

  it('carries the handshake session into the connection', async () => {
    const guest = await connected({ guest: true, guestName: 'Robin' });
    const alice = await connected({ token: 'test-token-alice' });

    const guestState = nextEvent(guest, 'board_state');
    await guest.emitWithAck('join_board', { code: 'abc123' });
    expect(await guestState).toMatchObject({ role: 'viewer' });

    const aliceState = nextEvent(alice, 'board_state');
    const presence = nextEvent(guest, 'presence');
    await alice.emitWithAck('join_board', { code: 'abc123' });
    expect(await aliceState).toMatchObject({ role: 'owner' });
    expect(await presence).toEqual({ count: 2, names: ['Alice', 'Robin'] });
    expect(server.services.sessions.guestNameOf(guest.id ?? '')).toBe('Robin');
    expect(server.services.sessions.identityOf(alice.id ?? '')).toMatchObject({ userId: ALICE.id });
  });

  it('reports handler failures to the sender', async () => {
    const guest = await connected({ guest: true, guestName: 'Robin' });
    const serverError = nextEvent(guest, 'server:error');

    const ack = await guest.emitWithAck('dm_join', { other: 'alice' });

    expect(ack).toEqual({ ok: false, code: 'forbidden', message: 'auth required' });
    expect(await serverError).toEqual({ code: 'forbidden', message: 'auth required' });
  });

  it('tells the room when a member disconnects', async () => {
    const alice = await connected({ token: 'test-token-alice' });
    const bob = await connected({ token: 'test-token-bob' });
    await alice.emitWithAck('join_board', { code: 'abc123' });
    await bob.emitWithAck('join_board', { code: 'abc123' });

    const presence = nextEvent(alice, 'presence');
    bob.disconnect();

    expect(await presence).toEqual({ count: 1, names: ['Alice'] });
  });

  it('serves a health check', async () => {
    await connected({ guest: true });
    const response = await fetch(`${url}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ok: true, connections: 1, rooms: 0 });
  });
});
