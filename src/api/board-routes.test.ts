import { beforeEach, describe, expect, it, vi } from 'vitest';
import { createActivityHandler } from '../../api/board/activity';
import { createBoardHandler } from '../../api/board/create';
import { createInviteHandler } from '../../api/board/invite';
import { createSearchHandler } from '../../api/board/search';
import type { ApiDeps, ApiRequest } from '../lib/api-http';
import { MemoryStorage } from '../lib/memory-storage';

const ALICE = { id: 'uid-alice', username: 'alice', displayName: 'Alice', avatar: null, badge: 'member', status: '' };
const BOB = { id: 'uid-bob', username: 'bob', displayName: 'Bob', avatar: null, badge: 'member', status: '' };

const TOKENS: Record<string, string> = {
  'test-token-alice': ALICE.id,
  'test-token-bob': BOB.id,
};

function createDeps(): ApiDeps {
  return {
    storage: new MemoryStorage({ users: [ALICE, BOB] }),
    verifyToken: async (token) => {
      const uid = TOKENS[token];
      if (!uid) {
        throw new Error('invalid token');
      }
      return { uid, name: null, email: null };
    },
    inviteTtlDays: 7,
    now: () => new Date('2026-03-01T00:00:00.000Z'),
  };
}

// Create mock req/res objects for Vercel handler testing
function createMockReq(overrides: Partial<ApiRequest> = {}): ApiRequest {
  return {
    method: 'GET',
    headers: {},
    query: {},
    body: undefined,
    ...overrides,
  };
}

function createMockRes() {
  const res = {
    status: vi.fn(),
    json: vi.fn(),
    end: vi.fn(),
    setHeader: vi.fn(),
  };
  res.status.mockReturnValue(res);
  return res;
}

describe('board API routes', () => {
  let deps: ApiDeps;
  let boardId: number;

  beforeEach(async () => {
    deps = createDeps();
    const board = await deps.storage.createBoard({ code: 'abc123', ownerId: ALICE.id, template: null });
    boardId = board.id;
  });

  describe('GET /api/board/activity', () => {
    const handler = () => createActivityHandler(() => deps);

    it('returns recent activity newest first', async () => {
      await deps.storage.logActivity(boardId, 'card_created', ALICE.id, { cardId: 1 });
      await deps.storage.logActivity(boardId, 'title_changed', null, { title: 'Retro' });
      const res = createMockRes();

      await handler()(createMockReq({ query: { code: 'abc123' } }), res);

      expect(res.status).toHaveBeenCalledWith(200);
      const [entries] = res.json.mock.calls[0] ?? [];
      expect(entries).toMatchObject([
        { kind: 'title_changed', username: null, payload: { title: 'Retro' } },
        { kind: 'card_created', username: 'alice', payload: { cardId: 1 } },
      ]);
    });

    it('requires a board code', async () => {
      const res = createMockRes();
      await handler()(createMockReq(), res);

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith({ error: 'Missing board code' });
    });

    it('returns 404 for an unknown board', async () => {
      const res = createMockRes();
      await handler()(createMockReq({ query: { code: 'nope' } }), res);

      expect(res.status).toHaveBeenCalledWith(404);
      expect(res.json).toHaveBeenCalledWith({ error: 'Board not found' });
    });

    it('answers CORS preflight and rejects other methods', async () => {
      const preflight = createMockRes();
      await handler()(createMockReq({ method: 'OPTIONS' }), preflight);
      expect(preflight.status).toHaveBeenCalledWith(200);
      expect(preflight.end).toHaveBeenCalled();
      expect(preflight.setHeader).toHaveBeenCalledWith('Access-Control-Allow-Methods', 'GET, OPTIONS');

      const wrong = createMockRes();
      await handler()(createMockReq({ method: 'DELETE' }), wrong);
      expect(wrong.status).toHaveBeenCalledWith(405);
      expect(wrong.json).toHaveBeenCalledWith({ error: 'Method not allowed' });
    });
  });

  describe('GET /api/board/search', () => {
    const handler = () => createSearchHandler(() => deps);

    beforeEach(async () => {
      await deps.storage.insertCard(boardId, { author: 'a', text: 'Fix the login bug', tag: '', orderIndex: 0, attachmentPath: null });
      await deps.storage.insertMessage({
        roomKey: 'board_abc123',
        boardId,
        authorId: null,
        author: 'Anon',
        receiverId: null,
        text: 'login is flaky',
        channel: 'qa',
        replyTo: null,
        attachments: [],
        voicePath: null,
      });
    });

    it('matches cards and messages case-insensitively', async () => {
      const res = createMockRes();
      await handler()(createMockReq({ query: { code: 'abc123', q: 'LOGIN' } }), res);

      const [results] = res.json.mock.calls[0] ?? [];
      expect(results).toMatchObject({
        cards: [{ text: 'Fix the login bug' }],
        messages: [{ text: 'login is flaky' }],
      });
    });

    it('filters messages by channel', async () => {
      const res = createMockRes();
      await handler()(createMockReq({ query: { code: 'abc123', q: 'login', channel: 'general' } }), res);

      const [results] = res.json.mock.calls[0] ?? [];
      expect(results).toMatchObject({ cards: [{ text: 'Fix the login bug' }], messages: [] });
    });

    it('returns nothing for an empty query', async () => {
      const res = createMockRes();
      await handler()(createMockReq({ query: { code: 'abc123', q: '  ' } }), res);

      expect(res.status).toHaveBeenCalledWith(200);
      expect(res.json).toHaveBeenCalledWith({ cards: [], messages: [] });
    });
  });

  describe('POST /api/board/invite', () => {
    const handler = () => createInviteHandler(() => deps, () => 'invite-token-1');

    it('lets the owner create an expiring invite', async () => {
      const res = createMockRes();
      await handler()(
        createMockReq({
          method: 'POST',
          headers: { authorization: 'Bearer test-token-alice' },
          body: { code: 'abc123' },
        }),
        res,
      );

      expect(res.status).toHaveBeenCalledWith(200);
      expect(res.json).toHaveBeenCalledWith({ token: 'invite-token-1', expiresAt: '2026-03-08T00:00:00.000Z' });
      expect(await deps.storage.getInvite('invite-token-1')).toEqual({
        token: 'invite-token-1',
        boardId,
        createdBy: ALICE.id,
        expiresAt: '2026-03-08T00:00:00.000Z',
        createdAt: '2026-03-01T00:00:00.000Z',
      });
      const [latest] = await deps.storage.listActivity(boardId, 1);
      expect(latest?.kind).toBe('invite_created');
    });

    it('refuses plain members', async () => {
      await deps.storage.ensureMember(boardId, BOB.id, 'member');
      const res = createMockRes();
      await handler()(
        createMockReq({ method: 'POST', headers: { authorization: 'Bearer test-token-bob' }, body: { code: 'abc123' } }),
        res,
      );

      expect(res.status).toHaveBeenCalledWith(403);
      expect(res.json).toHaveBeenCalledWith({ error: 'no permission' });
    });

    it('requires a signed-in caller', async () => {
      const anonymous = createMockRes();
      await handler()(createMockReq({ method: 'POST', body: { code: 'abc123' } }), anonymous);
      expect(anonymous.status).toHaveBeenCalledWith(401);
      expect(anonymous.json).toHaveBeenCalledWith({ error: 'auth required' });

      const badToken = createMockRes();
      await handler()(
        createMockReq({ method: 'POST', headers: { authorization: 'Bearer test-token-nobody' }, body: { code: 'abc123' } }),
        badToken,
      );
      expect(badToken.status).toHaveBeenCalledWith(401);
      expect(badToken.json).toHaveBeenCalledWith({ error: 'Authentication failed' });
    });
  });

  describe('POST /api/board/create', () => {
    const handler = () => createBoardHandler(() => deps, () => 'c0ffee');

    it('creates a board from a template', async () => {
      const res = createMockRes();
      await handler()(
        createMockReq({ method: 'POST', headers: { authorization: 'Bearer test-token-bob' }, body: { template: 'kanban' } }),
        res,
      );

      expect(res.status).toHaveBeenCalledWith(201);
      expect(res.json).toHaveBeenCalledWith({ code: 'c0ffee', title: 'Kanban Standup', theme: 'violet' });
      const board = await deps.storage.getBoardByCode('c0ffee');
      expect(board?.ownerId).toBe(BOB.id);
      expect(await deps.storage.listCards(board?.id ?? 0)).toHaveLength(3);
    });

    it('creates an ownerless blank board for anonymous callers', async () => {
      const res = createMockRes();
      await handler()(createMockReq({ method: 'POST' }), res);

      expect(res.status).toHaveBeenCalledWith(201);
      expect(res.json).toHaveBeenCalledWith({ code: 'c0ffee', title: 'Untitled', theme: 'ocean' });
      expect((await deps.storage.getBoardByCode('c0ffee'))?.ownerId).toBeNull();
    });

    it('rejects GET', async () => {
      const res = createMockRes();
      await handler()(createMockReq(), res);
      expect(res.status).toHaveBeenCalledWith(405);
    });
  });
});
