import { describe, expect, it } from 'vitest';
import type { ChatMessageDraft } from '../types/board';
import { MemoryStorage } from './memory-storage';

function draft(text: string, overrides: Partial<ChatMessageDraft> = {}): ChatMessageDraft {
  return {
    roomKey: 'board_abc123',
    boardId: 1,
    authorId: null,
    author: 'Anon',
    receiverId: null,
    text,
    channel: 'general',
    replyTo: null,
    attachments: [],
    voicePath: null,
    ...overrides,
  };
}

describe('MemoryStorage', () => {
  it('seeds the lobby group when no groups are given', async () => {
    const storage = new MemoryStorage();
    expect(await storage.getGroupBySlug('lobby')).toEqual({ id: 1, slug: 'lobby', title: 'Community Lounge' });
    expect(await storage.getGroupBySlug('missing')).toBeNull();
  });

  it('rejects a duplicate board code', async () => {
    const storage = new MemoryStorage();
    await storage.createBoard({ code: 'abc123', ownerId: null, template: null });
    await expect(storage.createBoard({ code: 'abc123', ownerId: null, template: null })).rejects.toThrow(
      'Board code abc123 already exists',
    );
  });

  it('makes the creator the owner and never downgrades a member', async () => {
    const storage = new MemoryStorage();
    const board = await storage.createBoard({ code: 'abc123', ownerId: 'uid-alice', template: null });

    expect(await storage.ensureMember(board.id, 'uid-alice', 'member')).toBe('owner');
    expect(await storage.ensureMember(board.id, 'uid-bob')).toBe('member');
    expect(await storage.getMemberRole(board.id, 'uid-bob')).toBe('member');
  });

  it('toggles a reaction triple on and off', async () => {
    const storage = new MemoryStorage();
    const message = await storage.insertMessage(draft('hello'));

    expect(await storage.toggleReaction(message.id, 'uid-bob', '🔥')).toBe(true);
    expect(await storage.toggleReaction(message.id, 'uid-carol', '🔥')).toBe(true);
    expect((await storage.listReactions([message.id])).get(message.id)).toEqual([{ emoji: '🔥', count: 2 }]);

    expect(await storage.toggleReaction(message.id, 'uid-bob', '🔥')).toBe(false);
    expect((await storage.listReactions([message.id])).get(message.id)).toEqual([{ emoji: '🔥', count: 1 }]);
  });

  it('lists recent messages newest first, per room', async () => {
    const storage = new MemoryStorage();
    await storage.insertMessage(draft('one'));
    await storage.insertMessage(draft('elsewhere', { roomKey: 'group_lobby', boardId: null }));
    await storage.insertMessage(draft('two'));
    await storage.insertMessage(draft('three'));

    const recent = await storage.listRecentMessages('board_abc123', 2);
    expect(recent.map((message) => message.text)).toEqual(['three', 'two']);
  });

  it('assigns order indices in the given sequence', async () => {
    const storage = new MemoryStorage();
    const board = await storage.createBoard({ code: 'abc123', ownerId: null, template: null });
    for (const [orderIndex, text] of ['a', 'b', 'c'].entries()) {
      await storage.insertCard(board.id, { author: 'x', text, tag: '', orderIndex, attachmentPath: null });
    }

    await storage.updateCardOrder(board.id, [3, 1, 2]);

    const cards = await storage.listCards(board.id);
    expect(cards.map((card) => [card.id, card.orderIndex])).toEqual([
      [1, 1],
      [2, 2],
      [3, 0],
    ]);
    expect(await storage.maxCardOrderIndex(board.id)).toBe(2);
  });

  it('searches cards and live messages, optionally by channel', async () => {
    const storage = new MemoryStorage();
    const board = await storage.createBoard({ code: 'abc123', ownerId: null, template: null });
    await storage.insertCard(board.id, { author: 'x', text: 'Deploy on Friday', tag: '', orderIndex: 0, attachmentPath: null });
    await storage.insertMessage(draft('deploy is green'));
    await storage.insertMessage(draft('DEPLOY notes', { channel: 'ops' }));
    const removed = await storage.insertMessage(draft('deploy rollback'));
    await storage.setMessageDeleted(removed.id);

    const all = await storage.searchBoard(board.id, 'deploy', null, 20);
    expect(all.cards.map((card) => card.text)).toEqual(['Deploy on Friday']);
    expect(all.messages.map((message) => message.text)).toEqual(['DEPLOY notes', 'deploy is green']);

    const ops = await storage.searchBoard(board.id, 'deploy', 'ops', 20);
    expect(ops.messages.map((message) => message.text)).toEqual(['DEPLOY notes']);
  });

  it('keeps the first read time', async () => {
    let now = '2026-01-01T00:00:00.000Z';
    const storage = new MemoryStorage({}, () => now);
    const message = await storage.insertMessage(draft('dm', { roomKey: 'dm_a_b', boardId: null, receiverId: 'b' }));

    await storage.markMessageRead(message.id, 'b');
    now = '2026-01-02T00:00:00.000Z';
    const again = await storage.markMessageRead(message.id, 'b');

    expect(again?.readAt).toBe('2026-01-01T00:00:00.000Z');
  });

  it('joins usernames onto activity and presence rows', async () => {
    const storage = new MemoryStorage({
      users: [{ id: 'uid-alice', username: 'Alice', displayName: 'Alice', avatar: null, badge: 'member', status: '' }],
    });
    const board = await storage.createBoard({ code: 'abc123', ownerId: null, template: null });
    await storage.logActivity(board.id, 'card_created', 'uid-alice', { cardId: 1 });
    await storage.logActivity(board.id, 'card_voted', null, { cardId: 1 });
    await storage.recordPresence(board.id, 'uid-alice', 'join', 'Alice');

    const activity = await storage.listActivity(board.id, 10);
    expect(activity.map((entry) => [entry.kind, entry.username])).toEqual([
      ['card_voted', null],
      ['card_created', 'alice'],
    ]);
    const presence = await storage.listPresenceHistory(board.id, 10);
    expect(presence[0]).toMatchObject({ action: 'join', details: 'Alice', username: 'alice' });
  });
});
