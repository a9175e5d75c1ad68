import {
  ANONYMOUS_NAME,
  AUTHOR_MAX,
  BOARD_THEMES,
  CARD_TEXT_MAX,
  CLIENT_NAME_MAX,
  FALLBACK_BOARD_TITLE,
  TAG_MAX,
  TITLE_MAX,
} from '../../constants';
import { logger } from '../../lib/logger';
import { NotFoundError, ValidationError } from '../../lib/errors';
import { boardRoom } from '../../lib/room-keys';
import { readInteger, truncate } from '../../lib/utils';
import type { BoardTheme } from '../../types/board';
import { recordActivity } from './activity';
import type { EventHandler } from './context';
import { readBoardCode, requireBoard } from './guards';

const STORED_PATH_MAX = 200;

function isBoardTheme(value: string): value is BoardTheme {
  return BOARD_THEMES.some((theme) => theme === value);
}

/**
 * Snapshot first, membership second: the joiner gets `board_state` before it
 * can receive any broadcast for the room.
 */
export const joinBoard: EventHandler = async (services, ctx, payload) => {
  const { storage, lock, registry, router, sessions, state } = services;
  const code = readBoardCode(payload);
  const clientName =
    truncate(payload.clientName, CLIENT_NAME_MAX) ||
    truncate(ctx.identity?.displayName, CLIENT_NAME_MAX) ||
    ctx.guestName ||
    ANONYMOUS_NAME;
  await requireBoard(storage, code, 'Invalid board code');
  const roomKey = boardRoom(code);

  await lock.run(roomKey, async () => {
    if (!sessions.isConnected(ctx.connId)) return;
    const board = await requireBoard(storage, code, 'Invalid board code');
    if (ctx.identity) {
      await storage.ensureMember(board.id, ctx.identity.userId);
      await storage.recordPresence(board.id, ctx.identity.userId, 'join', clientName);
    }
    const snapshot = await state.snapshotBoard(board, ctx.identity);
    if (!sessions.isConnected(ctx.connId)) {
      logger.debug('ROOM', `Connection ${ctx.connId} closed before joining ${roomKey}`, { roomKey });
      return;
    }

    router.reply(ctx.connId, 'board_state', snapshot);
    const count = registry.join(roomKey, ctx.connId, clientName);
    router.publish(roomKey, 'presence', { count, names: registry.memberNames(roomKey) });
    logger.info('ROOM', `'${clientName}' joined board ${code} (${count} present)`, {
      roomKey,
      connId: ctx.connId,
      userId: ctx.identity?.userId ?? null,
    });
  });
};

export const leaveBoard: EventHandler = async ({ sessions }, ctx, payload) => {
  const code = readBoardCode(payload);
  if (!code) {
    throw new ValidationError('Missing board code');
  }
  await sessions.leaveRoom(boardRoom(code), ctx.connId, ctx.identity);
};

export const createCard: EventHandler = async ({ storage, lock, router, state }, ctx, payload) => {
  const code = readBoardCode(payload);
  const text = truncate(payload.text, CARD_TEXT_MAX);
  const tag = truncate(payload.tag, TAG_MAX);
  const author = truncate(payload.author, AUTHOR_MAX);
  const attachmentPath = truncate(payload.attachment, STORED_PATH_MAX) || null;
  if (!code || !text) {
    throw new ValidationError('Missing code or text');
  }
  const board = await requireBoard(storage, code);
  const roomKey = boardRoom(code);

  await lock.run(roomKey, async () => {
    const max = await storage.maxCardOrderIndex(board.id);
    const card = await storage.insertCard(board.id, {
      author,
      text,
      tag,
      orderIndex: max === null ? 0 : max + 1,
      attachmentPath,
    });
    router.publish(roomKey, 'card_added', state.cardView(card));
    await recordActivity(storage, board.id, 'card_created', ctx.identity?.userId ?? null, {
      cardId: card.id,
      text: text.slice(0, 120),
    });
  });
};

export const voteCard: EventHandler = async ({ storage, lock, router, state }, ctx, payload) => {
  const code = readBoardCode(payload);
  const cardId = readInteger(payload.cardId);
  if (!code || cardId === null) {
    throw new ValidationError('Missing code or cardId');
  }
  const board = await requireBoard(storage, code);
  const roomKey = boardRoom(code);

  await lock.run(roomKey, async () => {
    const card = await storage.incrementCardVotes(board.id, cardId);
    if (!card) {
      throw new NotFoundError('Card not found');
    }
    router.publish(roomKey, 'card_updated', state.cardView(card));
    await recordActivity(storage, board.id, 'card_voted', ctx.identity?.userId ?? null, { cardId });
  });
};

/** Positions in the client's list become the new order indices; last writer wins. */
export const reorderCards: EventHandler = async ({ storage, lock, router }, ctx, payload) => {
  const code = readBoardCode(payload);
  const rawOrder: unknown[] = Array.isArray(payload.order) ? payload.order : [];
  const order: number[] = [];
  for (const value of rawOrder) {
    const cardId = readInteger(value);
    if (cardId === null) {
      throw new ValidationError('Invalid card order');
    }
    order.push(cardId);
  }
  if (!code || order.length === 0) {
    throw new ValidationError('Missing code or order');
  }
  const board = await requireBoard(storage, code);
  const roomKey = boardRoom(code);

  await lock.run(roomKey, async () => {
    await storage.updateCardOrder(board.id, order);
    router.publish(roomKey, 'cards_reordered', { order });
    await recordActivity(storage, board.id, 'cards_reordered', ctx.identity?.userId ?? null, { order });
  });
};

export const setTheme: EventHandler = async ({ storage, lock, router }, ctx, payload) => {
  const code = readBoardCode(payload);
  const theme = (truncate(payload.theme, TITLE_MAX) || 'ocean').toLowerCase();
  if (!isBoardTheme(theme)) {
    throw new ValidationError('Invalid theme');
  }
  const board = await requireBoard(storage, code);
  const roomKey = boardRoom(code);

  await lock.run(roomKey, async () => {
    const updated = await storage.updateBoard(board.id, { theme });
    if (!updated) {
      throw new NotFoundError('Board not found');
    }
    router.publish(roomKey, 'theme_changed', { theme: updated.theme });
    await recordActivity(storage, board.id, 'theme_changed', ctx.identity?.userId ?? null, { theme });
  });
};

export const setTitle: EventHandler = async ({ storage, lock, router }, ctx, payload) => {
  const code = readBoardCode(payload);
  if (!code) {
    throw new ValidationError('Missing board code');
  }
  const board = await requireBoard(storage, code);
  const title = truncate(payload.title, TITLE_MAX) || FALLBACK_BOARD_TITLE;
  const roomKey = boardRoom(code);

  await lock.run(roomKey, async () => {
    const updated = await storage.updateBoard(board.id, { title });
    if (!updated) {
      throw new NotFoundError('Board not found');
    }
    router.publish(roomKey, 'title_changed', { title: updated.title });
    await recordActivity(storage, board.id, 'title_changed', ctx.identity?.userId ?? null, { title });
  });
};
