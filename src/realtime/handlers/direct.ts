import { AUTHOR_MAX } from '../../constants';
import { logger } from '../../lib/logger';
import { NotFoundError } from '../../lib/errors';
import { directRoom, roomKindOf } from '../../lib/room-keys';
import { readInteger, truncate } from '../../lib/utils';
import type { EventHandler } from './context';
import { requireIdentity } from './guards';

/** Join the pair's room and receive its recent history as `dm_state`. */
export const joinDirect: EventHandler = async ({ storage, lock, registry, router, sessions, state }, ctx, payload) => {
  const me = requireIdentity(ctx);
  const otherName = truncate(payload.other, AUTHOR_MAX);
  const other = otherName ? await storage.getUserByUsername(otherName) : null;
  if (!other) {
    throw new NotFoundError('other not found');
  }
  const roomKey = directRoom(me.userId, other.id);

  await lock.run(roomKey, async () => {
    const snapshot = await state.snapshotDirect(me, other);
    if (!sessions.isConnected(ctx.connId)) return;
    router.reply(ctx.connId, 'dm_state', snapshot);
    registry.join(roomKey, ctx.connId, me.username);
    logger.info('ROOM', `'${me.username}' opened direct room with '${other.username}'`, {
      roomKey,
      connId: ctx.connId,
    });
  });
};

/**
 * Read receipts come from the receiver only. Anything else (guest, sender,
 * unknown id) is dropped without an error.
 */
export const markDirectRead: EventHandler = async ({ storage, lock, router }, ctx, payload) => {
  const me = ctx.identity;
  const messageId = readInteger(payload.messageId);
  if (!me || messageId === null) return;
  const message = await storage.getMessage(messageId);
  if (!message || roomKindOf(message.roomKey) !== 'direct' || message.receiverId !== me.userId) {
    return;
  }

  await lock.run(message.roomKey, async () => {
    const updated = await storage.markMessageRead(message.id, me.userId);
    if (updated) {
      router.publish(message.roomKey, 'dm_read', { id: updated.id });
    }
  });
};
