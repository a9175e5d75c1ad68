import { CHANNEL_MAX } from '../../constants';
import { logger } from '../../lib/logger';
import { NotFoundError } from '../../lib/errors';
import { groupRoom } from '../../lib/room-keys';
import { truncate } from '../../lib/utils';
import type { EventHandler } from './context';
import { requireIdentity } from './guards';

export const joinGroup: EventHandler = async ({ storage, lock, registry, router, sessions, state }, ctx, payload) => {
  const me = requireIdentity(ctx);
  const slug = truncate(payload.slug, CHANNEL_MAX);
  const room = slug ? await storage.getGroupBySlug(slug) : null;
  if (!room) {
    throw new NotFoundError('group missing');
  }
  const roomKey = groupRoom(room.slug);

  await lock.run(roomKey, async () => {
    const history = await state.snapshotGroup(room);
    if (!sessions.isConnected(ctx.connId)) return;
    router.reply(ctx.connId, 'group_history', history);
    const count = registry.join(roomKey, ctx.connId, me.username);
    logger.info('ROOM', `'${me.username}' joined group ${room.slug} (${count} present)`, {
      roomKey,
      connId: ctx.connId,
    });
  });
};
