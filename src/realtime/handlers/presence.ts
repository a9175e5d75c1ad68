import { ANONYMOUS_NAME, AUTHOR_MAX, CHANNEL_MAX } from '../../constants';
import { safeColor } from '../../lib/color-utils';
import { NotFoundError, ValidationError } from '../../lib/errors';
import { boardRoom, directRoom, groupRoom, type RoomKind } from '../../lib/room-keys';
import { publishTyping } from '../../lib/typing';
import { asRecord, generateColor, truncate } from '../../lib/utils';
import type { RealtimeServices } from '../services';
import type { EventHandler, HandlerContext } from './context';
import { readBoardCode, requireIdentity } from './guards';

interface TypingTarget {
  roomKey: string;
  name: string;
}

async function resolveTypingTarget(
  kind: RoomKind,
  { storage }: RealtimeServices,
  ctx: HandlerContext,
  payload: Record<string, unknown>,
): Promise<TypingTarget> {
  switch (kind) {
    case 'board': {
      const code = readBoardCode(payload);
      if (!code) {
        throw new ValidationError('Missing board code');
      }
      return { roomKey: boardRoom(code), name: truncate(payload.author, AUTHOR_MAX) || ANONYMOUS_NAME };
    }
    case 'direct': {
      const me = requireIdentity(ctx);
      const to = truncate(payload.to, AUTHOR_MAX);
      const other = to ? await storage.getUserByUsername(to) : null;
      if (!other) {
        throw new NotFoundError('other not found');
      }
      return { roomKey: directRoom(me.userId, other.id), name: me.username };
    }
    case 'group': {
      const me = requireIdentity(ctx);
      const slug = truncate(payload.slug, CHANNEL_MAX);
      if (!slug) {
        throw new ValidationError('missing data');
      }
      return { roomKey: groupRoom(slug), name: me.username };
    }
  }
}

/**
 * Start (`active`) or stop typing in a room the connection has joined. The
 * flag expires on its own unless refreshed. The sender gets no echo.
 */
export function setTyping(kind: RoomKind, active: boolean): EventHandler {
  return async (services, ctx, payload) => {
    const { registry, lock, router, typing } = services;
    const target = await resolveTypingTarget(kind, services, ctx, payload);

    await lock.run(target.roomKey, () => {
      if (!registry.has(target.roomKey, ctx.connId)) {
        return;
      }
      if (active) {
        const expiresAt = typing.expiryFromNow();
        registry.setTyping(target.roomKey, ctx.connId, target.name, expiresAt);
        typing.schedule(target.roomKey, expiresAt);
      } else {
        registry.setTyping(target.roomKey, ctx.connId, null);
      }
      publishTyping(router, registry, target.roomKey, ctx.connId);
    });
  };
}

function readCoordinate(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export const moveCursor: EventHandler = async ({ registry, lock, router }, ctx, payload) => {
  const code = readBoardCode(payload);
  if (!code) {
    throw new ValidationError('Missing board code');
  }
  const pos = asRecord(payload.pos);
  const roomKey = boardRoom(code);

  await lock.run(roomKey, () => {
    const stored = registry.setCursor(roomKey, ctx.connId, {
      x: readCoordinate(pos.x),
      y: readCoordinate(pos.y),
      color: safeColor(payload.color, generateColor(ctx.connId)),
      author: truncate(payload.author, AUTHOR_MAX) || ANONYMOUS_NAME,
    });
    if (stored) {
      router.publish(roomKey, 'cursors', registry.cursors(roomKey), ctx.connId);
    }
  });
};
