import {
  ANONYMOUS_NAME,
  AUTHOR_MAX,
  CHANNEL_MAX,
  CHAT_TEXT_MAX,
  DEFAULT_CHANNEL,
  DM_TEXT_MAX,
  EMOJI_MAX,
  GROUP_TEXT_MAX,
} from '../../constants';
import { canModerateBoardMessage, isMessageSender } from '../../lib/access';
import { AuthorizationError, NotFoundError, ValidationError } from '../../lib/errors';
import { boardRoom, directRoom, groupRoom, roomKindOf, type RoomKind } from '../../lib/room-keys';
import { asRecord, readInteger, truncate } from '../../lib/utils';
import type { ChatMessage, ChatMessageDraft, StoredAttachment } from '../../types/board';
import type { Identity, MessageView } from '../../types/realtime';
import type { RealtimeServices } from '../services';
import { recordActivity } from './activity';
import type { EventHandler, HandlerContext } from './context';
import { readBoardCode, requireBoard, requireIdentity, requireLiveMessage, requireMessageId } from './guards';

interface ChatEvents {
  added: 'chat_added' | 'dm_new' | 'group_new';
  reactions: 'chat_reactions' | 'dm_reactions' | 'group_reactions';
  updated: 'chat_updated' | 'dm_updated' | 'group_updated';
  deleted: 'chat_deleted' | 'dm_deleted' | 'group_deleted';
}

const CHAT_EVENTS: Record<RoomKind, ChatEvents> = {
  board: { added: 'chat_added', reactions: 'chat_reactions', updated: 'chat_updated', deleted: 'chat_deleted' },
  direct: { added: 'dm_new', reactions: 'dm_reactions', updated: 'dm_updated', deleted: 'dm_deleted' },
  group: { added: 'group_new', reactions: 'group_reactions', updated: 'group_updated', deleted: 'group_deleted' },
};

const TEXT_MAX: Record<RoomKind, number> = {
  board: CHAT_TEXT_MAX,
  direct: DM_TEXT_MAX,
  group: GROUP_TEXT_MAX,
};

const STORED_PATH_MAX = 200;
const ATTACHMENTS_MAX = 10;

function readAttachments(value: unknown): StoredAttachment[] {
  if (!Array.isArray(value)) return [];
  const files: StoredAttachment[] = [];
  for (const item of value.slice(0, ATTACHMENTS_MAX)) {
    const record = asRecord(item);
    const stored = truncate(record.stored, STORED_PATH_MAX);
    if (!stored) continue;
    files.push({
      name: truncate(record.name, STORED_PATH_MAX) || stored,
      stored,
      mime: truncate(record.mime, 100),
    });
  }
  return files;
}

function readReplyTo(payload: Record<string, unknown>): number | null {
  const replyTo = readInteger(payload.replyTo);
  return replyTo !== null && replyTo > 0 ? replyTo : null;
}

/** Draft for a new message, room resolved and sender checked. */
async function draftMessage(
  kind: RoomKind,
  { storage }: RealtimeServices,
  ctx: HandlerContext,
  payload: Record<string, unknown>,
): Promise<ChatMessageDraft> {
  const text = truncate(payload.text, TEXT_MAX[kind]);
  const replyTo = readReplyTo(payload);

  switch (kind) {
    case 'board': {
      const code = readBoardCode(payload);
      if (!code || !text) {
        throw new ValidationError('Missing code or text');
      }
      const board = await requireBoard(storage, code);
      return {
        roomKey: boardRoom(board.code),
        boardId: board.id,
        authorId: ctx.identity?.userId ?? null,
        author:
          truncate(payload.author, AUTHOR_MAX) ||
          truncate(ctx.identity?.username, AUTHOR_MAX) ||
          ctx.guestName ||
          ANONYMOUS_NAME,
        receiverId: null,
        text,
        channel: truncate(payload.channel, CHANNEL_MAX) || DEFAULT_CHANNEL,
        replyTo,
        attachments: readAttachments(payload.attachments),
        voicePath: truncate(payload.voice, STORED_PATH_MAX) || null,
      };
    }
    case 'direct': {
      const me = requireIdentity(ctx);
      const to = truncate(payload.to, AUTHOR_MAX);
      const voicePath = truncate(payload.voice, STORED_PATH_MAX) || null;
      if (!to || (!text && !voicePath)) {
        throw new ValidationError('missing content');
      }
      const other = await storage.getUserByUsername(to);
      if (!other) {
        throw new NotFoundError('other not found');
      }
      return {
        roomKey: directRoom(me.userId, other.id),
        boardId: null,
        authorId: me.userId,
        author: me.username,
        receiverId: other.id,
        text,
        channel: DEFAULT_CHANNEL,
        replyTo,
        attachments: [],
        voicePath,
      };
    }
    case 'group': {
      const me = requireIdentity(ctx);
      const slug = truncate(payload.slug, CHANNEL_MAX);
      if (!slug || !text) {
        throw new ValidationError('missing data');
      }
      const room = await storage.getGroupBySlug(slug);
      if (!room) {
        throw new NotFoundError('group missing');
      }
      return {
        roomKey: groupRoom(room.slug),
        boardId: null,
        authorId: me.userId,
        author: me.username,
        receiverId: null,
        text,
        channel: DEFAULT_CHANNEL,
        replyTo,
        attachments: [],
        voicePath: null,
      };
    }
  }
}

/**
 * Resolve the message an existing-message event targets and make sure it
 * belongs to a room of `kind` the caller named (board code, group slug) or
 * takes part in (direct).
 */
async function resolveTarget(
  kind: RoomKind,
  { storage }: RealtimeServices,
  me: Identity,
  payload: Record<string, unknown>,
): Promise<ChatMessage> {
  const message = await requireLiveMessage(storage, requireMessageId(payload));
  if (roomKindOf(message.roomKey) !== kind) {
    throw new NotFoundError('message missing');
  }
  if (kind === 'board') {
    const code = readBoardCode(payload);
    if (code && boardRoom(code) !== message.roomKey) {
      throw new NotFoundError('message missing');
    }
  } else if (kind === 'group') {
    const slug = truncate(payload.slug, CHANNEL_MAX);
    if (slug && groupRoom(slug) !== message.roomKey) {
      throw new NotFoundError('message missing');
    }
  } else if (message.authorId !== me.userId && message.receiverId !== me.userId) {
    throw new NotFoundError('message missing');
  }
  return message;
}

/** Board messages: author or moderator. Direct and group: the sender only. */
async function authorizeChange(
  kind: RoomKind,
  { storage }: RealtimeServices,
  me: Identity,
  message: ChatMessage,
): Promise<void> {
  if (kind === 'board') {
    const role = message.boardId === null ? null : await storage.getMemberRole(message.boardId, me.userId);
    if (!canModerateBoardMessage(me, message, role)) {
      throw new AuthorizationError();
    }
    return;
  }
  if (!isMessageSender(me, message)) {
    throw new AuthorizationError();
  }
}

async function viewOf(services: RealtimeServices, message: ChatMessage): Promise<MessageView> {
  const [view] = await services.state.messageViews([message]);
  return view ?? services.state.messageView(message);
}

export function sendMessage(kind: RoomKind): EventHandler {
  return async (services, ctx, payload) => {
    const { storage, lock, router, state } = services;
    const draft = await draftMessage(kind, services, ctx, payload);

    await lock.run(draft.roomKey, async () => {
      const message = await storage.insertMessage(draft);
      router.publish(draft.roomKey, CHAT_EVENTS[kind].added, state.messageView(message));
      if (message.boardId !== null) {
        await recordActivity(storage, message.boardId, 'message_posted', message.authorId, {
          messageId: message.id,
          channel: message.channel,
        });
      }
    });
  };
}

/** Toggle the caller's reaction, then broadcast the message's full tally. */
export function reactToMessage(kind: RoomKind): EventHandler {
  return async (services, ctx, payload) => {
    const { storage, lock, router } = services;
    const me = requireIdentity(ctx);
    const emoji = truncate(payload.emoji, EMOJI_MAX);
    requireMessageId(payload, 'missing reaction data');
    if (!emoji) {
      throw new ValidationError('missing reaction data');
    }
    const target = await resolveTarget(kind, services, me, payload);

    await lock.run(target.roomKey, async () => {
      const message = await requireLiveMessage(storage, target.id);
      const added = await storage.toggleReaction(message.id, me.userId, emoji);
      const tallies = await storage.listReactions([message.id]);
      router.publish(message.roomKey, CHAT_EVENTS[kind].reactions, {
        messageId: message.id,
        reactions: tallies.get(message.id) ?? [],
      });
      if (message.boardId !== null) {
        await recordActivity(storage, message.boardId, 'message_reaction', me.userId, {
          messageId: message.id,
          emoji,
          added,
        });
      }
    });
  };
}

export function editMessage(kind: RoomKind): EventHandler {
  return async (services, ctx, payload) => {
    const { storage, lock, router } = services;
    const me = requireIdentity(ctx);
    const text = truncate(payload.text, TEXT_MAX[kind]);
    requireMessageId(payload);
    if (!text) {
      throw new ValidationError('missing data');
    }
    const target = await resolveTarget(kind, services, me, payload);
    await authorizeChange(kind, services, me, target);

    await lock.run(target.roomKey, async () => {
      await requireLiveMessage(storage, target.id);
      const updated = await storage.setMessageEdited(target.id, text);
      if (!updated) {
        throw new NotFoundError('message missing');
      }
      router.publish(updated.roomKey, CHAT_EVENTS[kind].updated, await viewOf(services, updated));
      if (updated.boardId !== null) {
        await recordActivity(storage, updated.boardId, 'message_edit', me.userId, { messageId: updated.id });
      }
    });
  };
}

/** Soft delete: the row stays, later snapshots skip it. */
export function deleteMessage(kind: RoomKind): EventHandler {
  return async (services, ctx, payload) => {
    const { storage, lock, router } = services;
    const me = requireIdentity(ctx);
    const target = await resolveTarget(kind, services, me, payload);
    await authorizeChange(kind, services, me, target);

    await lock.run(target.roomKey, async () => {
      await requireLiveMessage(storage, target.id);
      const deleted = await storage.setMessageDeleted(target.id);
      if (!deleted) {
        throw new NotFoundError('message missing');
      }
      router.publish(deleted.roomKey, CHAT_EVENTS[kind].deleted, { id: deleted.id });
      if (deleted.boardId !== null) {
        await recordActivity(storage, deleted.boardId, 'message_delete', me.userId, { messageId: deleted.id });
      }
    });
  };
}

/** Board chat only; pinning is independent of edits. */
export const pinMessage: EventHandler = async (services, ctx, payload) => {
  const { storage, lock, router } = services;
  const me = requireIdentity(ctx);
  if (!readBoardCode(payload)) {
    throw new ValidationError('missing data');
  }
  const target = await resolveTarget('board', services, me, payload);
  await authorizeChange('board', services, me, target);

  await lock.run(target.roomKey, async () => {
    await requireLiveMessage(storage, target.id);
    const pinned = await storage.toggleMessagePinned(target.id);
    if (!pinned) {
      throw new NotFoundError('message missing');
    }
    router.publish(pinned.roomKey, 'chat_pinned', { message: await viewOf(services, pinned) });
    if (pinned.boardId !== null) {
      await recordActivity(storage, pinned.boardId, 'message_pin', me.userId, {
        messageId: pinned.id,
        pinned: pinned.pinned,
      });
    }
  });
};
