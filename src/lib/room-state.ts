import {
  DEFAULT_CHANNEL,
  GROUP_HISTORY_LIMIT,
  SNAPSHOT_ACTIVITY_LIMIT,
  SNAPSHOT_MESSAGE_LIMIT,
} from '../constants';
import type { Board, Card, ChatMessage, GroupRoom, ReactionTally, UserProfile } from '../types/board';
import type {
  BoardStatePayload,
  CardView,
  DirectStatePayload,
  Identity,
  MessageView,
} from '../types/realtime';
import { effectiveRole } from './access';
import { boardRoom, directRoom, groupRoom } from './room-keys';
import type { StorageGateway } from './storage-gateway';

export interface MediaUrls {
  filesBaseUrl: string;
  voiceBaseUrl: string;
}

export interface RoomStateDeps {
  storage: StorageGateway;
  urls: MediaUrls;
  isOnline: (userId: string) => boolean;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/** Escaped text with `**bold**`, `*em*`, `` `code` `` and line breaks. */
export function markdownToHtml(text: string | null | undefined): string {
  return escapeHtml(text ?? '')
    .replace(/\*\*(.+?)\*\*/g, '<strong>$1</strong>')
    .replace(/\*(.+?)\*/g, '<em>$1</em>')
    .replace(/`([^`]+)`/g, '<code>$1</code>')
    .replace(/\n/g, '<br>');
}

/** Board order: explicit `orderIndex` first, falling back to insertion id. */
export function sortCards<T extends Pick<Card, 'id' | 'orderIndex'>>(cards: readonly T[]): T[] {
  return [...cards].sort((a, b) => {
    const byOrder = (a.orderIndex ?? a.id) - (b.orderIndex ?? b.id);
    return byOrder !== 0 ? byOrder : a.id - b.id;
  });
}

export function channelsOf(messages: readonly Pick<ChatMessage, 'channel'>[]): string[] {
  const channels = new Set(messages.map((message) => message.channel).filter(Boolean));
  return channels.size > 0 ? Array.from(channels).sort() : [DEFAULT_CHANNEL];
}

/**
 * Builds the private snapshot a connection receives when it joins a room,
 * and the message/card views every broadcast reuses.
 */
export class RoomStateSynthesizer {
  constructor(private readonly deps: RoomStateDeps) {}

  async snapshotBoard(board: Board, requester: Identity | null): Promise<BoardStatePayload> {
    const { storage } = this.deps;
    const [cards, recent, members, activity, presenceHistory, memberRole] = await Promise.all([
      storage.listCards(board.id),
      storage.listRecentMessages(boardRoom(board.code), SNAPSHOT_MESSAGE_LIMIT),
      storage.listMembers(board.id),
      storage.listActivity(board.id, SNAPSHOT_ACTIVITY_LIMIT),
      storage.listPresenceHistory(board.id, SNAPSHOT_ACTIVITY_LIMIT),
      requester ? storage.getMemberRole(board.id, requester.userId) : Promise.resolve(null),
    ]);
    const visible = oldestFirst(recent);

    return {
      cards: sortCards(cards).map((card) => this.cardView(card)),
      messages: await this.messageViews(visible),
      theme: board.theme,
      title: board.title,
      board: {
        accent: board.accentColor,
        background: board.backgroundAnimation,
        code: board.code,
      },
      members,
      activity,
      presenceHistory,
      channels: channelsOf(visible),
      role: effectiveRole(requester, memberRole),
    };
  }

  async snapshotDirect(me: Identity, other: UserProfile): Promise<DirectStatePayload> {
    const recent = await this.deps.storage.listRecentMessages(
      directRoom(me.userId, other.id),
      SNAPSHOT_MESSAGE_LIMIT,
    );
    return {
      other: other.username,
      otherOnline: this.deps.isOnline(other.id),
      messages: await this.messageViews(oldestFirst(recent)),
    };
  }

  async snapshotGroup(room: GroupRoom): Promise<MessageView[]> {
    const recent = await this.deps.storage.listRecentMessages(groupRoom(room.slug), GROUP_HISTORY_LIMIT);
    return this.messageViews(oldestFirst(recent));
  }

  /** Views for a batch of messages with their reaction tallies loaded. */
  async messageViews(messages: readonly ChatMessage[]): Promise<MessageView[]> {
    if (messages.length === 0) return [];
    const tallies = await this.deps.storage.listReactions(messages.map((message) => message.id));
    return messages.map((message) => this.messageView(message, tallies.get(message.id) ?? []));
  }

  messageView(message: ChatMessage, reactions: ReactionTally[] = []): MessageView {
    const { filesBaseUrl, voiceBaseUrl } = this.deps.urls;
    return {
      id: message.id,
      authorId: message.authorId,
      author: message.author,
      receiverId: message.receiverId,
      text: message.text,
      html: markdownToHtml(message.text),
      channel: message.channel,
      replyTo: message.replyTo,
      pinned: message.pinned,
      attachments: message.attachments.map((file) => ({
        name: file.name,
        url: `${filesBaseUrl}/${file.stored}`,
        mime: file.mime,
      })),
      voiceUrl: message.voicePath ? `${voiceBaseUrl}/${message.voicePath}` : null,
      editedAt: message.editedAt,
      deletedAt: message.deletedAt,
      readAt: message.readAt,
      createdAt: message.createdAt,
      reactions,
    };
  }

  cardView(card: Card): CardView {
    return {
      ...card,
      attachmentUrl: card.attachmentPath ? `${this.deps.urls.filesBaseUrl}/${card.attachmentPath}` : null,
    };
  }
}

// Storage returns newest first; snapshots read oldest first without tombstones.
function oldestFirst(messages: readonly ChatMessage[]): ChatMessage[] {
  return messages.filter((message) => message.deletedAt === null).reverse();
}
