import type { BOARD_THEMES } from '../constants';

export type BoardTheme = (typeof BOARD_THEMES)[number];

export interface Board {
  id: number;
  code: string;
  title: string;
  theme: string;
  accentColor: string;
  backgroundAnimation: string;
  ownerId: string | null;
  template: string | null;
  createdAt: string;
}

export interface Card {
  id: number;
  boardId: number;
  author: string;
  text: string;
  tag: string;
  votes: number;
  orderIndex: number | null;
  attachmentPath: string | null;
  createdAt: string;
}

export interface CardDraft {
  author: string;
  text: string;
  tag: string;
  orderIndex: number;
  attachmentPath: string | null;
}

export interface StoredAttachment {
  name: string;
  stored: string;
  mime: string;
}

/**
 * A chat message in any room kind. Board messages carry `boardId`, direct
 * messages carry `receiverId`, and group messages carry neither.
 */
export interface ChatMessage {
  id: number;
  roomKey: string;
  boardId: number | null;
  authorId: string | null;
  author: string;
  receiverId: string | null;
  text: string;
  channel: string;
  replyTo: number | null;
  pinned: boolean;
  attachments: StoredAttachment[];
  voicePath: string | null;
  editedAt: string | null;
  deletedAt: string | null;
  readAt: string | null;
  createdAt: string;
}

export interface ChatMessageDraft {
  roomKey: string;
  boardId: number | null;
  authorId: string | null;
  author: string;
  receiverId: string | null;
  text: string;
  channel: string;
  replyTo: number | null;
  attachments: StoredAttachment[];
  voicePath: string | null;
}

export interface ReactionTally {
  emoji: string;
  count: number;
}

export type ActivityKind =
  | 'card_created'
  | 'card_voted'
  | 'cards_reordered'
  | 'message_posted'
  | 'message_reaction'
  | 'message_pin'
  | 'message_edit'
  | 'message_delete'
  | 'theme_changed'
  | 'title_changed'
  | 'invite_created';

export interface ActivityEntry {
  id: number;
  boardId: number;
  userId: string | null;
  username: string | null;
  kind: ActivityKind;
  payload: Record<string, unknown>;
  createdAt: string;
}

export type PresenceAction = 'join' | 'leave';

export interface PresenceEntry {
  id: number;
  boardId: number;
  userId: string | null;
  username: string | null;
  action: PresenceAction;
  details: string | null;
  createdAt: string;
}

export interface UserProfile {
  id: string;
  username: string;
  displayName: string;
  avatar: string | null;
  badge: string;
  status: string;
}

export interface GroupRoom {
  id: number;
  slug: string;
  title: string;
}
