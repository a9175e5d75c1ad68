import type {
  ActivityEntry,
  Card,
  PresenceEntry,
  ReactionTally,
} from './board';
import type { BoardMemberEntry, BoardRole } from './sharing';

/** An authenticated person behind one or more connections. */
export interface Identity {
  userId: string;
  username: string;
  displayName: string;
}

export interface CursorPosition {
  x: number | null;
  y: number | null;
  color: string;
  author: string;
}

export interface AttachmentView {
  name: string;
  url: string;
  mime: string;
}

export interface CardView extends Card {
  attachmentUrl: string | null;
}

export interface MessageView {
  id: number;
  authorId: string | null;
  author: string;
  receiverId: string | null;
  text: string;
  html: string;
  channel: string;
  replyTo: number | null;
  pinned: boolean;
  attachments: AttachmentView[];
  voiceUrl: string | null;
  editedAt: string | null;
  deletedAt: string | null;
  readAt: string | null;
  createdAt: string;
  reactions: ReactionTally[];
}

export interface BoardStatePayload {
  cards: CardView[];
  messages: MessageView[];
  theme: string;
  title: string;
  board: {
    accent: string;
    background: string;
    code: string;
  };
  members: BoardMemberEntry[];
  activity: ActivityEntry[];
  presenceHistory: PresenceEntry[];
  channels: string[];
  role: BoardRole;
}

export interface DirectStatePayload {
  other: string;
  otherOnline: boolean;
  messages: MessageView[];
}

export interface PresencePayload {
  count: number;
  names: string[];
}

export interface TypingPayload {
  code: string;
  authors: string[];
}

export interface ReactionsPayload {
  messageId: number;
  reactions: ReactionTally[];
}

export interface ServerErrorPayload {
  code: string;
  message: string;
}

/** Payload of every event the server sends, keyed by event name. */
export interface OutboundPayloads {
  board_state: BoardStatePayload;
  presence: PresencePayload;
  typing: TypingPayload;
  cursors: CursorPosition[];
  card_added: CardView;
  card_updated: CardView;
  cards_reordered: { order: number[] };
  chat_added: MessageView;
  chat_reactions: ReactionsPayload;
  chat_pinned: { message: MessageView };
  chat_updated: MessageView;
  chat_deleted: { id: number };
  theme_changed: { theme: string };
  title_changed: { title: string };
  dm_state: DirectStatePayload;
  dm_new: MessageView;
  dm_typing: { authors: string[] };
  dm_reactions: ReactionsPayload;
  dm_updated: MessageView;
  dm_deleted: { id: number };
  dm_read: { id: number };
  group_history: MessageView[];
  group_new: MessageView;
  group_typing: string[];
  group_reactions: ReactionsPayload;
  group_updated: MessageView;
  group_deleted: { id: number };
  'server:error': ServerErrorPayload;
}

export type OutboundEventName = keyof OutboundPayloads;

export type ServerToClientEvents = {
  [E in OutboundEventName]: (payload: OutboundPayloads[E]) => void;
};

export const INBOUND_EVENTS = [
  'join_board',
  'leave',
  'create_card',
  'vote_card',
  'reorder_cards',
  'send_chat',
  'chat_react',
  'chat_pin',
  'chat_edit',
  'chat_delete',
  'typing',
  'stop_typing',
  'cursor_move',
  'set_theme',
  'set_title',
  'dm_join',
  'dm_send',
  'dm_typing',
  'dm_stop_typing',
  'dm_react',
  'dm_edit',
  'dm_delete',
  'dm_read',
  'group_join',
  'group_send',
  'group_typing',
  'group_stop_typing',
  'group_react',
  'group_edit',
  'group_delete',
] as const;

export type InboundEventName = (typeof INBOUND_EVENTS)[number];

export type AckResponse = { ok: true } | { ok: false; code: string; message: string };

export type AckCallback = (response: AckResponse) => void;

/**
 * Inbound payloads are validated field by field at runtime, so every
 * listener takes `unknown`.
 */
export type ClientToServerEvents = {
  [E in InboundEventName]: (payload: unknown, ack?: AckCallback) => void;
};
