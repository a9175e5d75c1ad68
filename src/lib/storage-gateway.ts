import type {
  ActivityEntry,
  ActivityKind,
  Board,
  Card,
  CardDraft,
  ChatMessage,
  ChatMessageDraft,
  GroupRoom,
  PresenceAction,
  PresenceEntry,
  ReactionTally,
  UserProfile,
} from '../types/board';
import type { BoardInvite, BoardMemberEntry, BoardRole } from '../types/sharing';

export interface CreateBoardInput {
  code: string;
  ownerId: string | null;
  template: string | null;
}

export type BoardSettingsPatch = Partial<Pick<Board, 'title' | 'theme'>>;

export interface SearchResults {
  cards: Card[];
  messages: ChatMessage[];
}

/**
 * Durable storage consumed by the realtime core. Each call is atomic on its
 * own; there is no cross-call transaction. Callers serialize per room.
 */
export interface StorageGateway {
  // Boards
  getBoardByCode(code: string): Promise<Board | null>;
  createBoard(input: CreateBoardInput): Promise<Board>;
  updateBoard(boardId: number, patch: BoardSettingsPatch): Promise<Board | null>;

  // Cards
  listCards(boardId: number): Promise<Card[]>;
  maxCardOrderIndex(boardId: number): Promise<number | null>;
  insertCard(boardId: number, draft: CardDraft): Promise<Card>;
  incrementCardVotes(boardId: number, cardId: number): Promise<Card | null>;
  updateCardOrder(boardId: number, orderedIds: readonly number[]): Promise<void>;

  // Messages (board, direct and group rooms share one shape)
  insertMessage(draft: ChatMessageDraft): Promise<ChatMessage>;
  getMessage(messageId: number): Promise<ChatMessage | null>;
  /** Most recent first, soft-deleted rows included. */
  listRecentMessages(roomKey: string, limit: number): Promise<ChatMessage[]>;
  setMessageEdited(messageId: number, text: string): Promise<ChatMessage | null>;
  setMessageDeleted(messageId: number): Promise<ChatMessage | null>;
  toggleMessagePinned(messageId: number): Promise<ChatMessage | null>;
  markMessageRead(messageId: number, userId: string): Promise<ChatMessage | null>;

  // Reactions
  /** Insert the triple, or delete it if it already exists. Returns true when inserted. */
  toggleReaction(messageId: number, userId: string, emoji: string): Promise<boolean>;
  listReactions(messageIds: readonly number[]): Promise<Map<number, ReactionTally[]>>;

  // Membership
  getMemberRole(boardId: number, userId: string): Promise<BoardRole | null>;
  /** Insert with `role` unless a row already exists; never downgrades. */
  ensureMember(boardId: number, userId: string, role?: BoardRole): Promise<BoardRole>;
  setMemberRole(boardId: number, userId: string, role: BoardRole): Promise<void>;
  listMembers(boardId: number): Promise<BoardMemberEntry[]>;

  // Logs
  logActivity(
    boardId: number,
    kind: ActivityKind,
    userId: string | null,
    payload?: Record<string, unknown>,
  ): Promise<void>;
  listActivity(boardId: number, limit: number): Promise<ActivityEntry[]>;
  recordPresence(
    boardId: number,
    userId: string | null,
    action: PresenceAction,
    details: string | null,
  ): Promise<void>;
  listPresenceHistory(boardId: number, limit: number): Promise<PresenceEntry[]>;

  // Users and group rooms
  getUserById(userId: string): Promise<UserProfile | null>;
  getUserByUsername(username: string): Promise<UserProfile | null>;
  getGroupBySlug(slug: string): Promise<GroupRoom | null>;

  // Search
  searchBoard(boardId: number, term: string, channel: string | null, limit: number): Promise<SearchResults>;

  // Invites
  createInvite(invite: BoardInvite): Promise<void>;
  getInvite(token: string): Promise<BoardInvite | null>;
  getBoardById(boardId: number): Promise<Board | null>;
}
