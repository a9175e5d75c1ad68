import {
  DEFAULT_ACCENT_COLOR,
  DEFAULT_BACKGROUND_ANIMATION,
  DEFAULT_BOARD_TITLE,
  DEFAULT_THEME,
} from '../constants';
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
import { sortMembersByRole } from './access';
import { tallyReactions, type ReactionRow } from './reactions';
import type {
  BoardSettingsPatch,
  CreateBoardInput,
  SearchResults,
  StorageGateway,
} from './storage-gateway';

type ActivityRow = Omit<ActivityEntry, 'username'>;
type PresenceRow = Omit<PresenceEntry, 'username'>;

type Sequence = 'boards' | 'cards' | 'messages' | 'activity' | 'presence' | 'groups';

export interface MemoryStorageSeed {
  users?: UserProfile[];
  groups?: Array<Omit<GroupRoom, 'id'>>;
}

/**
 * In-process storage gateway used by tests and `STORAGE_DRIVER=memory`.
 * Every method resolves on a later microtask so callers see the same
 * suspension points as with a networked store.
 */
export class MemoryStorage implements StorageGateway {
  private readonly boards = new Map<number, Board>();
  private readonly cards = new Map<number, Card>();
  private readonly messages = new Map<number, ChatMessage>();
  private readonly reactions: ReactionRow[] = [];
  private readonly members = new Map<string, BoardRole>();
  private readonly activity: ActivityRow[] = [];
  private readonly presence: PresenceRow[] = [];
  private readonly users = new Map<string, UserProfile>();
  private readonly groups = new Map<string, GroupRoom>();
  private readonly invites = new Map<string, BoardInvite>();
  private readonly sequences = new Map<Sequence, number>();
  private readonly clock: () => string;

  constructor(seed: MemoryStorageSeed = {}, clock: () => string = () => new Date().toISOString()) {
    this.clock = clock;
    for (const user of seed.users ?? []) {
      this.users.set(user.id, { ...user, username: user.username.toLowerCase() });
    }
    const groups = seed.groups && seed.groups.length > 0 ? seed.groups : [{ slug: 'lobby', title: 'Community Lounge' }];
    for (const group of groups) {
      this.groups.set(group.slug, { id: this.nextId('groups'), ...group });
    }
  }

  addUser(user: UserProfile): void {
    this.users.set(user.id, { ...user, username: user.username.toLowerCase() });
  }

  async getBoardByCode(code: string): Promise<Board | null> {
    await tick();
    for (const board of this.boards.values()) {
      if (board.code === code) return { ...board };
    }
    return null;
  }

  async getBoardById(boardId: number): Promise<Board | null> {
    await tick();
    const board = this.boards.get(boardId);
    return board ? { ...board } : null;
  }

  async createBoard(input: CreateBoardInput): Promise<Board> {
    await tick();
    for (const board of this.boards.values()) {
      if (board.code === input.code) {
        throw new Error(`Board code ${input.code} already exists`);
      }
    }
    const board: Board = {
      id: this.nextId('boards'),
      code: input.code,
      title: DEFAULT_BOARD_TITLE,
      theme: DEFAULT_THEME,
      accentColor: DEFAULT_ACCENT_COLOR,
      backgroundAnimation: DEFAULT_BACKGROUND_ANIMATION,
      ownerId: input.ownerId,
      template: input.template,
      createdAt: this.clock(),
    };
    this.boards.set(board.id, board);
    if (input.ownerId) {
      this.members.set(memberKey(board.id, input.ownerId), 'owner');
    }
    return { ...board };
  }

  async updateBoard(boardId: number, patch: BoardSettingsPatch): Promise<Board | null> {
    await tick();
    const board = this.boards.get(boardId);
    if (!board) return null;
    Object.assign(board, patch);
    return { ...board };
  }

  async listCards(boardId: number): Promise<Card[]> {
    await tick();
    return Array.from(this.cards.values())
      .filter((card) => card.boardId === boardId)
      .map((card) => ({ ...card }));
  }

  async maxCardOrderIndex(boardId: number): Promise<number | null> {
    await tick();
    let max: number | null = null;
    for (const card of this.cards.values()) {
      if (card.boardId !== boardId || card.orderIndex === null) continue;
      max = max === null ? card.orderIndex : Math.max(max, card.orderIndex);
    }
    return max;
  }

  async insertCard(boardId: number, draft: CardDraft): Promise<Card> {
    await tick();
    const card: Card = {
      id: this.nextId('cards'),
      boardId,
      author: draft.author,
      text: draft.text,
      tag: draft.tag,
      votes: 0,
      orderIndex: draft.orderIndex,
      attachmentPath: draft.attachmentPath,
      createdAt: this.clock(),
    };
    this.cards.set(card.id, card);
    return { ...card };
  }

  async incrementCardVotes(boardId: number, cardId: number): Promise<Card | null> {
    await tick();
    const card = this.cards.get(cardId);
    if (!card || card.boardId !== boardId) return null;
    card.votes += 1;
    return { ...card };
  }

  async updateCardOrder(boardId: number, orderedIds: readonly number[]): Promise<void> {
    await tick();
    orderedIds.forEach((cardId, index) => {
      const card = this.cards.get(cardId);
      if (card && card.boardId === boardId) {
        card.orderIndex = index;
      }
    });
  }

  async insertMessage(draft: ChatMessageDraft): Promise<ChatMessage> {
    await tick();
    const message: ChatMessage = {
      id: this.nextId('messages'),
      ...draft,
      attachments: draft.attachments.map((file) => ({ ...file })),
      pinned: false,
      editedAt: null,
      deletedAt: null,
      readAt: null,
      createdAt: this.clock(),
    };
    this.messages.set(message.id, message);
    return cloneMessage(message);
  }

  async getMessage(messageId: number): Promise<ChatMessage | null> {
    await tick();
    const message = this.messages.get(messageId);
    return message ? cloneMessage(message) : null;
  }

  async listRecentMessages(roomKey: string, limit: number): Promise<ChatMessage[]> {
    await tick();
    return Array.from(this.messages.values())
      .filter((message) => message.roomKey === roomKey)
      .sort((a, b) => b.id - a.id)
      .slice(0, limit)
      .map(cloneMessage);
  }

  async setMessageEdited(messageId: number, text: string): Promise<ChatMessage | null> {
    return this.patchMessage(messageId, (message) => {
      message.text = text;
      message.editedAt = this.clock();
    });
  }

  async setMessageDeleted(messageId: number): Promise<ChatMessage | null> {
    return this.patchMessage(messageId, (message) => {
      message.deletedAt = message.deletedAt ?? this.clock();
    });
  }

  async toggleMessagePinned(messageId: number): Promise<ChatMessage | null> {
    return this.patchMessage(messageId, (message) => {
      message.pinned = !message.pinned;
    });
  }

  async markMessageRead(messageId: number, _userId: string): Promise<ChatMessage | null> {
    return this.patchMessage(messageId, (message) => {
      message.readAt = message.readAt ?? this.clock();
    });
  }

  async toggleReaction(messageId: number, userId: string, emoji: string): Promise<boolean> {
    await tick();
    const index = this.reactions.findIndex(
      (row) => row.messageId === messageId && row.userId === userId && row.emoji === emoji,
    );
    if (index >= 0) {
      this.reactions.splice(index, 1);
      return false;
    }
    this.reactions.push({ messageId, userId, emoji });
    return true;
  }

  async listReactions(messageIds: readonly number[]): Promise<Map<number, ReactionTally[]>> {
    await tick();
    const wanted = new Set(messageIds);
    return tallyReactions(this.reactions.filter((row) => wanted.has(row.messageId)));
  }

  async getMemberRole(boardId: number, userId: string): Promise<BoardRole | null> {
    await tick();
    return this.members.get(memberKey(boardId, userId)) ?? null;
  }

  async ensureMember(boardId: number, userId: string, role: BoardRole = 'member'): Promise<BoardRole> {
    await tick();
    const key = memberKey(boardId, userId);
    const existing = this.members.get(key);
    if (existing) return existing;
    this.members.set(key, role);
    return role;
  }

  async setMemberRole(boardId: number, userId: string, role: BoardRole): Promise<void> {
    await tick();
    this.members.set(memberKey(boardId, userId), role);
  }

  async listMembers(boardId: number): Promise<BoardMemberEntry[]> {
    await tick();
    const entries: BoardMemberEntry[] = [];
    for (const [key, role] of this.members) {
      const [rawBoardId, userId] = splitMemberKey(key);
      if (rawBoardId !== boardId) continue;
      const user = this.users.get(userId);
      entries.push({
        userId,
        username: user?.username ?? null,
        displayName: user?.displayName ?? null,
        avatar: user?.avatar ?? null,
        badge: user?.badge ?? null,
        status: user?.status ?? null,
        role,
      });
    }
    return sortMembersByRole(entries);
  }

  async logActivity(
    boardId: number,
    kind: ActivityKind,
    userId: string | null,
    payload: Record<string, unknown> = {},
  ): Promise<void> {
    await tick();
    this.activity.push({ id: this.nextId('activity'), boardId, userId, kind, payload: { ...payload }, createdAt: this.clock() });
  }

  async listActivity(boardId: number, limit: number): Promise<ActivityEntry[]> {
    await tick();
    return this.activity
      .filter((row) => row.boardId === boardId)
      .sort((a, b) => b.id - a.id)
      .slice(0, limit)
      .map((row) => ({ ...row, payload: { ...row.payload }, username: this.usernameOf(row.userId) }));
  }

  async recordPresence(
    boardId: number,
    userId: string | null,
    action: PresenceAction,
    details: string | null,
  ): Promise<void> {
    await tick();
    this.presence.push({ id: this.nextId('presence'), boardId, userId, action, details, createdAt: this.clock() });
  }

  async listPresenceHistory(boardId: number, limit: number): Promise<PresenceEntry[]> {
    await tick();
    return this.presence
      .filter((row) => row.boardId === boardId)
      .sort((a, b) => b.id - a.id)
      .slice(0, limit)
      .map((row) => ({ ...row, username: this.usernameOf(row.userId) }));
  }

  async getUserById(userId: string): Promise<UserProfile | null> {
    await tick();
    const user = this.users.get(userId);
    return user ? { ...user } : null;
  }

  async getUserByUsername(username: string): Promise<UserProfile | null> {
    await tick();
    const wanted = username.trim().toLowerCase();
    for (const user of this.users.values()) {
      if (user.username === wanted) return { ...user };
    }
    return null;
  }

  async getGroupBySlug(slug: string): Promise<GroupRoom | null> {
    await tick();
    const group = this.groups.get(slug);
    return group ? { ...group } : null;
  }

  async searchBoard(
    boardId: number,
    term: string,
    channel: string | null,
    limit: number,
  ): Promise<SearchResults> {
    await tick();
    const needle = term.toLowerCase();
    const cards = Array.from(this.cards.values())
      .filter((card) => card.boardId === boardId && card.text.toLowerCase().includes(needle))
      .sort((a, b) => b.id - a.id)
      .slice(0, limit)
      .map((card) => ({ ...card }));
    const messages = Array.from(this.messages.values())
      .filter(
        (message) =>
          message.boardId === boardId &&
          message.deletedAt === null &&
          (channel === null || message.channel === channel) &&
          message.text.toLowerCase().includes(needle),
      )
      .sort((a, b) => b.id - a.id)
      .slice(0, limit)
      .map(cloneMessage);
    return { cards, messages };
  }

  async createInvite(invite: BoardInvite): Promise<void> {
    await tick();
    this.invites.set(invite.token, { ...invite });
  }

  async getInvite(token: string): Promise<BoardInvite | null> {
    await tick();
    const invite = this.invites.get(token);
    return invite ? { ...invite } : null;
  }

  private async patchMessage(
    messageId: number,
    apply: (message: ChatMessage) => void,
  ): Promise<ChatMessage | null> {
    await tick();
    const message = this.messages.get(messageId);
    if (!message) return null;
    apply(message);
    return cloneMessage(message);
  }

  private usernameOf(userId: string | null): string | null {
    return userId ? this.users.get(userId)?.username ?? null : null;
  }

  private nextId(sequence: Sequence): number {
    const next = (this.sequences.get(sequence) ?? 0) + 1;
    this.sequences.set(sequence, next);
    return next;
  }
}

function tick(): Promise<void> {
  return Promise.resolve();
}

function memberKey(boardId: number, userId: string): string {
  return `${boardId}_${userId}`;
}

function splitMemberKey(key: string): [number, string] {
  const separator = key.indexOf('_');
  return [Number(key.slice(0, separator)), key.slice(separator + 1)];
}

function cloneMessage(message: ChatMessage): ChatMessage {
  return { ...message, attachments: message.attachments.map((file) => ({ ...file })) };
}
