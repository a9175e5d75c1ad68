import { FieldValue, type DocumentData, type Firestore } from 'firebase-admin/firestore';
import {
  DEFAULT_ACCENT_COLOR,
  DEFAULT_BACKGROUND_ANIMATION,
  DEFAULT_BOARD_TITLE,
  DEFAULT_CHANNEL,
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
  StoredAttachment,
  UserProfile,
} from '../types/board';
import type { BoardInvite, BoardMemberEntry, BoardRole } from '../types/sharing';
import { normalizeBoardRole, sortMembersByRole } from './access';
import { withFirestoreTimeout } from './firestore-client';
import { tallyReactions, type ReactionRow } from './reactions';
import type {
  BoardSettingsPatch,
  CreateBoardInput,
  SearchResults,
  StorageGateway,
} from './storage-gateway';

const COLLECTIONS = {
  boards: 'boards',
  cards: 'cards',
  messages: 'messages',
  reactions: 'messageReactions',
  members: 'boardMembers',
  activity: 'boardActivity',
  presence: 'presenceHistory',
  users: 'users',
  groups: 'groupRooms',
  invites: 'boardInvites',
  counters: 'counters',
} as const;

type Sequence = 'boards' | 'cards' | 'messages' | 'activity' | 'presence' | 'groups';

/** One document per (message, user, emoji); both free-text parts are percent-encoded. */
export function reactionDocId(messageId: number, userId: string, emoji: string): string {
  return `${messageId}:${encodeURIComponent(userId)}:${encodeURIComponent(emoji)}`;
}

/** Firestore caps `in` filters at 30 values. */
const IN_QUERY_CHUNK = 30;

/** Firestore has no substring match; search scans this many recent rows. */
const SEARCH_SCAN_LIMIT = 500;

// --------------------------------------------------------------------------
// Field readers: documents are validated on the way in
// --------------------------------------------------------------------------

function readString(value: unknown, fallback = ''): string {
  return typeof value === 'string' ? value : fallback;
}

function readNullableString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function readNumber(value: unknown, fallback = 0): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function readNullableNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function readRecord(value: unknown): Record<string, unknown> {
  if (value && typeof value === 'object' && !Array.isArray(value)) {
    return { ...value };
  }
  return {};
}

function readAttachments(value: unknown): StoredAttachment[] {
  if (!Array.isArray(value)) return [];
  const files: StoredAttachment[] = [];
  for (const item of value) {
    const record = readRecord(item);
    const stored = readString(record.stored);
    if (!stored) continue;
    files.push({ name: readString(record.name, stored), stored, mime: readString(record.mime) });
  }
  return files;
}

function toBoard(data: DocumentData): Board {
  return {
    id: readNumber(data.id),
    code: readString(data.code),
    title: readString(data.title, DEFAULT_BOARD_TITLE),
    theme: readString(data.theme, DEFAULT_THEME),
    accentColor: readString(data.accentColor, DEFAULT_ACCENT_COLOR),
    backgroundAnimation: readString(data.backgroundAnimation, DEFAULT_BACKGROUND_ANIMATION),
    ownerId: readNullableString(data.ownerId),
    template: readNullableString(data.template),
    createdAt: readString(data.createdAt),
  };
}

function toCard(data: DocumentData): Card {
  return {
    id: readNumber(data.id),
    boardId: readNumber(data.boardId),
    author: readString(data.author),
    text: readString(data.text),
    tag: readString(data.tag),
    votes: readNumber(data.votes),
    orderIndex: readNullableNumber(data.orderIndex),
    attachmentPath: readNullableString(data.attachmentPath),
    createdAt: readString(data.createdAt),
  };
}

function toMessage(data: DocumentData): ChatMessage {
  return {
    id: readNumber(data.id),
    roomKey: readString(data.roomKey),
    boardId: readNullableNumber(data.boardId),
    authorId: readNullableString(data.authorId),
    author: readString(data.author),
    receiverId: readNullableString(data.receiverId),
    text: readString(data.text),
    channel: readString(data.channel, DEFAULT_CHANNEL),
    replyTo: readNullableNumber(data.replyTo),
    pinned: data.pinned === true,
    attachments: readAttachments(data.attachments),
    voicePath: readNullableString(data.voicePath),
    editedAt: readNullableString(data.editedAt),
    deletedAt: readNullableString(data.deletedAt),
    readAt: readNullableString(data.readAt),
    createdAt: readString(data.createdAt),
  };
}

function toUser(id: string, data: DocumentData): UserProfile {
  const username = readString(data.username, id).toLowerCase();
  return {
    id,
    username,
    displayName: readString(data.displayName, username),
    avatar: readNullableString(data.avatar),
    badge: readString(data.badge, 'Member'),
    status: readString(data.status, 'offline'),
  };
}

function toInvite(data: DocumentData): BoardInvite {
  return {
    token: readString(data.token),
    boardId: readNumber(data.boardId),
    createdBy: readNullableString(data.createdBy),
    expiresAt: readString(data.expiresAt),
    createdAt: readString(data.createdAt),
  };
}

function isActivityKind(value: unknown): value is ActivityKind {
  return (
    value === 'card_created' ||
    value === 'card_voted' ||
    value === 'cards_reordered' ||
    value === 'message_posted' ||
    value === 'message_reaction' ||
    value === 'message_pin' ||
    value === 'message_edit' ||
    value === 'message_delete' ||
    value === 'theme_changed' ||
    value === 'title_changed' ||
    value === 'invite_created'
  );
}

function chunk<T>(values: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let index = 0; index < values.length; index += size) {
    chunks.push(values.slice(index, index + size));
  }
  return chunks;
}

function nowIso(): string {
  return new Date().toISOString();
}

export interface FirestoreStorageOptions {
  timeoutMs?: number;
}

/**
 * Storage gateway backed by Firestore through firebase-admin. Numeric ids
 * come from per-collection counters allocated in transactions.
 */
export class FirestoreStorage implements StorageGateway {
  private readonly timeoutMs: number | undefined;

  constructor(
    private readonly db: Firestore,
    options: FirestoreStorageOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs;
  }

  private run<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return withFirestoreTimeout(label, operation(), this.timeoutMs);
  }

  private async nextId(sequence: Sequence): Promise<number> {
    const ref = this.db.collection(COLLECTIONS.counters).doc(sequence);
    return this.db.runTransaction(async (tx) => {
      const snapshot = await tx.get(ref);
      const next = readNumber(snapshot.data()?.value) + 1;
      tx.set(ref, { value: next });
      return next;
    });
  }

  getBoardByCode(code: string): Promise<Board | null> {
    return this.run('getBoardByCode', async () => {
      const snapshot = await this.db.collection(COLLECTIONS.boards).where('code', '==', code).limit(1).get();
      const doc = snapshot.docs[0];
      return doc ? toBoard(doc.data()) : null;
    });
  }

  getBoardById(boardId: number): Promise<Board | null> {
    return this.run('getBoardById', async () => {
      const snapshot = await this.db.collection(COLLECTIONS.boards).doc(String(boardId)).get();
      const data = snapshot.data();
      return snapshot.exists && data ? toBoard(data) : null;
    });
  }

  createBoard(input: CreateBoardInput): Promise<Board> {
    return this.run('createBoard', async () => {
      const id = await this.nextId('boards');
      const board: Board = {
        id,
        code: input.code,
        title: DEFAULT_BOARD_TITLE,
        theme: DEFAULT_THEME,
        accentColor: DEFAULT_ACCENT_COLOR,
        backgroundAnimation: DEFAULT_BACKGROUND_ANIMATION,
        ownerId: input.ownerId,
        template: input.template,
        createdAt: nowIso(),
      };
      const batch = this.db.batch();
      batch.create(this.db.collection(COLLECTIONS.boards).doc(String(id)), { ...board });
      if (input.ownerId) {
        batch.set(this.db.collection(COLLECTIONS.members).doc(`${id}_${input.ownerId}`), {
          boardId: id,
          userId: input.ownerId,
          role: 'owner',
          joinedAt: board.createdAt,
        });
      }
      await batch.commit();
      return board;
    });
  }

  updateBoard(boardId: number, patch: BoardSettingsPatch): Promise<Board | null> {
    return this.run('updateBoard', async () => {
      const ref = this.db.collection(COLLECTIONS.boards).doc(String(boardId));
      const snapshot = await ref.get();
      if (!snapshot.exists) return null;
      await ref.update({ ...patch });
      const updated = (await ref.get()).data();
      return updated ? toBoard(updated) : null;
    });
  }

  listCards(boardId: number): Promise<Card[]> {
    return this.run('listCards', async () => {
      const snapshot = await this.db.collection(COLLECTIONS.cards).where('boardId', '==', boardId).get();
      return snapshot.docs.map((doc) => toCard(doc.data()));
    });
  }

  maxCardOrderIndex(boardId: number): Promise<number | null> {
    return this.run('maxCardOrderIndex', async () => {
      const snapshot = await this.db
        .collection(COLLECTIONS.cards)
        .where('boardId', '==', boardId)
        .orderBy('orderIndex', 'desc')
        .limit(1)
        .get();
      const doc = snapshot.docs[0];
      return doc ? readNullableNumber(doc.data().orderIndex) : null;
    });
  }

  insertCard(boardId: number, draft: CardDraft): Promise<Card> {
    return this.run('insertCard', async () => {
      const id = await this.nextId('cards');
      const card: Card = { id, boardId, ...draft, votes: 0, createdAt: nowIso() };
      await this.db.collection(COLLECTIONS.cards).doc(String(id)).create({ ...card });
      return card;
    });
  }

  incrementCardVotes(boardId: number, cardId: number): Promise<Card | null> {
    return this.run('incrementCardVotes', async () => {
      const ref = this.db.collection(COLLECTIONS.cards).doc(String(cardId));
      const snapshot = await ref.get();
      const data = snapshot.data();
      if (!snapshot.exists || !data || readNumber(data.boardId) !== boardId) return null;
      await ref.update({ votes: FieldValue.increment(1) });
      const updated = (await ref.get()).data();
      return updated ? toCard(updated) : null;
    });
  }

  updateCardOrder(boardId: number, orderedIds: readonly number[]): Promise<void> {
    return this.run('updateCardOrder', async () => {
      if (orderedIds.length === 0) return;
      const refs = orderedIds.map((cardId) => this.db.collection(COLLECTIONS.cards).doc(String(cardId)));
      const snapshots = await this.db.getAll(...refs);
      const batch = this.db.batch();
      snapshots.forEach((snapshot, index) => {
        const data = snapshot.data();
        if (snapshot.exists && data && readNumber(data.boardId) === boardId) {
          batch.update(snapshot.ref, { orderIndex: index });
        }
      });
      await batch.commit();
    });
  }

  insertMessage(draft: ChatMessageDraft): Promise<ChatMessage> {
    return this.run('insertMessage', async () => {
      const id = await this.nextId('messages');
      const message: ChatMessage = {
        id,
        ...draft,
        pinned: false,
        editedAt: null,
        deletedAt: null,
        readAt: null,
        createdAt: nowIso(),
      };
      await this.db.collection(COLLECTIONS.messages).doc(String(id)).create({ ...message });
      return message;
    });
  }

  getMessage(messageId: number): Promise<ChatMessage | null> {
    return this.run('getMessage', async () => {
      const snapshot = await this.db.collection(COLLECTIONS.messages).doc(String(messageId)).get();
      const data = snapshot.data();
      return snapshot.exists && data ? toMessage(data) : null;
    });
  }

  listRecentMessages(roomKey: string, limit: number): Promise<ChatMessage[]> {
    return this.run('listRecentMessages', async () => {
      const snapshot = await this.db
        .collection(COLLECTIONS.messages)
        .where('roomKey', '==', roomKey)
        .orderBy('id', 'desc')
        .limit(limit)
        .get();
      return snapshot.docs.map((doc) => toMessage(doc.data()));
    });
  }

  setMessageEdited(messageId: number, text: string): Promise<ChatMessage | null> {
    return this.patchMessage('setMessageEdited', messageId, () => ({ text, editedAt: nowIso() }));
  }

  setMessageDeleted(messageId: number): Promise<ChatMessage | null> {
    return this.patchMessage('setMessageDeleted', messageId, (current) =>
      current.deletedAt ? {} : { deletedAt: nowIso() },
    );
  }

  toggleMessagePinned(messageId: number): Promise<ChatMessage | null> {
    return this.patchMessage('toggleMessagePinned', messageId, (current) => ({ pinned: !current.pinned }));
  }

  markMessageRead(messageId: number, _userId: string): Promise<ChatMessage | null> {
    return this.patchMessage('markMessageRead', messageId, (current) =>
      current.readAt ? {} : { readAt: nowIso() },
    );
  }

  private patchMessage(
    label: string,
    messageId: number,
    buildPatch: (current: ChatMessage) => Partial<ChatMessage>,
  ): Promise<ChatMessage | null> {
    return this.run(label, async () => {
      const ref = this.db.collection(COLLECTIONS.messages).doc(String(messageId));
      return this.db.runTransaction(async (tx) => {
        const snapshot = await tx.get(ref);
        const data = snapshot.data();
        if (!snapshot.exists || !data) return null;
        const current = toMessage(data);
        const patch = buildPatch(current);
        if (Object.keys(patch).length > 0) {
          tx.update(ref, { ...patch });
        }
        return { ...current, ...patch };
      });
    });
  }

  toggleReaction(messageId: number, userId: string, emoji: string): Promise<boolean> {
    return this.run('toggleReaction', async () => {
      const ref = this.db.collection(COLLECTIONS.reactions).doc(reactionDocId(messageId, userId, emoji));
      return this.db.runTransaction(async (tx) => {
        const snapshot = await tx.get(ref);
        if (snapshot.exists) {
          tx.delete(ref);
          return false;
        }
        tx.create(ref, { messageId, userId, emoji, createdAt: nowIso() });
        return true;
      });
    });
  }

  listReactions(messageIds: readonly number[]): Promise<Map<number, ReactionTally[]>> {
    return this.run('listReactions', async () => {
      const rows: ReactionRow[] = [];
      for (const ids of chunk(messageIds, IN_QUERY_CHUNK)) {
        const snapshot = await this.db.collection(COLLECTIONS.reactions).where('messageId', 'in', ids).get();
        for (const doc of snapshot.docs) {
          const data = doc.data();
          rows.push({
            messageId: readNumber(data.messageId),
            userId: readString(data.userId),
            emoji: readString(data.emoji),
          });
        }
      }
      return tallyReactions(rows);
    });
  }

  getMemberRole(boardId: number, userId: string): Promise<BoardRole | null> {
    return this.run('getMemberRole', async () => {
      const snapshot = await this.db.collection(COLLECTIONS.members).doc(`${boardId}_${userId}`).get();
      return snapshot.exists ? normalizeBoardRole(snapshot.data()?.role) : null;
    });
  }

  ensureMember(boardId: number, userId: string, role: BoardRole = 'member'): Promise<BoardRole> {
    return this.run('ensureMember', async () => {
      const ref = this.db.collection(COLLECTIONS.members).doc(`${boardId}_${userId}`);
      return this.db.runTransaction(async (tx) => {
        const snapshot = await tx.get(ref);
        const existing = snapshot.exists ? normalizeBoardRole(snapshot.data()?.role) : null;
        if (existing) return existing;
        tx.set(ref, { boardId, userId, role, joinedAt: nowIso() });
        return role;
      });
    });
  }

  setMemberRole(boardId: number, userId: string, role: BoardRole): Promise<void> {
    return this.run('setMemberRole', async () => {
      await this.db
        .collection(COLLECTIONS.members)
        .doc(`${boardId}_${userId}`)
        .set({ boardId, userId, role }, { merge: true });
    });
  }

  listMembers(boardId: number): Promise<BoardMemberEntry[]> {
    return this.run('listMembers', async () => {
      const snapshot = await this.db.collection(COLLECTIONS.members).where('boardId', '==', boardId).get();
      const rows = snapshot.docs.map((doc) => ({
        userId: readString(doc.data().userId),
        role: normalizeBoardRole(doc.data().role) ?? 'member',
      }));
      const users = await this.loadUsers(rows.map((row) => row.userId));
      return sortMembersByRole(
        rows.map((row) => {
          const user = users.get(row.userId);
          return {
            userId: row.userId,
            username: user?.username ?? null,
            displayName: user?.displayName ?? null,
            avatar: user?.avatar ?? null,
            badge: user?.badge ?? null,
            status: user?.status ?? null,
            role: row.role,
          };
        }),
      );
    });
  }

  logActivity(
    boardId: number,
    kind: ActivityKind,
    userId: string | null,
    payload: Record<string, unknown> = {},
  ): Promise<void> {
    return this.run('logActivity', async () => {
      const id = await this.nextId('activity');
      await this.db
        .collection(COLLECTIONS.activity)
        .doc(String(id))
        .create({ id, boardId, userId, kind, payload, createdAt: nowIso() });
    });
  }

  listActivity(boardId: number, limit: number): Promise<ActivityEntry[]> {
    return this.run('listActivity', async () => {
      const snapshot = await this.db
        .collection(COLLECTIONS.activity)
        .where('boardId', '==', boardId)
        .orderBy('id', 'desc')
        .limit(limit)
        .get();
      const rows = snapshot.docs.map((doc) => doc.data());
      const users = await this.loadUsers(rows.map((row) => readString(row.userId)).filter(Boolean));
      const entries: ActivityEntry[] = [];
      for (const row of rows) {
        if (!isActivityKind(row.kind)) continue;
        const userId = readNullableString(row.userId);
        entries.push({
          id: readNumber(row.id),
          boardId,
          userId,
          username: userId ? users.get(userId)?.username ?? null : null,
          kind: row.kind,
          payload: readRecord(row.payload),
          createdAt: readString(row.createdAt),
        });
      }
      return entries;
    });
  }

  recordPresence(
    boardId: number,
    userId: string | null,
    action: PresenceAction,
    details: string | null,
  ): Promise<void> {
    return this.run('recordPresence', async () => {
      const id = await this.nextId('presence');
      await this.db
        .collection(COLLECTIONS.presence)
        .doc(String(id))
        .create({ id, boardId, userId, action, details, createdAt: nowIso() });
    });
  }

  listPresenceHistory(boardId: number, limit: number): Promise<PresenceEntry[]> {
    return this.run('listPresenceHistory', async () => {
      const snapshot = await this.db
        .collection(COLLECTIONS.presence)
        .where('boardId', '==', boardId)
        .orderBy('id', 'desc')
        .limit(limit)
        .get();
      const rows = snapshot.docs.map((doc) => doc.data());
      const users = await this.loadUsers(rows.map((row) => readString(row.userId)).filter(Boolean));
      return rows.map((row) => {
        const userId = readNullableString(row.userId);
        const action: PresenceAction = row.action === 'leave' ? 'leave' : 'join';
        return {
          id: readNumber(row.id),
          boardId,
          userId,
          username: userId ? users.get(userId)?.username ?? null : null,
          action,
          details: readNullableString(row.details),
          createdAt: readString(row.createdAt),
        };
      });
    });
  }

  getUserById(userId: string): Promise<UserProfile | null> {
    return this.run('getUserById', async () => {
      const snapshot = await this.db.collection(COLLECTIONS.users).doc(userId).get();
      const data = snapshot.data();
      return snapshot.exists && data ? toUser(snapshot.id, data) : null;
    });
  }

  getUserByUsername(username: string): Promise<UserProfile | null> {
    return this.run('getUserByUsername', async () => {
      const snapshot = await this.db
        .collection(COLLECTIONS.users)
        .where('username', '==', username.trim().toLowerCase())
        .limit(1)
        .get();
      const doc = snapshot.docs[0];
      return doc ? toUser(doc.id, doc.data()) : null;
    });
  }

  getGroupBySlug(slug: string): Promise<GroupRoom | null> {
    return this.run('getGroupBySlug', async () => {
      const ref = this.db.collection(COLLECTIONS.groups).doc(slug);
      const snapshot = await ref.get();
      const data = snapshot.data();
      if (snapshot.exists && data) {
        return { id: readNumber(data.id), slug, title: readString(data.title, slug) };
      }
      if (slug !== 'lobby') return null;
      const existing = await this.db.collection(COLLECTIONS.groups).limit(1).get();
      if (!existing.empty) return null;
      const lobby: GroupRoom = { id: await this.nextId('groups'), slug: 'lobby', title: 'Community Lounge' };
      await ref.set({ ...lobby });
      return lobby;
    });
  }

  searchBoard(boardId: number, term: string, channel: string | null, limit: number): Promise<SearchResults> {
    return this.run('searchBoard', async () => {
      const needle = term.toLowerCase();
      const [cardSnapshot, messageSnapshot] = await Promise.all([
        this.db
          .collection(COLLECTIONS.cards)
          .where('boardId', '==', boardId)
          .orderBy('id', 'desc')
          .limit(SEARCH_SCAN_LIMIT)
          .get(),
        this.db
          .collection(COLLECTIONS.messages)
          .where('boardId', '==', boardId)
          .orderBy('id', 'desc')
          .limit(SEARCH_SCAN_LIMIT)
          .get(),
      ]);
      const cards = cardSnapshot.docs
        .map((doc) => toCard(doc.data()))
        .filter((card) => card.text.toLowerCase().includes(needle))
        .slice(0, limit);
      const messages = messageSnapshot.docs
        .map((doc) => toMessage(doc.data()))
        .filter(
          (message) =>
            message.deletedAt === null &&
            (channel === null || message.channel === channel) &&
            message.text.toLowerCase().includes(needle),
        )
        .slice(0, limit);
      return { cards, messages };
    });
  }

  createInvite(invite: BoardInvite): Promise<void> {
    return this.run('createInvite', async () => {
      await this.db.collection(COLLECTIONS.invites).doc(invite.token).create({ ...invite });
    });
  }

  getInvite(token: string): Promise<BoardInvite | null> {
    return this.run('getInvite', async () => {
      const snapshot = await this.db.collection(COLLECTIONS.invites).doc(token).get();
      const data = snapshot.data();
      return snapshot.exists && data ? toInvite(data) : null;
    });
  }

  private async loadUsers(userIds: readonly string[]): Promise<Map<string, UserProfile>> {
    const unique = Array.from(new Set(userIds));
    const users = new Map<string, UserProfile>();
    if (unique.length === 0) return users;
    const snapshots = await this.db.getAll(
      ...unique.map((userId) => this.db.collection(COLLECTIONS.users).doc(userId)),
    );
    for (const snapshot of snapshots) {
      const data = snapshot.data();
      if (snapshot.exists && data) {
        users.set(snapshot.id, toUser(snapshot.id, data));
      }
    }
    return users;
  }
}
