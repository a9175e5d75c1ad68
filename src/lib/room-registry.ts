import type { CursorPosition } from '../types/realtime';

interface TypingEntry {
  name: string;
  expiresAt: number | null;
}

interface RoomEntry {
  members: Map<string, string>;
  typing: Map<string, TypingEntry>;
  cursors: Map<string, CursorPosition>;
}

/**
 * Process-local ephemeral room state: who is joined, who is typing and where
 * their cursors are. Every method completes synchronously; callers serialize
 * access per room through the room lock.
 */
export class RoomRegistry {
  private readonly rooms = new Map<string, RoomEntry>();
  private readonly connectionRooms = new Map<string, Set<string>>();

  /** Admit a connection, or refresh its display name if already joined. */
  join(roomKey: string, connId: string, displayName: string): number {
    const room = this.ensureRoom(roomKey);
    room.members.set(connId, displayName);
    let joined = this.connectionRooms.get(connId);
    if (!joined) {
      joined = new Set();
      this.connectionRooms.set(connId, joined);
    }
    joined.add(roomKey);
    return room.members.size;
  }

  /** Remove a connection and every typing/cursor entry it owns in the room. */
  leave(roomKey: string, connId: string): boolean {
    const room = this.rooms.get(roomKey);
    const joined = this.connectionRooms.get(connId);
    if (joined) {
      joined.delete(roomKey);
      if (joined.size === 0) this.connectionRooms.delete(connId);
    }
    if (!room || !room.members.has(connId)) {
      return false;
    }
    room.members.delete(connId);
    room.typing.delete(connId);
    room.cursors.delete(connId);
    if (room.members.size === 0) {
      this.rooms.delete(roomKey);
    }
    return true;
  }

  /** Set or clear (`name === null`) a connection's typing flag. Non-members are ignored. */
  setTyping(roomKey: string, connId: string, name: string | null, expiresAt: number | null = null): boolean {
    const room = this.rooms.get(roomKey);
    if (!room || !room.members.has(connId)) {
      return false;
    }
    if (name === null) {
      return room.typing.delete(connId);
    }
    room.typing.set(connId, { name, expiresAt });
    return true;
  }

  /** Set or clear (`position === null`) a connection's cursor. Non-members are ignored. */
  setCursor(roomKey: string, connId: string, position: CursorPosition | null): boolean {
    const room = this.rooms.get(roomKey);
    if (!room || !room.members.has(connId)) {
      return false;
    }
    if (position === null) {
      return room.cursors.delete(connId);
    }
    room.cursors.set(connId, position);
    return true;
  }

  has(roomKey: string, connId: string): boolean {
    return this.rooms.get(roomKey)?.members.has(connId) ?? false;
  }

  members(roomKey: string): string[] {
    return Array.from(this.rooms.get(roomKey)?.members.keys() ?? []);
  }

  memberCount(roomKey: string): number {
    return this.rooms.get(roomKey)?.members.size ?? 0;
  }

  /** Sorted, non-empty display names of the current members. */
  memberNames(roomKey: string): string[] {
    const names = Array.from(this.rooms.get(roomKey)?.members.values() ?? []);
    return names.filter(Boolean).sort();
  }

  /**
   * Distinct names currently typing, in the order they started. Entries whose
   * expiry is at or before `now` are purged first.
   */
  typingAuthors(roomKey: string, now = Date.now()): string[] {
    const room = this.rooms.get(roomKey);
    if (!room) return [];
    const authors: string[] = [];
    for (const [connId, entry] of room.typing) {
      if (entry.expiresAt !== null && entry.expiresAt <= now) {
        room.typing.delete(connId);
        continue;
      }
      if (entry.name && !authors.includes(entry.name)) {
        authors.push(entry.name);
      }
    }
    return authors;
  }

  /** Drop typing entries expired at `now`. Returns true when any were removed. */
  expireTyping(roomKey: string, now = Date.now()): boolean {
    const room = this.rooms.get(roomKey);
    if (!room) return false;
    let removed = false;
    for (const [connId, entry] of room.typing) {
      if (entry.expiresAt !== null && entry.expiresAt <= now) {
        room.typing.delete(connId);
        removed = true;
      }
    }
    return removed;
  }

  /** Earliest pending typing expiry in the room. */
  nextTypingExpiry(roomKey: string): number | null {
    const room = this.rooms.get(roomKey);
    if (!room) return null;
    let next: number | null = null;
    for (const entry of room.typing.values()) {
      if (entry.expiresAt !== null && (next === null || entry.expiresAt < next)) {
        next = entry.expiresAt;
      }
    }
    return next;
  }

  cursors(roomKey: string): CursorPosition[] {
    return Array.from(this.rooms.get(roomKey)?.cursors.values() ?? []);
  }

  roomsOf(connId: string): string[] {
    return Array.from(this.connectionRooms.get(connId) ?? []);
  }

  roomCount(): number {
    return this.rooms.size;
  }

  clear(): void {
    this.rooms.clear();
    this.connectionRooms.clear();
  }

  private ensureRoom(roomKey: string): RoomEntry {
    let room = this.rooms.get(roomKey);
    if (!room) {
      room = { members: new Map(), typing: new Map(), cursors: new Map() };
      this.rooms.set(roomKey, room);
    }
    return room;
  }
}
