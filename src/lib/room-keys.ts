export type RoomKind = 'board' | 'direct' | 'group';

export type RoomRef =
  | { kind: 'board'; code: string }
  | { kind: 'direct'; userA: string; userB: string }
  | { kind: 'group'; slug: string };

/**
 * Stable broadcast key for a room. A direct-message pair maps to the same key
 * regardless of which side opens it. User ids are opaque, so each side is
 * percent-encoded and the `:` separator cannot appear inside either one.
 */
export function roomKey(ref: RoomRef): string {
  switch (ref.kind) {
    case 'board':
      return `board_${ref.code}`;
    case 'direct': {
      const [lo, hi] = [ref.userA, ref.userB].sort();
      return `dm_${encodeURIComponent(lo)}:${encodeURIComponent(hi)}`;
    }
    case 'group':
      return `group_${ref.slug}`;
  }
}

export function boardRoom(code: string): string {
  return roomKey({ kind: 'board', code });
}

export function directRoom(userA: string, userB: string): string {
  return roomKey({ kind: 'direct', userA, userB });
}

export function groupRoom(slug: string): string {
  return roomKey({ kind: 'group', slug });
}

export function roomKindOf(key: string): RoomKind | null {
  if (key.startsWith('board_')) return 'board';
  if (key.startsWith('dm_')) return 'direct';
  if (key.startsWith('group_')) return 'group';
  return null;
}

/** Board code for a board room key, or null for other room kinds. */
export function boardCodeOf(key: string): string | null {
  return roomKindOf(key) === 'board' ? key.slice('board_'.length) : null;
}
