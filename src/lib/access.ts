import type { BoardRole } from '../types/sharing';
import type { ChatMessage } from '../types/board';
import type { Identity } from '../types/realtime';
export type { BoardRole } from '../types/sharing';

const ROLE_POWER: Record<BoardRole, number> = {
  viewer: 0,
  member: 1,
  moderator: 2,
  owner: 3,
};

export function normalizeBoardRole(value: unknown): BoardRole | null {
  if (value === 'owner' || value === 'moderator' || value === 'member' || value === 'viewer') {
    return value;
  }
  return null;
}

/** True when `role` is at least `minimum`. A missing role counts as viewer. */
export function hasRole(role: BoardRole | null | undefined, minimum: BoardRole): boolean {
  return ROLE_POWER[role ?? 'viewer'] >= ROLE_POWER[minimum];
}

/** Role reported to a requester in a board snapshot. */
export function effectiveRole(identity: Identity | null, memberRole: BoardRole | null): BoardRole {
  if (!identity) {
    return 'viewer';
  }
  return memberRole ?? 'viewer';
}

/** Board chat: the author, or anyone at moderator level and above. */
export function canModerateBoardMessage(
  identity: Identity,
  message: Pick<ChatMessage, 'authorId'>,
  memberRole: BoardRole | null,
): boolean {
  if (message.authorId !== null && message.authorId === identity.userId) {
    return true;
  }
  return hasRole(memberRole, 'moderator');
}

/** Direct and group rooms have no role gate: only the sender may change a message. */
export function isMessageSender(identity: Identity, message: Pick<ChatMessage, 'authorId'>): boolean {
  return message.authorId !== null && message.authorId === identity.userId;
}

export function sortMembersByRole<T extends { role: BoardRole; username: string | null }>(
  members: readonly T[],
): T[] {
  return [...members].sort((a, b) => {
    const byRole = ROLE_POWER[b.role] - ROLE_POWER[a.role];
    if (byRole !== 0) return byRole;
    return (a.username || '').localeCompare(b.username || '');
  });
}
