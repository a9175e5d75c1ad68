export type BoardRole = 'owner' | 'moderator' | 'member' | 'viewer';

export interface BoardMemberEntry {
  userId: string;
  username: string | null;
  displayName: string | null;
  avatar: string | null;
  badge: string | null;
  status: string | null;
  role: BoardRole;
}

export interface BoardInvite {
  token: string;
  boardId: number;
  createdBy: string | null;
  expiresAt: string;
  createdAt: string;
}
