import { randomBytes } from 'node:crypto';
import type { VercelRequest, VercelResponse } from '@vercel/node';
import { hasRole } from '../../src/lib/access';
import {
  applyCors,
  getDefaultApiDeps,
  readBodyField,
  requireRequestIdentity,
  sendApiError,
  type ApiDeps,
  type ApiHandler,
} from '../../src/lib/api-http';
import { AuthorizationError, NotFoundError, ValidationError } from '../../src/lib/errors';
import { logger } from '../../src/lib/logger';
import { truncate } from '../../src/lib/utils';

const DAY_MS = 24 * 60 * 60 * 1000;

export function generateInviteToken(): string {
  return randomBytes(8).toString('base64url');
}

/** POST /api/board/invite {code}: moderators and owners mint an expiring invite token. */
export function createInviteHandler(getDeps: () => ApiDeps, generateToken = generateInviteToken): ApiHandler {
  return async (req, res) => {
    if (!applyCors(req, res, 'POST')) return;
    try {
      const deps = getDeps();
      const { storage } = deps;
      const me = await requireRequestIdentity(req, deps);
      const code = truncate(readBodyField(req, 'code'), 32);
      if (!code) {
        throw new ValidationError('Missing board code');
      }
      const board = await storage.getBoardByCode(code);
      if (!board) {
        throw new NotFoundError('Board not found');
      }
      const role = await storage.getMemberRole(board.id, me.userId);
      if (!hasRole(role, 'moderator')) {
        throw new AuthorizationError();
      }

      const now = deps.now();
      const invite = {
        token: generateToken(),
        boardId: board.id,
        createdBy: me.userId,
        expiresAt: new Date(now.getTime() + deps.inviteTtlDays * DAY_MS).toISOString(),
        createdAt: now.toISOString(),
      };
      await storage.createInvite(invite);
      await storage.logActivity(board.id, 'invite_created', me.userId, { expiresAt: invite.expiresAt });
      logger.info('API', `Invite created for board ${code} by '${me.username}'`, { boardId: board.id });

      res.status(200).json({ token: invite.token, expiresAt: invite.expiresAt });
    } catch (err) {
      sendApiError(res, 'board/invite', err);
    }
  };
}

const handleInvite = createInviteHandler(getDefaultApiDeps);

export default function handler(req: VercelRequest, res: VercelResponse) {
  return handleInvite(req, res);
}
