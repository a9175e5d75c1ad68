import type { VercelRequest, VercelResponse } from '@vercel/node';
import {
  applyCors,
  getDefaultApiDeps,
  readBodyField,
  requireRequestIdentity,
  sendApiError,
  type ApiDeps,
  type ApiHandler,
} from '../../src/lib/api-http';
import { NotFoundError, ValidationError } from '../../src/lib/errors';
import { logger } from '../../src/lib/logger';
import { truncate } from '../../src/lib/utils';

/** POST /api/invite/redeem {token}: joins the caller to the invite's board as a member. */
export function createRedeemHandler(getDeps: () => ApiDeps): ApiHandler {
  return async (req, res) => {
    if (!applyCors(req, res, 'POST')) return;
    try {
      const deps = getDeps();
      const { storage } = deps;
      const me = await requireRequestIdentity(req, deps);
      const token = truncate(readBodyField(req, 'token'), 64);
      if (!token) {
        throw new ValidationError('Missing invite token');
      }
      const invite = await storage.getInvite(token);
      const board = invite ? await storage.getBoardById(invite.boardId) : null;
      if (!invite || !board) {
        throw new NotFoundError('Invite not found');
      }
      if (Date.parse(invite.expiresAt) < deps.now().getTime()) {
        res.status(410).json({ error: 'Invite expired' });
        return;
      }
      const role = await storage.ensureMember(board.id, me.userId, 'member');
      logger.info('API', `'${me.username}' redeemed an invite to board ${board.code}`, {
        boardId: board.id,
        role,
      });
      res.status(200).json({ code: board.code, role });
    } catch (err) {
      sendApiError(res, 'invite/redeem', err);
    }
  };
}

const handleRedeem = createRedeemHandler(getDefaultApiDeps);

export default function handler(req: VercelRequest, res: VercelResponse) {
  return handleRedeem(req, res);
}
