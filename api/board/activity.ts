import type { VercelRequest, VercelResponse } from '@vercel/node';
import { ACTIVITY_FEED_LIMIT } from '../../src/constants';
import {
  applyCors,
  getDefaultApiDeps,
  readQueryString,
  sendApiError,
  type ApiDeps,
  type ApiHandler,
} from '../../src/lib/api-http';
import { NotFoundError, ValidationError } from '../../src/lib/errors';

/** GET /api/board/activity?code=: the board's most recent activity entries. */
export function createActivityHandler(getDeps: () => ApiDeps): ApiHandler {
  return async (req, res) => {
    if (!applyCors(req, res, 'GET')) return;
    try {
      const { storage } = getDeps();
      const code = readQueryString(req, 'code');
      if (!code) {
        throw new ValidationError('Missing board code');
      }
      const board = await storage.getBoardByCode(code);
      if (!board) {
        throw new NotFoundError('Board not found');
      }
      res.status(200).json(await storage.listActivity(board.id, ACTIVITY_FEED_LIMIT));
    } catch (err) {
      sendApiError(res, 'board/activity', err);
    }
  };
}

const handleActivity = createActivityHandler(getDefaultApiDeps);

export default function handler(req: VercelRequest, res: VercelResponse) {
  return handleActivity(req, res);
}
