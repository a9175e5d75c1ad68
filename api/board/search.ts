import type { VercelRequest, VercelResponse } from '@vercel/node';
import { CHANNEL_MAX, SEARCH_RESULT_LIMIT } from '../../src/constants';
import {
  applyCors,
  getDefaultApiDeps,
  readQueryString,
  sendApiError,
  type ApiDeps,
  type ApiHandler,
} from '../../src/lib/api-http';
import { NotFoundError, ValidationError } from '../../src/lib/errors';
import { truncate } from '../../src/lib/utils';

/**
 * GET /api/board/search?code=&q=&channel=: case-insensitive substring match
 * over card text and live chat messages, newest first.
 */
export function createSearchHandler(getDeps: () => ApiDeps): ApiHandler {
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
      const term = readQueryString(req, 'q');
      if (!term) {
        res.status(200).json({ cards: [], messages: [] });
        return;
      }
      const channel = truncate(readQueryString(req, 'channel'), CHANNEL_MAX) || null;
      res.status(200).json(await storage.searchBoard(board.id, term, channel, SEARCH_RESULT_LIMIT));
    } catch (err) {
      sendApiError(res, 'board/search', err);
    }
  };
}

const handleSearch = createSearchHandler(getDefaultApiDeps);

export default function handler(req: VercelRequest, res: VercelResponse) {
  return handleSearch(req, res);
}
