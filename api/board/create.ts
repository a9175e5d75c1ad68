import type { VercelRequest, VercelResponse } from '@vercel/node';
import { createBoardFromTemplate, generateBoardCode } from '../../src/lib/board-templates';
import {
  applyCors,
  getDefaultApiDeps,
  readBodyField,
  readRequestIdentity,
  sendApiError,
  type ApiDeps,
  type ApiHandler,
} from '../../src/lib/api-http';
import { truncate } from '../../src/lib/utils';

/**
 * POST /api/board/create {template?}: anonymous callers get an ownerless
 * board; signed-in callers become its owner.
 */
export function createBoardHandler(getDeps: () => ApiDeps, generateCode = generateBoardCode): ApiHandler {
  return async (req, res) => {
    if (!applyCors(req, res, 'POST')) return;
    try {
      const deps = getDeps();
      const me = await readRequestIdentity(req, deps);
      const template = truncate(readBodyField(req, 'template'), 32) || null;
      const board = await createBoardFromTemplate(deps.storage, {
        ownerId: me?.userId ?? null,
        template,
        generateCode,
      });
      res.status(201).json({ code: board.code, title: board.title, theme: board.theme });
    } catch (err) {
      sendApiError(res, 'board/create', err);
    }
  };
}

const handleCreate = createBoardHandler(getDefaultApiDeps);

export default function handler(req: VercelRequest, res: VercelResponse) {
  return handleCreate(req, res);
}
