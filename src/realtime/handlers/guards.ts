import { AuthorizationError, NotFoundError, ValidationError } from '../../lib/errors';
import type { StorageGateway } from '../../lib/storage-gateway';
import { readInteger, truncate } from '../../lib/utils';
import type { Board, ChatMessage } from '../../types/board';
import type { Identity } from '../../types/realtime';
import type { HandlerContext } from './context';

/** Board codes are short hex strings; anything longer cannot match. */
const BOARD_CODE_MAX = 32;

export function requireIdentity(ctx: HandlerContext): Identity {
  if (!ctx.identity) {
    throw new AuthorizationError('auth required');
  }
  return ctx.identity;
}

export function readBoardCode(payload: Record<string, unknown>): string {
  return truncate(payload.code, BOARD_CODE_MAX);
}

export function requireMessageId(payload: Record<string, unknown>, message = 'missing data'): number {
  const messageId = readInteger(payload.messageId);
  if (messageId === null || messageId <= 0) {
    throw new ValidationError(message);
  }
  return messageId;
}

export async function requireBoard(
  storage: StorageGateway,
  code: string,
  message = 'Board not found',
): Promise<Board> {
  const board = code ? await storage.getBoardByCode(code) : null;
  if (!board) {
    throw new NotFoundError(message);
  }
  return board;
}

/** A message that still exists and has not been soft-deleted. */
export async function requireLiveMessage(storage: StorageGateway, messageId: number): Promise<ChatMessage> {
  const message = await storage.getMessage(messageId);
  if (!message || message.deletedAt !== null) {
    throw new NotFoundError('message missing');
  }
  return message;
}
