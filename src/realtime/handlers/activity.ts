import { logger } from '../../lib/logger';
import { errorMessage } from '../../lib/errors';
import type { StorageGateway } from '../../lib/storage-gateway';
import type { ActivityKind } from '../../types/board';

/**
 * Append to the board activity log after the mutation it describes has been
 * committed and broadcast. A failed append is logged; the event still succeeds.
 */
export async function recordActivity(
  storage: StorageGateway,
  boardId: number,
  kind: ActivityKind,
  userId: string | null,
  payload: Record<string, unknown> = {},
): Promise<void> {
  try {
    await storage.logActivity(boardId, kind, userId, payload);
  } catch (err) {
    logger.error('STORAGE', `Activity '${kind}' for board ${boardId} was not recorded: ${errorMessage(err)}`, {
      boardId,
      kind,
    });
  }
}
