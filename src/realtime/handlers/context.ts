import { logger } from '../../lib/logger';
import { StorageError, errorMessage, isRealtimeError, type RealtimeError } from '../../lib/errors';
import type { AckCallback, Identity, InboundEventName } from '../../types/realtime';
import { asRecord } from '../../lib/utils';
import type { RealtimeServices } from '../services';

/** The acting connection, resolved once per inbound event. */
export interface HandlerContext {
  connId: string;
  identity: Identity | null;
  guestName: string | null;
}

export type EventHandler = (
  services: RealtimeServices,
  ctx: HandlerContext,
  payload: Record<string, unknown>,
) => Promise<void>;

export function isAckCallback(value: unknown): value is AckCallback {
  return typeof value === 'function';
}

function toRealtimeError(event: InboundEventName, err: unknown): RealtimeError {
  if (isRealtimeError(err)) {
    return err;
  }
  logger.error('SOCKET', `Unexpected failure in '${event}': ${errorMessage(err)}`, {
    event,
    stack: err instanceof Error ? err.stack : undefined,
  });
  return new StorageError(event, 'internal error');
}

/**
 * Run one inbound event. Failures are reported to the acting connection only,
 * as a `server:error` event and through the acknowledgement when one was sent.
 */
export async function runHandler(
  services: RealtimeServices,
  connId: string,
  event: InboundEventName,
  handler: EventHandler,
  payload: unknown,
  ack: AckCallback | null = null,
): Promise<void> {
  const { sessions, router } = services;
  const ctx: HandlerContext = {
    connId,
    identity: sessions.identityOf(connId),
    guestName: sessions.guestNameOf(connId),
  };

  try {
    await handler(services, ctx, asRecord(payload));
    ack?.({ ok: true });
  } catch (err) {
    const failure = toRealtimeError(event, err);
    const level = failure.code === 'storage' ? 'error' : 'warn';
    logger[level]('SOCKET', `'${event}' from ${connId} rejected: ${failure.message}`, {
      event,
      connId,
      code: failure.code,
    });
    router.reply(connId, 'server:error', { code: failure.code, message: failure.message });
    ack?.({ ok: false, code: failure.code, message: failure.message });
  }
}
