import { logger } from './logger';
import type { RoomRegistry } from './room-registry';
import type { OutboundEventName, OutboundPayloads } from '../types/realtime';

/** Delivers one event to one connection. The socket.io adapter lives in src/realtime/server.ts. */
export interface RealtimeTransport {
  deliver<E extends OutboundEventName>(connId: string, event: E, payload: OutboundPayloads[E]): void;
}

export class BroadcastRouter {
  constructor(
    private readonly registry: RoomRegistry,
    private readonly transport: RealtimeTransport,
  ) {}

  /**
   * Fan out to the membership captured at call time. Returns how many
   * connections the event was handed to.
   */
  publish<E extends OutboundEventName>(
    roomKey: string,
    event: E,
    payload: OutboundPayloads[E],
    exclude: string | null = null,
  ): number {
    const recipients = this.registry.members(roomKey).filter((connId) => connId !== exclude);
    let delivered = 0;
    for (const connId of recipients) {
      try {
        this.transport.deliver(connId, event, payload);
        delivered += 1;
      } catch (err) {
        logger.warn('SYNC', `Broadcast of '${event}' to ${connId} failed`, {
          roomKey,
          connId,
          event,
          errorMessage: err instanceof Error ? err.message : 'Unknown error',
        });
      }
    }
    logger.debug('SYNC', `Broadcast '${event}' to ${delivered} member(s) of ${roomKey}`, {
      roomKey,
      event,
      delivered,
      excluded: exclude,
    });
    return delivered;
  }

  /** Private delivery to a single connection, regardless of membership. */
  reply<E extends OutboundEventName>(connId: string, event: E, payload: OutboundPayloads[E]): void {
    this.transport.deliver(connId, event, payload);
  }
}
