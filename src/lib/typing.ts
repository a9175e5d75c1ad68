import { logger } from './logger';
import { errorMessage } from './errors';
import { boardCodeOf, roomKindOf } from './room-keys';
import type { BroadcastRouter } from './broadcast-router';
import type { RoomLock } from './room-lock';
import type { RoomRegistry } from './room-registry';

/**
 * Send the room's full typing list in the shape its room kind uses.
 * Must be called inside the room lock.
 */
export function publishTyping(
  router: BroadcastRouter,
  registry: RoomRegistry,
  roomKey: string,
  exclude: string | null = null,
): number {
  const authors = registry.typingAuthors(roomKey);
  switch (roomKindOf(roomKey)) {
    case 'board':
      return router.publish(roomKey, 'typing', { code: boardCodeOf(roomKey) ?? '', authors }, exclude);
    case 'direct':
      return router.publish(roomKey, 'dm_typing', { authors }, exclude);
    case 'group':
      return router.publish(roomKey, 'group_typing', authors, exclude);
    default:
      return 0;
  }
}

export interface TypingSweeperDeps {
  registry: RoomRegistry;
  lock: RoomLock;
  router: BroadcastRouter;
}

/**
 * Clears typing flags nobody refreshed within `timeoutMs`. One timer per
 * room, armed for the earliest pending expiry; each sweep runs inside the
 * room lock and rebroadcasts when something expired.
 */
export class TypingSweeper {
  private readonly timers = new Map<string, ReturnType<typeof setTimeout>>();

  constructor(
    private readonly deps: TypingSweeperDeps,
    readonly timeoutMs: number,
    private readonly now: () => number = () => Date.now(),
  ) {}

  /** Expiry timestamp for a typing flag set right now. */
  expiryFromNow(): number {
    return this.now() + this.timeoutMs;
  }

  schedule(roomKey: string, expiresAt: number): void {
    if (this.timers.has(roomKey)) {
      return;
    }
    const delay = Math.max(0, expiresAt - this.now());
    const timer = setTimeout(() => {
      this.timers.delete(roomKey);
      this.sweep(roomKey).catch((err: unknown) => {
        logger.error('PRESENCE', `Typing sweep for ${roomKey} failed: ${errorMessage(err)}`, { roomKey });
      });
    }, delay);
    timer.unref();
    this.timers.set(roomKey, timer);
  }

  sweep(roomKey: string): Promise<void> {
    const { registry, lock, router } = this.deps;
    return lock.run(roomKey, () => {
      if (registry.expireTyping(roomKey, this.now())) {
        publishTyping(router, registry, roomKey);
        logger.debug('PRESENCE', `Expired typing flags in ${roomKey}`, { roomKey });
      }
      const next = registry.nextTypingExpiry(roomKey);
      if (next !== null) {
        this.schedule(roomKey, next);
      }
    });
  }

  pendingRooms(): number {
    return this.timers.size;
  }

  stop(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }
}
