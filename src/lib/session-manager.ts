import { logger } from './logger';
import { errorMessage } from './errors';
import { boardCodeOf, roomKindOf } from './room-keys';
import { publishTyping } from './typing';
import type { BroadcastRouter } from './broadcast-router';
import type { RoomLock } from './room-lock';
import type { RoomRegistry } from './room-registry';
import type { StorageGateway } from './storage-gateway';
import type { Identity } from '../types/realtime';

export interface ConnectionRecord {
  connId: string;
  identity: Identity | null;
  /** Name a guest connection announced in its handshake. */
  guestName: string | null;
  connectedAt: number;
}

export interface SessionManagerDeps {
  registry: RoomRegistry;
  lock: RoomLock;
  router: BroadcastRouter;
  storage: StorageGateway;
}

export class SessionManager {
  private readonly connections = new Map<string, ConnectionRecord>();
  private readonly userConnections = new Map<string, Set<string>>();

  constructor(private readonly deps: SessionManagerDeps) {}

  onConnect(connId: string, identity: Identity | null, guestName: string | null = null): void {
    this.connections.set(connId, { connId, identity, guestName, connectedAt: Date.now() });
    if (identity) {
      let owned = this.userConnections.get(identity.userId);
      if (!owned) {
        owned = new Set();
        this.userConnections.set(identity.userId, owned);
      }
      owned.add(connId);
    }
    logger.info('SOCKET', `Connection ${connId} opened${identity ? ` for '${identity.username}'` : ' as guest'}`, {
      connId,
      userId: identity?.userId ?? null,
    });
  }

  /**
   * Tear down every trace of a connection. The connection is marked closed
   * before any room is touched, so a join still queued behind a room lock
   * will not admit it afterwards. Unknown ids are ignored.
   */
  async onDisconnect(connId: string): Promise<void> {
    const record = this.connections.get(connId);
    if (!record) {
      return;
    }
    this.connections.delete(connId);

    const rooms = this.deps.registry.roomsOf(connId);
    const results = await Promise.allSettled(
      rooms.map((roomKey) => this.leaveRoom(roomKey, connId, record.identity)),
    );
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        logger.error('PRESENCE', `Cleanup of ${rooms[index]} failed for ${connId}: ${errorMessage(result.reason)}`, {
          connId,
          roomKey: rooms[index],
        });
      }
    });

    if (record.identity) {
      const owned = this.userConnections.get(record.identity.userId);
      owned?.delete(connId);
      if (owned && owned.size === 0) {
        this.userConnections.delete(record.identity.userId);
      }
    }
    logger.info('SOCKET', `Connection ${connId} closed after leaving ${rooms.length} room(s)`, {
      connId,
      rooms,
    });
  }

  /**
   * Remove a connection from one room under that room's lock, then tell the
   * remaining members. Board departures by identified users are also
   * recorded in the presence history.
   */
  leaveRoom(roomKey: string, connId: string, identity: Identity | null = null): Promise<boolean> {
    const { registry, lock, router, storage } = this.deps;
    return lock.run(roomKey, async () => {
      if (!registry.leave(roomKey, connId)) {
        return false;
      }

      if (roomKindOf(roomKey) === 'board') {
        const code = boardCodeOf(roomKey) ?? '';
        router.publish(roomKey, 'presence', {
          count: registry.memberCount(roomKey),
          names: registry.memberNames(roomKey),
        });
        publishTyping(router, registry, roomKey);
        router.publish(roomKey, 'cursors', registry.cursors(roomKey));

        if (identity) {
          try {
            const board = await storage.getBoardByCode(code);
            if (board) {
              await storage.recordPresence(board.id, identity.userId, 'leave', null);
            }
          } catch (err) {
            logger.error('STORAGE', `Recording leave for '${identity.username}' on ${code} failed: ${errorMessage(err)}`, {
              code,
              userId: identity.userId,
            });
          }
        }
      } else {
        publishTyping(router, registry, roomKey);
      }

      logger.info('PRESENCE', `Connection ${connId} left ${roomKey}`, {
        connId,
        roomKey,
        remaining: registry.memberCount(roomKey),
      });
      return true;
    });
  }

  isConnected(connId: string): boolean {
    return this.connections.has(connId);
  }

  identityOf(connId: string): Identity | null {
    return this.connections.get(connId)?.identity ?? null;
  }

  guestNameOf(connId: string): string | null {
    return this.connections.get(connId)?.guestName ?? null;
  }

  isOnline(userId: string): boolean {
    return (this.userConnections.get(userId)?.size ?? 0) > 0;
  }

  connectionsOf(userId: string): string[] {
    return Array.from(this.userConnections.get(userId) ?? []);
  }

  connectionCount(): number {
    return this.connections.size;
  }

  clear(): void {
    this.connections.clear();
    this.userConnections.clear();
  }
}
