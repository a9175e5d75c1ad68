import { BroadcastRouter, type RealtimeTransport } from '../lib/broadcast-router';
import { createRoomLock, type RoomLock } from '../lib/room-lock';
import { RoomRegistry } from '../lib/room-registry';
import { RoomStateSynthesizer, type MediaUrls } from '../lib/room-state';
import { SessionManager } from '../lib/session-manager';
import type { StorageGateway } from '../lib/storage-gateway';
import { TypingSweeper } from '../lib/typing';

/** Everything an event handler may touch, wired once per server. */
export interface RealtimeServices {
  storage: StorageGateway;
  registry: RoomRegistry;
  lock: RoomLock;
  router: BroadcastRouter;
  sessions: SessionManager;
  state: RoomStateSynthesizer;
  typing: TypingSweeper;
}

export interface RealtimeServicesOptions {
  storage: StorageGateway;
  transport: RealtimeTransport;
  urls: MediaUrls;
  typingTimeoutMs: number;
  now?: () => number;
}

export function createRealtimeServices(options: RealtimeServicesOptions): RealtimeServices {
  const { storage, transport, urls, typingTimeoutMs, now } = options;
  const registry = new RoomRegistry();
  const lock = createRoomLock();
  const router = new BroadcastRouter(registry, transport);
  const sessions = new SessionManager({ registry, lock, router, storage });
  const state = new RoomStateSynthesizer({
    storage,
    urls,
    isOnline: (userId) => sessions.isOnline(userId),
  });
  const typing = new TypingSweeper({ registry, lock, router }, typingTimeoutMs, now);
  return { storage, registry, lock, router, sessions, state, typing };
}

/** Stop timers and forget every connection and room. */
export async function shutdownRealtimeServices(services: RealtimeServices): Promise<void> {
  services.typing.stop();
  await services.lock.drain();
  services.registry.clear();
  services.sessions.clear();
}
