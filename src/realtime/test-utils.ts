import type { RealtimeTransport } from '../lib/broadcast-router';
import { MemoryStorage, type MemoryStorageSeed } from '../lib/memory-storage';
import type { UserProfile } from '../types/board';
import type {
  AckResponse,
  Identity,
  InboundEventName,
  OutboundEventName,
  OutboundPayloads,
} from '../types/realtime';
import { EVENT_HANDLERS, runHandler } from './handlers';
import { createRealtimeServices, type RealtimeServices } from './services';

export interface Delivery {
  connId: string;
  event: OutboundEventName;
  payload: unknown;
}

/** Transport that keeps every delivery in order, for assertions. */
export class RecordingTransport implements RealtimeTransport {
  readonly deliveries: Delivery[] = [];

  deliver<E extends OutboundEventName>(connId: string, event: E, payload: OutboundPayloads[E]): void {
    this.deliveries.push({ connId, event, payload });
  }

  /** Payloads of `event` delivered to `connId`, oldest first. */
  received<E extends OutboundEventName>(connId: string, event: E): OutboundPayloads[E][] {
    const payloads: OutboundPayloads[E][] = [];
    for (const delivery of this.deliveries) {
      if (delivery.connId === connId && delivery.event === event && isPayloadOf(event, delivery)) {
        payloads.push(delivery.payload);
      }
    }
    return payloads;
  }

  last<E extends OutboundEventName>(connId: string, event: E): OutboundPayloads[E] | undefined {
    const payloads = this.received(connId, event);
    return payloads[payloads.length - 1];
  }

  eventsFor(connId: string): OutboundEventName[] {
    return this.deliveries.filter((delivery) => delivery.connId === connId).map((delivery) => delivery.event);
  }

  clear(): void {
    this.deliveries.length = 0;
  }
}

// Deliveries are only ever recorded through `deliver`, which pairs each
// event with its payload type.
function isPayloadOf<E extends OutboundEventName>(
  event: E,
  delivery: Delivery,
): delivery is Delivery & { event: E; payload: OutboundPayloads[E] } {
  return delivery.event === event;
}

export const ALICE: UserProfile = {
  id: 'uid-alice',
  username: 'alice',
  displayName: 'Alice',
  avatar: null,
  badge: 'member',
  status: 'online',
};

export const BOB: UserProfile = {
  id: 'uid-bob',
  username: 'bob',
  displayName: 'Bob',
  avatar: null,
  badge: 'member',
  status: 'online',
};

export const CAROL: UserProfile = {
  id: 'uid-carol',
  username: 'carol',
  displayName: 'Carol',
  avatar: null,
  badge: 'member',
  status: 'online',
};

export function identityOf(user: UserProfile): Identity {
  return { userId: user.id, username: user.username, displayName: user.displayName };
}

export interface Harness {
  storage: MemoryStorage;
  transport: RecordingTransport;
  services: RealtimeServices;
  connect: (connId: string, user?: UserProfile | null, guestName?: string | null) => void;
  emit: (connId: string, event: InboundEventName, payload?: unknown) => Promise<AckResponse>;
  disconnect: (connId: string) => Promise<void>;
}

export function createHarness(seed: MemoryStorageSeed = { users: [ALICE, BOB, CAROL] }): Harness {
  const storage = new MemoryStorage(seed);
  const transport = new RecordingTransport();
  const services = createRealtimeServices({
    storage,
    transport,
    urls: { filesBaseUrl: '/u/files', voiceBaseUrl: '/u/voices' },
    typingTimeoutMs: 6000,
  });

  return {
    storage,
    transport,
    services,
    connect(connId, user = null, guestName = null) {
      services.sessions.onConnect(connId, user ? identityOf(user) : null, guestName);
    },
    async emit(connId, event, payload = {}) {
      let response: AckResponse = { ok: false, code: 'none', message: 'no ack' };
      await runHandler(services, connId, event, EVENT_HANDLERS[event], payload, (ack) => {
        response = ack;
      });
      return response;
    },
    disconnect(connId) {
      return services.sessions.onDisconnect(connId);
    },
  };
}
