import { createServer, type IncomingMessage, type Server as HttpServer, type ServerResponse } from 'node:http';
import { Server } from 'socket.io';
import type { ServerConfig } from '../lib/config';
import { logger } from '../lib/logger';
import { errorMessage } from '../lib/errors';
import type { RealtimeTransport } from '../lib/broadcast-router';
import type { TokenVerifier } from '../lib/firebase-admin';
import type { StorageGateway } from '../lib/storage-gateway';
import { INBOUND_EVENTS, type ClientToServerEvents, type ServerToClientEvents } from '../types/realtime';
import { EVENT_HANDLERS, isAckCallback, runHandler } from './handlers';
import { createRealtimeServices, shutdownRealtimeServices, type RealtimeServices } from './services';
import { authenticateHandshake, type SocketSession } from './socket-auth';

/** Handshake state travels on `socket.data` from the auth middleware to `connection`. */
export type RealtimeIo = Server<ClientToServerEvents, ServerToClientEvents, Record<string, never>, SocketSession>;

export interface RealtimeServerOptions {
  config: Pick<ServerConfig, 'corsOrigin' | 'filesBaseUrl' | 'voiceBaseUrl' | 'typingTimeoutMs'>;
  storage: StorageGateway;
  verifyToken: TokenVerifier;
}

export interface RealtimeServer {
  httpServer: HttpServer;
  io: RealtimeIo;
  services: RealtimeServices;
  /** Resolves with the bound port (useful with port 0). */
  listen: (port: number, host?: string) => Promise<number>;
  close: () => Promise<void>;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

export function createRealtimeServer({ config, storage, verifyToken }: RealtimeServerOptions): RealtimeServer {
  let io: RealtimeIo | null = null;

  const transport: RealtimeTransport = {
    deliver(connId, event, payload) {
      io?.to(connId).emit(event, payload);
    },
  };

  const services = createRealtimeServices({
    storage,
    transport,
    urls: { filesBaseUrl: config.filesBaseUrl, voiceBaseUrl: config.voiceBaseUrl },
    typingTimeoutMs: config.typingTimeoutMs,
  });

  const httpServer = createServer((req: IncomingMessage, res: ServerResponse) => {
    const path = (req.url ?? '/').split('?')[0];
    if (req.method === 'GET' && path === '/health') {
      sendJson(res, 200, {
        ok: true,
        connections: services.sessions.connectionCount(),
        rooms: services.registry.roomCount(),
      });
      return;
    }
    sendJson(res, 404, { error: 'Not found' });
  });

  const server: RealtimeIo = new Server<ClientToServerEvents, ServerToClientEvents, Record<string, never>, SocketSession>(
    httpServer,
    {
      cors: { origin: config.corsOrigin },
    },
  );
  io = server;

  server.use((socket, next) => {
    authenticateHandshake(socket.id, socket.handshake.auth, { storage, verifyToken })
      .then((session) => {
        socket.data = session;
        next();
      })
      .catch((err: unknown) => {
        logger.warn('AUTH', `Handshake for ${socket.id} rejected: ${errorMessage(err)}`, { connId: socket.id });
        next(new Error('Authentication failed'));
      });
  });

  server.on('connection', (socket) => {
    const { identity, guestName } = socket.data;
    services.sessions.onConnect(socket.id, identity ?? null, guestName ?? null);

    for (const event of INBOUND_EVENTS) {
      socket.on(event, (payload: unknown, ack?: unknown) => {
        runHandler(services, socket.id, event, EVENT_HANDLERS[event], payload, isAckCallback(ack) ? ack : null).catch(
          (err: unknown) => {
            logger.error('SOCKET', `Handler for '${event}' crashed: ${errorMessage(err)}`, { connId: socket.id, event });
          },
        );
      });
    }

    socket.on('disconnect', (reason: string) => {
      logger.debug('SOCKET', `Connection ${socket.id} disconnected: ${reason}`, { connId: socket.id });
      services.sessions.onDisconnect(socket.id).catch((err: unknown) => {
        logger.error('PRESENCE', `Disconnect cleanup for ${socket.id} failed: ${errorMessage(err)}`, {
          connId: socket.id,
        });
      });
    });
  });

  return {
    httpServer,
    io: server,
    services,
    listen(port, host) {
      return new Promise((resolve, reject) => {
        httpServer.once('error', reject);
        httpServer.listen(port, host, () => {
          httpServer.off('error', reject);
          const address = httpServer.address();
          const bound = address && typeof address === 'object' ? address.port : port;
          logger.info('SOCKET', `Realtime server listening on port ${bound}`, { port: bound });
          resolve(bound);
        });
      });
    },
    async close() {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
      });
      await shutdownRealtimeServices(services);
      logger.info('SOCKET', 'Realtime server closed');
    },
  };
}
