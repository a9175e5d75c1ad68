import { loadServerConfig } from './lib/config';
import { getAdminFirestore, verifyFirebaseToken } from './lib/firebase-admin';
import { FirestoreStorage } from './lib/firestore-storage';
import { logger } from './lib/logger';
import { MemoryStorage } from './lib/memory-storage';
import type { StorageGateway } from './lib/storage-gateway';
import { createRealtimeServer } from './realtime/server';

const config = loadServerConfig();
logger.setConfig({ minLevel: config.logLevel });

const storage: StorageGateway =
  config.storageDriver === 'memory'
    ? new MemoryStorage()
    : new FirestoreStorage(getAdminFirestore(), { timeoutMs: config.storageTimeoutMs });

logger.info('CONFIG', 'Realtime server starting', {
  port: config.port,
  storageDriver: config.storageDriver,
  typingTimeoutMs: config.typingTimeoutMs,
});

const server = createRealtimeServer({ config, storage, verifyToken: verifyFirebaseToken });
await server.listen(config.port);

let shuttingDown = false;

function shutdown(signal: NodeJS.Signals): void {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info('SOCKET', `Received ${signal}, closing connections`);
  server
    .close()
    .then(() => process.exit(0))
    .catch((err: unknown) => {
      logger.error('SOCKET', `Shutdown failed: ${err instanceof Error ? err.message : 'Unknown error'}`);
      process.exit(1);
    });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
