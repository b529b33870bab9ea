import type http from 'node:http';
import { openStorage, type StorageGateway } from '../lib/local-db/storage-gateway';
import { databasePath, loadRuntimeConfig, loadRuntimeEnv } from './main/config/runtime-config';
import { createSyncServer } from './main/http/sync-server';
import { createConsoleLogger } from './main/logging/logger';
import { createPosContext } from './main/pos-context';

let syncServer: http.Server | null = null;
let storageRef: StorageGateway | null = null;

function start(): void {
  loadRuntimeEnv();
  const config = loadRuntimeConfig();
  const logger = createConsoleLogger('pos', config.logLevel);

  const storage = openStorage({
    filePath: databasePath(config),
    logger: createConsoleLogger('storage', config.logLevel),
  });
  storageRef = storage;

  const context = createPosContext(storage, {
    bcryptRounds: config.bcryptRounds,
    logLevel: config.logLevel,
  });
  context.usersRepository.ensureAdminAccount(config.adminPassword);

  const lowStock = context.catalogRepository.listBelowReorderLevel();
  if (lowStock.length) {
    logger.warn('products at or below reorder level', { codes: lowStock.map((product) => product.code) });
  }

  syncServer = createSyncServer(
    {
      ...context,
      storeName: config.storeName,
      logger: createConsoleLogger('sync-server', config.logLevel),
    },
    { host: config.httpHost, port: config.httpPort },
  );
}

function shutdown(): void {
  if (syncServer) {
    syncServer.close();
    syncServer = null;
  }
  if (storageRef) {
    storageRef.close();
    storageRef = null;
  }
}

process.on('SIGINT', () => {
  shutdown();
  process.exit(0);
});

process.on('SIGTERM', () => {
  shutdown();
  process.exit(0);
});

start();
