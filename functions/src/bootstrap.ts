import type { Express } from 'express';
import { loadDatabaseConfig, loadRateLimitConfig } from './config';
import { createApp } from './app';
import { connectDataStore, type DataStoreConnection } from './database/dataStore';
import { createServiceResolver } from './services/domain/serviceContainer';
import { initSentry } from './utils/sentry';

export type ApiRuntime = {
  app: Express;
  connection: DataStoreConnection;
};

/**
 * Composition root shared by the Cloud Function and the standalone server.
 */
export function buildApiRuntime(): ApiRuntime {
  // Initialize Sentry BEFORE other initializations
  initSentry();

  const databaseConfig = loadDatabaseConfig();
  const connection = connectDataStore(databaseConfig);

  const app = createApp({
    resolveServices: createServiceResolver(connection),
    databaseConfig,
    rateLimit: loadRateLimitConfig(),
  });

  return { app, connection };
}
