import dotenv from 'dotenv';
import * as functions from 'firebase-functions';

// Load .env before anything reads process.env
dotenv.config();

import { loadServerConfig } from './config';
import { buildApiRuntime } from './bootstrap';
import { closeDataStore } from './database/dataStore';
import { flushSentry } from './utils/sentry';

const { app, connection } = buildApiRuntime();
const { port, host } = loadServerConfig();

const server = app.listen(port, host, () => {
  functions.logger.info(`[server] Listening on http://${host}:${port}`);
  functions.logger.info(
    `[server] Store: ${connection.status === 'connected' ? connection.databaseId : `unavailable (${connection.reason})`}`,
  );
});

async function shutdown(signal: string): Promise<void> {
  functions.logger.info(`[server] ${signal} received, shutting down`);

  await new Promise<void>((resolve) => {
    server.close(() => resolve());
  });

  try {
    await closeDataStore(connection);
    await flushSentry();
  } catch (error) {
    functions.logger.error('[server] Error during shutdown:', error);
    process.exitCode = 1;
  }

  process.exit();
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
