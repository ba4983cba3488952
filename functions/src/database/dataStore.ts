import { getApp, getApps, initializeApp } from 'firebase-admin/app';
import { getFirestore } from 'firebase-admin/firestore';
import type { Firestore } from 'firebase-admin/firestore';
import * as functions from 'firebase-functions';
import type { DatabaseConfig } from '../config';

// Store connection, created once at startup and passed to the service resolver.

export type DataStoreConnection =
  | { status: 'connected'; db: Firestore; databaseId: string; endpoint: string }
  | { status: 'unavailable'; reason: string };

type ParsedEndpoint = {
  host: string;
  ssl: boolean;
};

export function parseDatabaseEndpoint(url: string): ParsedEndpoint | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return null;
  }
  if (!parsed.host) {
    return null;
  }

  return { host: parsed.host, ssl: parsed.protocol === 'https:' };
}

export function connectDataStore(config: DatabaseConfig): DataStoreConnection {
  if (!config.url || !config.name) {
    functions.logger.warn('[datastore] DATABASE_URL and DATABASE_NAME are not both set');
    return { status: 'unavailable', reason: 'Database not configured' };
  }

  const endpoint = parseDatabaseEndpoint(config.url);
  if (!endpoint) {
    functions.logger.error('[datastore] DATABASE_URL must be an http(s) URL');
    return { status: 'unavailable', reason: 'Invalid DATABASE_URL' };
  }

  try {
    const app =
      getApps().length > 0
        ? getApp()
        : initializeApp(config.projectId ? { projectId: config.projectId } : undefined);
    const db = getFirestore(app, config.name);
    db.settings({ host: endpoint.host, ssl: endpoint.ssl });

    functions.logger.info('[datastore] Firestore client initialized', {
      databaseId: config.name,
      host: endpoint.host,
    });

    return {
      status: 'connected',
      db,
      databaseId: config.name,
      endpoint: endpoint.host,
    };
  } catch (error) {
    functions.logger.error('[datastore] Failed to initialize Firestore client:', error);
    return {
      status: 'unavailable',
      reason: error instanceof Error ? error.message : 'Firestore initialization failed',
    };
  }
}

export async function closeDataStore(connection: DataStoreConnection): Promise<void> {
  if (connection.status !== 'connected') {
    return;
  }

  await connection.db.terminate();
  functions.logger.info('[datastore] Firestore client terminated');
}
