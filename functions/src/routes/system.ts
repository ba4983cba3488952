import { Router } from 'express';
import * as functions from 'firebase-functions';
import type { DatabaseConfig } from '../config';
import type { ServiceResolver } from '../services/domain/serviceContainer';

type SystemRouterOptions = {
  resolveServices: ServiceResolver;
  databaseConfig: DatabaseConfig;
};

const MAX_LISTED_COLLECTIONS = 10;
const MAX_ERROR_LENGTH = 50;

export type DiagnosticsReport = {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: 'Connected' | 'Not Connected';
  collections: string[];
};

function presenceFlag(value: string | null): string {
  return value ? 'Set' : 'Not Set';
}

export function createSystemRouter(options: SystemRouterOptions): Router {
  const { resolveServices, databaseConfig } = options;
  const router = Router();

  router.get('/', (req, res) => {
    res.json({ message: 'Medication Assistant Backend Running' });
  });

  // Liveness only; does not touch the store
  router.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /**
   * GET /test
   * Store connectivity diagnostic. Store errors are reported in the body,
   * never as a failed request.
   */
  router.get('/test', async (req, res) => {
    const report: DiagnosticsReport = {
      backend: 'Running',
      database: 'Not Available',
      database_url: presenceFlag(databaseConfig.url),
      database_name: presenceFlag(databaseConfig.name),
      connection_status: 'Not Connected',
      collections: [],
    };

    const resolution = resolveServices();
    if (!resolution.available) {
      report.database = `Available but not initialized: ${resolution.reason}`;
      res.json(report);
      return;
    }

    report.database = 'Available';
    report.connection_status = 'Connected';

    try {
      const names = await resolution.services.storeInfoRepository.listCollectionNames();
      report.collections = names.slice(0, MAX_LISTED_COLLECTIONS);
      report.database = 'Connected & Working';
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      functions.logger.warn('[system] Collection listing failed during diagnostics:', error);
      report.database = `Connected but Error: ${message.slice(0, MAX_ERROR_LENGTH)}`;
    }

    res.json(report);
  });

  return router;
}
