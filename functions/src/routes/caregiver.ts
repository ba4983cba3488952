/**
 * Caregiver Routes
 *
 * Dashboard for a caregiver monitoring one patient: 30-day dose history,
 * missed doses from the last 7 days and low-inventory medications.
 */

import { Router } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { ensureServicesOrReject } from '../middlewares/serviceAvailability';
import type { ServiceResolver } from '../services/domain/serviceContainer';
import type { CaregiverDashboard } from '../services/domain/caregiverDashboard/CaregiverDashboardDomainService';
import type { DoseEventRecord } from '../services/repositories/doseEvents/DoseEventRepository';
import { toIsoStringOrNull } from '../utils/isoDateTime';

type CaregiverRouterOptions = {
  resolveServices: ServiceResolver;
};

const dashboardQuerySchema = z.object({
  patient_id: z.string().min(1),
});

function serializeDoseEvent(event: DoseEventRecord) {
  return {
    id: event.id,
    medication_id: event.medicationId,
    scheduled_time: toIsoStringOrNull(event.scheduledTime),
    taken_time: toIsoStringOrNull(event.takenTime),
    status: event.status,
  };
}

export function serializeDashboard(dashboard: CaregiverDashboard) {
  return {
    history: dashboard.history.map(serializeDoseEvent),
    missed: dashboard.missed.map(serializeDoseEvent),
    inventory_alerts: dashboard.inventoryAlerts.map((alert) => ({
      medication_id: alert.medicationId,
      name: alert.name,
      inventory_count: alert.inventoryCount,
      low_threshold: alert.lowThreshold,
    })),
  };
}

export function createCaregiverRouter(options: CaregiverRouterOptions): Router {
  const { resolveServices } = options;
  const router = Router();

  // GET /api/caregiver/dashboard?patient_id=...
  router.get('/dashboard', async (req, res) => {
    try {
      const query = dashboardQuerySchema.parse(req.query);

      const services = ensureServicesOrReject(resolveServices, res);
      if (!services) {
        return;
      }

      const dashboard = await services.caregiverDashboardService.getDashboard(query.patient_id);

      functions.logger.info(`[caregiver] Dashboard for ${query.patient_id}`, {
        history: dashboard.history.length,
        missed: dashboard.missed.length,
        inventoryAlerts: dashboard.inventoryAlerts.length,
      });

      res.json(serializeDashboard(dashboard));
    } catch (error) {
      if (error instanceof z.ZodError) {
        res.status(400).json({
          code: 'validation_failed',
          message: 'Invalid query parameters',
          details: error.errors,
        });
        return;
      }

      functions.logger.error('[caregiver] Error building dashboard:', error);
      res.status(500).json({
        code: 'server_error',
        message: 'Failed to load caregiver dashboard',
      });
    }
  });

  return router;
}
