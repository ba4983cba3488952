/**
 * Senior (patient) Routes
 *
 * Today's dose status and dose confirmation for the patient-facing app.
 */

import { Router } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { ensureServicesOrReject } from '../middlewares/serviceAvailability';
import type { ServiceResolver } from '../services/domain/serviceContainer';
import type { TodayDoseStatus } from '../services/domain/doseEvents/DoseStatusDomainService';
import { toIsoStringOrNull } from '../utils/isoDateTime';

type SeniorRouterOptions = {
  resolveServices: ServiceResolver;
};

const todayQuerySchema = z.object({
  user_id: z.string().min(1),
});

const confirmDoseSchema = z.object({
  user_id: z.string().min(1),
  medication_id: z.string().min(1),
  scheduled_time_iso: z.string(),
});

export function serializeTodayStatus(status: TodayDoseStatus) {
  return {
    user_id: status.userId,
    date: status.date,
    total_doses: status.totalDoses,
    taken: status.taken,
    missed: status.missed,
    upcoming: status.upcoming,
    items: status.items.map((item) => ({
      dose_event_id: item.doseEventId,
      medication_id: item.medicationId,
      scheduled_time: toIsoStringOrNull(item.scheduledTime),
      status: item.status,
    })),
  };
}

export function createSeniorRouter(options: SeniorRouterOptions): Router {
  const { resolveServices } = options;
  const router = Router();

  /**
   * GET /api/senior/today?user_id=...
   * Today's (UTC) doses for the patient, bucketed by status
   */
  router.get('/today', async (req, res) => {
    try {
      const query = todayQuerySchema.parse(req.query);

      const services = ensureServicesOrReject(resolveServices, res);
      if (!services) {
        return;
      }

      const status = await services.doseStatusService.getTodayStatus(query.user_id);

      functions.logger.info(
        `[senior] Today status for ${query.user_id}: ${status.totalDoses} doses`,
        { taken: status.taken, missed: status.missed, upcoming: status.upcoming },
      );

      res.json(serializeTodayStatus(status));
    } catch (error) {
      if (error instanceof z.ZodError) {
        res.status(400).json({
          code: 'validation_failed',
          message: 'Invalid query parameters',
          details: error.errors,
        });
        return;
      }

      functions.logger.error('[senior] Error fetching today status:', error);
      res.status(500).json({
        code: 'server_error',
        message: 'Failed to fetch today status',
      });
    }
  });

  /**
   * POST /api/senior/confirm
   * Mark the scheduled dose matching (user, medication, scheduled time) as taken
   */
  router.post('/confirm', async (req, res) => {
    try {
      const data = confirmDoseSchema.parse(req.body);

      const services = ensureServicesOrReject(resolveServices, res);
      if (!services) {
        return;
      }

      const result = await services.doseStatusService.confirmDose({
        userId: data.user_id,
        medicationId: data.medication_id,
        scheduledTimeIso: data.scheduled_time_iso,
      });

      if (result.outcome === 'invalid_scheduled_time') {
        res.status(400).json({
          code: 'validation_failed',
          message: 'Invalid scheduled_time_iso',
        });
        return;
      }

      if (result.outcome === 'not_found') {
        res.status(404).json({
          code: 'not_found',
          message: 'Scheduled dose not found',
        });
        return;
      }

      functions.logger.info(`[senior] Dose ${result.doseEventId} confirmed taken`, {
        userId: data.user_id,
        medicationId: data.medication_id,
        previousStatus: result.previousStatus,
      });

      res.json({ status: 'ok' });
    } catch (error) {
      if (error instanceof z.ZodError) {
        res.status(400).json({
          code: 'validation_failed',
          message: 'Invalid request body',
          details: error.errors,
        });
        return;
      }

      functions.logger.error('[senior] Error confirming dose:', error);
      res.status(500).json({
        code: 'server_error',
        message: 'Failed to confirm dose',
      });
    }
  });

  return router;
}
