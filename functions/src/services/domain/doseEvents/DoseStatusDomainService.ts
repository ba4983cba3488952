import * as functions from 'firebase-functions';
import type { DoseEventRepository } from '../../repositories/doseEvents/DoseEventRepository';
import { parseIsoDateTimeToUtc, type UtcInstant } from '../../../utils/isoDateTime';
import { getUtcDateString, getUtcDayWindow } from '../../../utils/timeWindows';
import { DoseStatus, isDocumentedTransition, todayBucketFor } from './doseStatus';

export type TodayDoseItem = {
  doseEventId: string;
  medicationId: string | null;
  scheduledTime: UtcInstant | null;
  status: string | null;
};

export type TodayDoseStatus = {
  userId: string;
  date: string;
  totalDoses: number;
  taken: number;
  missed: number;
  upcoming: number;
  items: TodayDoseItem[];
};

export type ConfirmDoseInput = {
  userId: string;
  medicationId: string;
  scheduledTimeIso: string;
};

export type ConfirmDoseResult =
  | { outcome: 'confirmed'; doseEventId: string; takenAt: Date; previousStatus: string | null }
  | { outcome: 'not_found' }
  | { outcome: 'invalid_scheduled_time' };

export class DoseStatusDomainService {
  constructor(
    private readonly doseEventRepository: DoseEventRepository,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async getTodayStatus(userId: string): Promise<TodayDoseStatus> {
    const now = this.now();
    const { start, end } = getUtcDayWindow(now);

    const events = await this.doseEventRepository.listByUser(userId, {
      scheduledFrom: start,
      scheduledBefore: end,
    });

    const counts = { taken: 0, missed: 0, upcoming: 0 };
    const items = events.map((event): TodayDoseItem => {
      // Documents written without a status are pending doses.
      const status = event.status ?? DoseStatus.Scheduled;
      counts[todayBucketFor(status)] += 1;
      return {
        doseEventId: event.id,
        medicationId: event.medicationId,
        scheduledTime: event.scheduledTime,
        status,
      };
    });

    return {
      userId,
      date: getUtcDateString(now),
      totalDoses: items.length,
      ...counts,
      items,
    };
  }

  async confirmDose(input: ConfirmDoseInput): Promise<ConfirmDoseResult> {
    const scheduledTime = parseIsoDateTimeToUtc(input.scheduledTimeIso);
    if (!scheduledTime) {
      return { outcome: 'invalid_scheduled_time' };
    }

    const takenAt = this.now();
    const result = await this.doseEventRepository.markTakenBySchedule(
      {
        userId: input.userId,
        medicationId: input.medicationId,
        scheduledTime,
      },
      takenAt,
    );

    if (result.matched === 0) {
      return { outcome: 'not_found' };
    }

    if (!isDocumentedTransition(result.previousStatus, DoseStatus.Taken)) {
      functions.logger.warn('[doses] Confirmed dose from an unexpected prior status', {
        doseEventId: result.doseEventId,
        previousStatus: result.previousStatus,
      });
    }

    return {
      outcome: 'confirmed',
      doseEventId: result.doseEventId,
      takenAt,
      previousStatus: result.previousStatus,
    };
  }
}
