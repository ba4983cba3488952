import * as functions from 'firebase-functions';
import type {
  DoseEventRecord,
  DoseEventRepository,
} from '../../repositories/doseEvents/DoseEventRepository';
import type {
  MedicationRecord,
  MedicationRepository,
} from '../../repositories/medications/MedicationRepository';
import { coerceCount, type StoredCount } from '../../../utils/firestoreValues';
import { daysBefore } from '../../../utils/timeWindows';
import { DoseStatus } from '../doseEvents/doseStatus';

export const HISTORY_WINDOW_DAYS = 30;
export const MISSED_ALERT_WINDOW_DAYS = 7;

export type InventoryAlert = {
  medicationId: string;
  name: string | null;
  inventoryCount: StoredCount;
  lowThreshold: StoredCount;
};

export type CaregiverDashboard = {
  history: DoseEventRecord[];
  missed: DoseEventRecord[];
  inventoryAlerts: InventoryAlert[];
};

/**
 * Low when the count is at or below the threshold. Both default to 0 when
 * absent, so a medication with no inventory fields is reported as low.
 * Returns null when either value is not an integer.
 */
export function isLowInventory(medication: MedicationRecord): boolean | null {
  const count = coerceCount(medication.inventoryCount);
  const threshold = coerceCount(medication.lowThreshold);
  if (count === null || threshold === null) {
    return null;
  }

  return count <= threshold;
}

export class CaregiverDashboardDomainService {
  constructor(
    private readonly doseEventRepository: DoseEventRepository,
    private readonly medicationRepository: MedicationRepository,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async getDashboard(patientId: string): Promise<CaregiverDashboard> {
    const now = this.now();

    const [history, missed, medications] = await Promise.all([
      this.doseEventRepository.listByUser(patientId, {
        scheduledFrom: daysBefore(now, HISTORY_WINDOW_DAYS),
        sortDirection: 'asc',
      }),
      this.doseEventRepository.listByUser(patientId, {
        status: DoseStatus.Missed,
        scheduledFrom: daysBefore(now, MISSED_ALERT_WINDOW_DAYS),
        sortDirection: 'desc',
      }),
      this.medicationRepository.listAllByUser(patientId),
    ]);

    const inventoryAlerts: InventoryAlert[] = [];
    for (const medication of medications) {
      const low = isLowInventory(medication);
      if (low === null) {
        functions.logger.warn('[caregiver] Skipping medication with unreadable inventory fields', {
          medicationId: medication.id,
        });
        continue;
      }

      if (low) {
        inventoryAlerts.push({
          medicationId: medication.id,
          name: medication.name,
          inventoryCount: medication.inventoryCount,
          lowThreshold: medication.lowThreshold,
        });
      }
    }

    return { history, missed, inventoryAlerts };
  }
}
