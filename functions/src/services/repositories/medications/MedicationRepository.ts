import type { StoredCount } from '../../../utils/firestoreValues';

export type MedicationRecord = {
  id: string;
  userId: string | null;
  name: string | null;
  dosage: string | null;
  // HH:MM daily times.
  scheduleTimes: string[];
  inventoryCount: StoredCount;
  lowThreshold: StoredCount;
};

export interface MedicationRepository {
  listAllByUser(userId: string): Promise<MedicationRecord[]>;
}
