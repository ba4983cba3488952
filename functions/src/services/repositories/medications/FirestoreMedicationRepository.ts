import type { DocumentData, Firestore, QueryDocumentSnapshot } from 'firebase-admin/firestore';
import { toStoredCount, toStringOrNull } from '../../../utils/firestoreValues';
import type { MedicationRecord, MedicationRepository } from './MedicationRepository';

export const MEDICATION_COLLECTION = 'medication';

function normalizeScheduleTimes(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value.filter((entry): entry is string => typeof entry === 'string');
}

function mapMedicationDoc(doc: QueryDocumentSnapshot<DocumentData>): MedicationRecord {
  const data = doc.data();
  return {
    id: doc.id,
    userId: toStringOrNull(data.user_id),
    name: toStringOrNull(data.name),
    dosage: toStringOrNull(data.dosage),
    scheduleTimes: normalizeScheduleTimes(data.schedule_times),
    inventoryCount: toStoredCount(data.inventory_count),
    lowThreshold: toStoredCount(data.low_threshold),
  };
}

export class FirestoreMedicationRepository implements MedicationRepository {
  constructor(private readonly db: Firestore) {}

  async listAllByUser(userId: string): Promise<MedicationRecord[]> {
    const snapshot = await this.db
      .collection(MEDICATION_COLLECTION)
      .where('user_id', '==', userId)
      .get();

    return snapshot.docs.map((doc) => mapMedicationDoc(doc));
  }
}
