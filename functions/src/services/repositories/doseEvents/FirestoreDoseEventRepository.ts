import { Timestamp } from 'firebase-admin/firestore';
import type {
  DocumentData,
  Firestore,
  Query,
  QueryDocumentSnapshot,
} from 'firebase-admin/firestore';
import { DoseStatus } from '../../domain/doseEvents/doseStatus';
import { toStringOrNull, toUtcInstantOrNull } from '../../../utils/firestoreValues';
import type {
  DoseEventListByUserOptions,
  DoseEventRecord,
  DoseEventRepository,
  DoseEventScheduleKey,
  MarkTakenResult,
} from './DoseEventRepository';

export const DOSE_EVENT_COLLECTION = 'doseevent';

function mapDoseEventDoc(doc: QueryDocumentSnapshot<DocumentData>): DoseEventRecord {
  const data = doc.data();
  return {
    id: doc.id,
    userId: toStringOrNull(data.user_id),
    medicationId: toStringOrNull(data.medication_id),
    scheduledTime: toUtcInstantOrNull(data.scheduled_time),
    takenTime: toUtcInstantOrNull(data.taken_time),
    status: toStringOrNull(data.status),
  };
}

export class FirestoreDoseEventRepository implements DoseEventRepository {
  constructor(private readonly db: Firestore) {}

  private collection() {
    return this.db.collection(DOSE_EVENT_COLLECTION);
  }

  async listByUser(
    userId: string,
    options: DoseEventListByUserOptions = {},
  ): Promise<DoseEventRecord[]> {
    let query: Query<DocumentData> = this.collection().where('user_id', '==', userId);

    if (options.status) {
      query = query.where('status', '==', options.status);
    }

    if (options.scheduledFrom) {
      query = query.where('scheduled_time', '>=', Timestamp.fromDate(options.scheduledFrom));
    }

    if (options.scheduledBefore) {
      query = query.where('scheduled_time', '<', Timestamp.fromDate(options.scheduledBefore));
    }

    if (options.sortDirection) {
      query = query.orderBy('scheduled_time', options.sortDirection);
    }

    const snapshot = await query.get();
    return snapshot.docs.map((doc) => mapDoseEventDoc(doc));
  }

  async markTakenBySchedule(key: DoseEventScheduleKey, takenAt: Date): Promise<MarkTakenResult> {
    const scheduledTime = new Timestamp(key.scheduledTime.seconds, key.scheduledTime.nanoseconds);
    const query = this.collection()
      .where('user_id', '==', key.userId)
      .where('medication_id', '==', key.medicationId)
      .where('scheduled_time', '==', scheduledTime)
      .limit(1);

    return this.db.runTransaction(async (transaction): Promise<MarkTakenResult> => {
      const snapshot = await transaction.get(query);
      if (snapshot.empty) {
        return { matched: 0 };
      }

      const doc = snapshot.docs[0];
      const previousStatus = toStringOrNull(doc.data().status);

      transaction.update(doc.ref, {
        status: DoseStatus.Taken,
        taken_time: Timestamp.fromDate(takenAt),
      });

      return { matched: 1, doseEventId: doc.id, previousStatus };
    });
  }
}
