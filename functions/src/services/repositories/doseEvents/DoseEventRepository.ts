import type { DoseStatus } from '../../domain/doseEvents/doseStatus';
import type { UtcInstant } from '../../../utils/isoDateTime';

export type DoseEventRecord = {
  id: string;
  userId: string | null;
  medicationId: string | null;
  // Full stored precision; Firestore keeps microseconds.
  scheduledTime: UtcInstant | null;
  takenTime: UtcInstant | null;
  // As stored; not constrained to DoseStatus.
  status: string | null;
};

export type DoseEventSortDirection = 'asc' | 'desc';

export type DoseEventListByUserOptions = {
  /** Inclusive lower bound on scheduled_time. */
  scheduledFrom?: Date;
  /** Exclusive upper bound on scheduled_time. */
  scheduledBefore?: Date;
  status?: DoseStatus;
  /** Orders by scheduled_time; store order when omitted. */
  sortDirection?: DoseEventSortDirection;
};

export type DoseEventScheduleKey = {
  userId: string;
  medicationId: string;
  /** Matched for exact equality with the stored value. */
  scheduledTime: UtcInstant;
};

export type MarkTakenResult =
  | { matched: 0 }
  | { matched: 1; doseEventId: string; previousStatus: string | null };

export interface DoseEventRepository {
  listByUser(userId: string, options?: DoseEventListByUserOptions): Promise<DoseEventRecord[]>;
  /**
   * Atomically finds the dose event for the schedule key and sets it taken.
   * `matched: 0` means nothing was written.
   */
  markTakenBySchedule(key: DoseEventScheduleKey, takenAt: Date): Promise<MarkTakenResult>;
}
