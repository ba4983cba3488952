/**
 * Dose status vocabulary and the transitions this service recognizes.
 *
 * Stored documents carry `status` as a free string. Values outside the enumeration
 * are preserved as stored and treated as upcoming when bucketing today's doses.
 */

export const DoseStatus = {
  Scheduled: 'scheduled',
  Taken: 'taken',
  Missed: 'missed',
  Skipped: 'skipped',
} as const;

export type DoseStatus = (typeof DoseStatus)[keyof typeof DoseStatus];

export type TodayBucket = 'taken' | 'missed' | 'upcoming';

const DOSE_STATUS_VALUES: readonly DoseStatus[] = Object.values(DoseStatus);

// Scheduled -> Missed / Skipped are written by an external scheduler; only
// confirmation (-> Taken) happens here. Taken -> Taken is a re-confirmation.
export const DOSE_STATUS_TRANSITIONS: Readonly<Record<DoseStatus, readonly DoseStatus[]>> = {
  [DoseStatus.Scheduled]: [DoseStatus.Taken, DoseStatus.Missed, DoseStatus.Skipped],
  [DoseStatus.Taken]: [DoseStatus.Taken],
  [DoseStatus.Missed]: [],
  [DoseStatus.Skipped]: [],
};

export function parseDoseStatus(value: unknown): DoseStatus | null {
  if (typeof value !== 'string') {
    return null;
  }

  return DOSE_STATUS_VALUES.find((status) => status === value) ?? null;
}

/**
 * True when `from -> to` is one of the documented transitions. A missing stored
 * status reads as scheduled; an unrecognized one has no documented transitions.
 */
export function isDocumentedTransition(from: string | null, to: DoseStatus): boolean {
  const current = from === null ? DoseStatus.Scheduled : parseDoseStatus(from);
  if (!current) {
    return false;
  }

  return DOSE_STATUS_TRANSITIONS[current].includes(to);
}

export function todayBucketFor(status: string | null): TodayBucket {
  const parsed = parseDoseStatus(status);
  if (parsed === DoseStatus.Taken) return 'taken';
  if (parsed === DoseStatus.Missed) return 'missed';
  return 'upcoming';
}
