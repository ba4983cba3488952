/**
 * Read helpers for loosely typed Firestore document fields.
 */

import { instantFromDate, type UtcInstant } from './isoDateTime';

/**
 * Reads a stored instant at full precision. Timestamps (and anything carrying
 * numeric `seconds` and `nanoseconds`) keep their nanosecond part.
 */
export function toUtcInstantOrNull(value: unknown): UtcInstant | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : instantFromDate(value);
  }

  if (typeof value === 'object' && value !== null && 'seconds' in value && 'nanoseconds' in value) {
    const { seconds, nanoseconds } = value;
    if (
      typeof seconds === 'number' &&
      typeof nanoseconds === 'number' &&
      Number.isInteger(seconds) &&
      Number.isInteger(nanoseconds)
    ) {
      return { seconds, nanoseconds };
    }
  }

  return null;
}

export function toStringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

export type StoredCount = number | string | null;

export function toStoredCount(value: unknown): StoredCount {
  if (typeof value === 'number' || typeof value === 'string') {
    return value;
  }
  return null;
}

/**
 * Integer coercion used by the inventory comparison. Missing or null values count
 * as 0; numbers truncate toward zero; strings parse as base-10 integers.
 * Returns null for values that cannot be read as an integer.
 */
export function coerceCount(value: StoredCount | undefined): number | null {
  if (value === null || value === undefined) {
    return 0;
  }

  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }

  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return null;
  }

  return Number.parseInt(trimmed, 10);
}
