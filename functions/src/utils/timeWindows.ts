export const MS_PER_DAY = 24 * 60 * 60 * 1000;

export type TimeWindow = {
  start: Date;
  end: Date;
};

/**
 * Half-open UTC calendar day [00:00:00Z, next 00:00:00Z) containing `now`.
 */
export function getUtcDayWindow(now: Date): TimeWindow {
  const start = new Date(
    Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), 0, 0, 0, 0),
  );
  return {
    start,
    end: new Date(start.getTime() + MS_PER_DAY),
  };
}

export function getUtcDateString(now: Date): string {
  return now.toISOString().slice(0, 10);
}

export function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * MS_PER_DAY);
}
