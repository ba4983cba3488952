import { daysBefore, getUtcDateString, getUtcDayWindow, MS_PER_DAY } from '../timeWindows';

describe('timeWindows', () => {
  it('returns the half-open UTC day containing now', () => {
    const { start, end } = getUtcDayWindow(new Date('2024-05-10T17:42:13.500Z'));

    expect(start.toISOString()).toBe('2024-05-10T00:00:00.000Z');
    expect(end.toISOString()).toBe('2024-05-11T00:00:00.000Z');
  });

  it('starts the window at now when now is exactly midnight UTC', () => {
    const { start, end } = getUtcDayWindow(new Date('2024-12-31T00:00:00.000Z'));

    expect(start.toISOString()).toBe('2024-12-31T00:00:00.000Z');
    expect(end.toISOString()).toBe('2025-01-01T00:00:00.000Z');
  });

  it('formats the UTC calendar date', () => {
    expect(getUtcDateString(new Date('2024-05-10T23:59:59.999Z'))).toBe('2024-05-10');
  });

  it('subtracts whole days', () => {
    const now = new Date('2024-05-10T12:00:00.000Z');

    expect(daysBefore(now, 7).toISOString()).toBe('2024-05-03T12:00:00.000Z');
    expect(daysBefore(now, 30).getTime()).toBe(now.getTime() - 30 * MS_PER_DAY);
  });
});
