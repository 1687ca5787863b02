/**
 * Utility Tests
 */

import {
  TimeoutError,
  addDays,
  capitalize,
  formatDisplayDate,
  formatDisplayTimestamp,
  formatIsoDate,
  titleCase,
  withTimeout,
} from '..';

describe('date helpers', () => {
  it('should format display dates with a padded day', () => {
    expect(formatDisplayDate(new Date(2026, 9, 5))).toBe('05 Oct 2026');
  });

  it('should format timestamps on a 12-hour clock', () => {
    expect(formatDisplayTimestamp(new Date(2026, 9, 19, 13, 4))).toBe('19 Oct 2026, 01:04 PM');
    expect(formatDisplayTimestamp(new Date(2026, 9, 19, 0, 30))).toBe('19 Oct 2026, 12:30 AM');
  });

  it('should add days across a month boundary', () => {
    expect(formatIsoDate(addDays(new Date(2026, 9, 30), 3))).toBe('2026-11-02');
  });
});

describe('capitalize', () => {
  it('should trim and capitalize', () => {
    expect(capitalize(' wHEAT ')).toBe('Wheat');
    expect(capitalize('')).toBe('');
  });
});

describe('titleCase', () => {
  it('should capitalize every word and collapse whitespace', () => {
    expect(titleCase(' new  DELHI ')).toBe('New Delhi');
    expect(titleCase('INDORE')).toBe('Indore');
  });
});

describe('withTimeout', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('should resolve with the value and clear its timer', async () => {
    jest.useFakeTimers();

    await expect(withTimeout(Promise.resolve(42), 1000)).resolves.toBe(42);
    expect(jest.getTimerCount()).toBe(0);
  });

  it('should reject with a labelled TimeoutError', async () => {
    jest.useFakeTimers();

    const pending = withTimeout(new Promise<never>(() => undefined), 1000, 'Slow call');
    jest.advanceTimersByTime(1000);

    await expect(pending).rejects.toThrow(TimeoutError);
    await expect(pending).rejects.toThrow('Slow call timed out after 1000ms');
  });
});
