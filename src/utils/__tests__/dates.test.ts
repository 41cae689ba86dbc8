import { describe, it, expect } from 'vitest';
import {
  toDateKey,
  toTimestamp,
  isValidDateKey,
  parseDateKey,
  addDays,
} from '../dates.js';

describe('toDateKey / toTimestamp', () => {
  it('formats local calendar fields with zero padding', () => {
    const date = new Date(2024, 0, 5, 7, 3, 9);
    expect(toDateKey(date)).toBe('2024-01-05');
    expect(toTimestamp(date)).toBe('2024-01-05 07:03:09');
  });
});

describe('isValidDateKey', () => {
  it('accepts real dates', () => {
    expect(isValidDateKey('2024-02-29')).toBe(true);
    expect(isValidDateKey('2023-12-31')).toBe(true);
  });

  it('rejects impossible dates', () => {
    expect(isValidDateKey('2024-02-30')).toBe(false);
    expect(isValidDateKey('2023-02-29')).toBe(false);
    expect(isValidDateKey('2024-13-01')).toBe(false);
  });

  it('rejects other shapes', () => {
    expect(isValidDateKey('2024-3-5')).toBe(false);
    expect(isValidDateKey('15/03/2024')).toBe(false);
    expect(isValidDateKey('')).toBe(false);
  });
});

describe('parseDateKey', () => {
  it('returns local midnight', () => {
    const date = parseDateKey('2024-03-15');
    expect(date.getFullYear()).toBe(2024);
    expect(date.getMonth()).toBe(2);
    expect(date.getDate()).toBe(15);
    expect(date.getHours()).toBe(0);
  });

  it('throws on an invalid key', () => {
    expect(() => parseDateKey('2024-02-30')).toThrow('Invalid date: 2024-02-30');
  });
});

describe('addDays', () => {
  it('moves across month and year boundaries', () => {
    expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
    expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
    expect(addDays('2023-12-31', 1)).toBe('2024-01-01');
  });

  it('keeps the key unchanged for zero', () => {
    expect(addDays('2024-03-15', 0)).toBe('2024-03-15');
  });

  it('covers a 30-day window', () => {
    expect(addDays('2024-03-15', -29)).toBe('2024-02-15');
  });
});
