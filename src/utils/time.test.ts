/**
 * Time utility tests
 */

import { describe, it, expect } from 'vitest';
import {
  dayNumberToIsoDate,
  isoDateToDayNumber,
  localToday,
  timestampToIso,
} from './time.js';

describe('database dates', () => {
  it('converts day numbers to ISO dates', () => {
    expect(dayNumberToIsoDate(0)).toBe('2001-01-01');
    expect(dayNumberToIsoDate(31)).toBe('2001-02-01');
    expect(dayNumberToIsoDate(null)).toBeNull();
  });

  it('converts ISO dates back to day numbers', () => {
    expect(isoDateToDayNumber('2001-01-01')).toBe(0);
    expect(isoDateToDayNumber('2002-01-01')).toBe(365);
    expect(dayNumberToIsoDate(isoDateToDayNumber('2024-12-15'))).toBe('2024-12-15');
  });

  it('converts timestamps to ISO strings', () => {
    expect(timestampToIso(0)).toBe('2001-01-01T00:00:00.000Z');
    expect(timestampToIso(3600.5)).toBe('2001-01-01T01:00:00.500Z');
    expect(timestampToIso(null)).toBeNull();
  });

  it('formats the local date', () => {
    expect(localToday(new Date(2024, 0, 5, 23, 30))).toBe('2024-01-05');
  });
});
