import { describe, expect, it } from 'vitest';
import { isValidIsoDate, parsePublicationDateTime, shiftIsoDate } from './date-parser.js';

describe('parsePublicationDateTime', () => {
  it('splits a page timestamp into date, time and zone', () => {
    expect(parsePublicationDateTime('12 September 2025 | 15.22 WIB')).toEqual({
      date: '2025-09-12',
      time: '15:22:00',
      timezone: 'WIB',
    });
  });

  it('zero-pads single-digit day and hour', () => {
    expect(parsePublicationDateTime('3 March 2024 | 7.05 WITA')).toEqual({
      date: '2024-03-03',
      time: '07:05:00',
      timezone: 'WITA',
    });
  });

  it('returns all-empty for empty input', () => {
    expect(parsePublicationDateTime('')).toEqual({ date: '', time: '', timezone: '' });
  });

  it('returns all-empty when there is no separator', () => {
    expect(parsePublicationDateTime('garbage')).toEqual({ date: '', time: '', timezone: '' });
  });

  it('returns all-empty when the separator appears twice', () => {
    expect(parsePublicationDateTime('1 May 2025 | 10.00 WIB | x')).toEqual({
      date: '',
      time: '',
      timezone: '',
    });
  });

  it('maps an unknown month name to 01', () => {
    expect(parsePublicationDateTime('12 Septembre 2025 | 15.22 WIB').date).toBe('2025-01-12');
  });

  it('keeps a valid date when the time is malformed', () => {
    expect(parsePublicationDateTime('12 September 2025 | 1522 WIB')).toEqual({
      date: '2025-09-12',
      time: '',
      timezone: 'WIB',
    });
  });

  it('leaves the date empty when it does not have three parts', () => {
    expect(parsePublicationDateTime('September 2025 | 15.22 WIB')).toEqual({
      date: '',
      time: '15:22:00',
      timezone: 'WIB',
    });
  });

  it('allows a time without zone token', () => {
    expect(parsePublicationDateTime('12 September 2025 | 15.22')).toEqual({
      date: '2025-09-12',
      time: '15:22:00',
      timezone: '',
    });
  });
});

describe('isValidIsoDate', () => {
  it('accepts real calendar days', () => {
    expect(isValidIsoDate('2024-02-29')).toBe(true);
  });

  it('rejects impossible days and other formats', () => {
    expect(isValidIsoDate('2025-02-29')).toBe(false);
    expect(isValidIsoDate('2025-13-01')).toBe(false);
    expect(isValidIsoDate('12-09-2025')).toBe(false);
    expect(isValidIsoDate('2025-9-12')).toBe(false);
  });
});

describe('shiftIsoDate', () => {
  it('moves across month and year boundaries', () => {
    expect(shiftIsoDate('2025-09-30', 1)).toBe('2025-10-01');
    expect(shiftIsoDate('2025-01-01', -1)).toBe('2024-12-31');
  });

  it('throws on malformed input', () => {
    expect(() => shiftIsoDate('yesterday', 1)).toThrow('Invalid date');
  });
});
