/**
 * Publication timestamp parsing
 *
 * Pages carry timestamps like "12 September 2025 | 15.22 WIB".
 */

import type { PublicationDateTime } from '../types/index.js';

const MONTHS: Record<string, string> = {
  January: '01',
  February: '02',
  March: '03',
  April: '04',
  May: '05',
  June: '06',
  July: '07',
  August: '08',
  September: '09',
  October: '10',
  November: '11',
  December: '12',
};

const EMPTY: PublicationDateTime = { date: '', time: '', timezone: '' };

/**
 * Split a raw timestamp into ISO date, `HH:MM:00` time and zone token.
 * Each part is empty when it cannot be read; an unknown month name maps to "01".
 */
export function parsePublicationDateTime(raw: string): PublicationDateTime {
  if (!raw) {
    return { ...EMPTY };
  }

  const parts = raw.split(' | ');
  if (parts.length !== 2) {
    return { ...EMPTY };
  }

  const [datePart = '', timePart = ''] = parts.map((part) => part.trim());

  return {
    date: parseDatePart(datePart),
    ...parseTimePart(timePart),
  };
}

function parseDatePart(datePart: string): string {
  const tokens = splitWords(datePart);
  if (tokens.length !== 3) {
    return '';
  }

  const [day = '', monthName = '', year = ''] = tokens;
  const month = MONTHS[monthName] ?? '01';
  return `${year}-${month}-${day.padStart(2, '0')}`;
}

function parseTimePart(timePart: string): Pick<PublicationDateTime, 'time' | 'timezone'> {
  const tokens = splitWords(timePart);
  const [clock, timezone = ''] = tokens;
  if (clock === undefined) {
    return { time: '', timezone: '' };
  }

  const pieces = clock.split('.');
  if (pieces.length !== 2) {
    return { time: '', timezone };
  }

  const [hour = '', minute = ''] = pieces;
  return { time: `${hour.padStart(2, '0')}:${minute.padStart(2, '0')}:00`, timezone };
}

function splitWords(value: string): string[] {
  return value.split(/\s+/).filter((token) => token.length > 0);
}

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * True for a `YYYY-MM-DD` string naming a real calendar day
 */
export function isValidIsoDate(value: string): boolean {
  const match = ISO_DATE.exec(value);
  if (!match) {
    return false;
  }

  const [, year, month, day] = match.map(Number);
  const date = new Date(Date.UTC(year ?? 0, (month ?? 0) - 1, day ?? 0));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() + 1 === month &&
    date.getUTCDate() === day
  );
}

/**
 * Move a `YYYY-MM-DD` date by whole calendar days
 */
export function shiftIsoDate(value: string, days: number): string {
  if (!isValidIsoDate(value)) {
    throw new Error(`Invalid date, expected YYYY-MM-DD: ${value}`);
  }

  const date = new Date(`${value}T00:00:00Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}
