import { FormatError } from './errors.js';

const EMBEDDED_DATE_PATTERN = /\b\d{2}\.\d{2}\.\d{4}\b/;
const BOOKING_DATE_PATTERN = /^(\d{1,2})\.\s*(\d{1,2})\.\s*(\d{4})$/;
const REVOLUT_TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Find the first dd.mm.yyyy date anywhere in a statement line.
 */
export function extractEmbeddedDate(text: string): string | null {
  const match = EMBEDDED_DATE_PATTERN.exec(text);
  return match !== null ? match[0] : null;
}

/**
 * Normalize a booking date to dd.mm.yyyy. Accepts single-digit day or
 * month ("5.3.2023") and spaces after the dots.
 */
export function normalizeBookingDate(text: string): string {
  const match = BOOKING_DATE_PATTERN.exec(text.trim());
  if (match === null) {
    throw new FormatError('booking date', text);
  }
  const [, day, month, year] = match;
  if (day === undefined || month === undefined || year === undefined) {
    throw new FormatError('booking date', text);
  }
  const dayNum = parseInt(day, 10);
  const monthNum = parseInt(month, 10);
  if (dayNum < 1 || dayNum > 31 || monthNum < 1 || monthNum > 12) {
    throw new FormatError('booking date', text, 'day or month out of range');
  }
  return `${day.padStart(2, '0')}.${month.padStart(2, '0')}.${year}`;
}

/**
 * Convert a Revolut CSV timestamp ("2023-05-01 12:34:56") to dd.mm.yyyy.
 */
export function convertRevolutTimestamp(text: string): string {
  const match = REVOLUT_TIMESTAMP_PATTERN.exec(text.trim());
  if (match === null) {
    throw new FormatError('Revolut timestamp', text);
  }
  const [, year, month, day] = match;
  if (year === undefined || month === undefined || day === undefined) {
    throw new FormatError('Revolut timestamp', text);
  }
  return `${day}.${month}.${year}`;
}

/**
 * Numeric yyyymmdd key for a dd.mm.yyyy booking date.
 */
export function bookingDateSortKey(dateBooked: string): number {
  const normalized = normalizeBookingDate(dateBooked);
  const [day, month, year] = normalized.split('.');
  return parseInt(`${year ?? ''}${month ?? ''}${day ?? ''}`, 10);
}

export function compareBookingDates(a: string, b: string): number {
  return bookingDateSortKey(a) - bookingDateSortKey(b);
}

/**
 * dd.mm.yyyy → yyyy-mm-dd
 */
export function bookingDateToIso(dateBooked: string): string {
  const [day, month, year] = normalizeBookingDate(dateBooked).split('.');
  return `${year ?? ''}-${month ?? ''}-${day ?? ''}`;
}

export function isValidBookingDate(text: string): boolean {
  try {
    normalizeBookingDate(text);
    return true;
  } catch {
    return false;
  }
}
