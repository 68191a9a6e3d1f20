import { InvalidDateFormatError } from './errors';
import { Result, fail, ok } from './types';

/**
 * Calendar helpers for birthdays. Every Date handled here is a local
 * midnight; the time of day is never significant.
 */

const BIRTHDAY_PATTERN = /^(\d{2})\.(\d{2})\.(\d{4})$/;

export function makeDate(year: number, month: number, day: number): Date {
  // setFullYear keeps years below 100 as written; the Date constructor maps them to 19xx
  const date = new Date(0);
  date.setFullYear(year, month - 1, day);
  date.setHours(0, 0, 0, 0);
  return date;
}

export function startOfDay(date: Date): Date {
  return makeDate(date.getFullYear(), date.getMonth() + 1, date.getDate());
}

export function addDays(date: Date, days: number): Date {
  return makeDate(date.getFullYear(), date.getMonth() + 1, date.getDate() + days);
}

export function parseBirthday(value: string): Result<Date, InvalidDateFormatError> {
  const match = value.match(BIRTHDAY_PATTERN);
  if (!match) {
    return fail(new InvalidDateFormatError(value));
  }

  const day = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const year = parseInt(match[3], 10);
  if (year < 1 || month < 1 || month > 12 || day < 1 || day > 31) {
    return fail(new InvalidDateFormatError(value));
  }

  // 31.02 and 29.02 of a common year roll over into March; reject them
  const date = makeDate(year, month, day);
  if (
    date.getFullYear() !== year ||
    date.getMonth() !== month - 1 ||
    date.getDate() !== day
  ) {
    return fail(new InvalidDateFormatError(value));
  }

  return ok(date);
}

export function formatDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const year = String(date.getFullYear()).padStart(4, '0');
  return `${day}.${month}.${year}`;
}

/**
 * The day a birthday is celebrated in `year`. A 29 February birthday
 * falls on 1 March in common years.
 */
export function birthdayInYear(birthday: Date, year: number): Date {
  return makeDate(year, birthday.getMonth() + 1, birthday.getDate());
}

/**
 * Next celebration on or after `referenceDate` (today counts).
 */
export function getNextBirthdayDate(birthday: Date, referenceDate?: Date): Date {
  const ref = startOfDay(referenceDate || new Date());
  const thisYear = ref.getFullYear();

  const thisYearBday = birthdayInYear(birthday, thisYear);
  if (thisYearBday < ref) {
    return birthdayInYear(birthday, thisYear + 1);
  }

  return thisYearBday;
}

export function isWithinDays(date: Date, today: Date, days: number): boolean {
  const from = startOfDay(today);
  const to = addDays(from, days);
  return date >= from && date <= to;
}
