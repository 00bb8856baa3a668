// Recurrence pattern types: discriminated unions for annually repeating dates.

import { HolidayError } from "./error.js";

export type Weekday =
  | "monday"
  | "tuesday"
  | "wednesday"
  | "thursday"
  | "friday"
  | "saturday"
  | "sunday";

export type Month = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12;

export type OrdinalPosition =
  | "first"
  | "second"
  | "third"
  | "fourth"
  | "fifth"
  | "last";

// --- Patterns ---

/** A fixed day of the month, e.g. "October 31". */
export interface DayOfMonth {
  type: "fixed";
  month: Month;
  day: number;
}

/** The nth weekday of a month, e.g. "Fourth Thursday in November". */
export interface NthWeekdayOfMonth {
  type: "nth";
  nth: OrdinalPosition;
  weekday: Weekday;
  month: Month;
}

export type RecurrencePattern = DayOfMonth | NthWeekdayOfMonth;

// --- Helper functions ---

/** ISO 8601 day number: Monday=1, Sunday=7. */
export function weekdayNumber(day: Weekday): number {
  const map: Record<Weekday, number> = {
    monday: 1,
    tuesday: 2,
    wednesday: 3,
    thursday: 4,
    friday: 5,
    saturday: 6,
    sunday: 7,
  };
  return map[day];
}

/** Days from Sunday: Sunday=0, Monday=1, ..., Saturday=6. */
export function weekdayIndex(day: Weekday): number {
  const map: Record<Weekday, number> = {
    sunday: 0,
    monday: 1,
    tuesday: 2,
    wednesday: 3,
    thursday: 4,
    friday: 5,
    saturday: 6,
  };
  return map[day];
}

export function weekdayFromNumber(n: number): Weekday | null {
  const map: Record<number, Weekday> = {
    1: "monday",
    2: "tuesday",
    3: "wednesday",
    4: "thursday",
    5: "friday",
    6: "saturday",
    7: "sunday",
  };
  return map[n] ?? null;
}

const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

export function monthName(month: Month): string {
  return MONTH_NAMES[month - 1];
}

const MONTHS: readonly Month[] = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12];

export function toMonth(n: number): Month | null {
  return MONTHS.find((m) => m === n) ?? null;
}

/** Numeric rank: first=1 ... fifth=5, last=6. */
export function ordinalToN(ord: OrdinalPosition): number {
  const map: Record<OrdinalPosition, number> = {
    first: 1,
    second: 2,
    third: 3,
    fourth: 4,
    fifth: 5,
    last: 6,
  };
  return map[ord];
}

/**
 * Ordinal for a numeric rank. Anything above five is `"last"`; zero and
 * negative ranks are rejected.
 */
export function ordinalFromN(n: number): OrdinalPosition {
  if (!Number.isInteger(n) || n < 1) {
    throw HolidayError.invalid(`ordinal must be a positive integer, got ${n}`);
  }
  const ordinals: OrdinalPosition[] = [
    "first",
    "second",
    "third",
    "fourth",
    "fifth",
  ];
  return ordinals[n - 1] ?? "last";
}

/** The longest a month can ever be: 29 for February, 30 or 31 otherwise. */
export function maxDaysInMonth(month: Month): number {
  switch (month) {
    case 2:
      return 29;
    case 4:
    case 6:
    case 9:
    case 11:
      return 30;
    default:
      return 31;
  }
}

function checkMonth(month: number): Month {
  const m = toMonth(month);
  if (m === null) {
    throw HolidayError.invalid(`month must be between 1 and 12, got ${month}`);
  }
  return m;
}

export const ALL_DAYS: readonly Weekday[] = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
  "sunday",
];

// --- Constructors ---

/** Fixed day of the month. Rejects combinations that occur in no year. */
export function dayOfMonth(month: number, day: number): DayOfMonth {
  const m = checkMonth(month);
  if (!Number.isInteger(day) || day < 1 || day > maxDaysInMonth(m)) {
    throw HolidayError.invalid(
      `${monthName(m)} never has a day ${day}`,
    );
  }
  return { type: "fixed", month: m, day };
}

export function nthWeekdayOfMonth(
  nth: OrdinalPosition | number,
  weekday: Weekday,
  month: number,
): NthWeekdayOfMonth {
  const ordinal = typeof nth === "number" ? ordinalFromN(nth) : nth;
  if (!ALL_DAYS.includes(weekday)) {
    throw HolidayError.invalid(`unknown weekday: ${String(weekday)}`);
  }
  return { type: "nth", nth: ordinal, weekday, month: checkMonth(month) };
}
