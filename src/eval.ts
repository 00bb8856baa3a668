// Evaluator: finds the occurrences of a recurrence pattern around a date.

import type { Temporal } from "@js-temporal/polyfill";
import {
  MAX_DATE,
  MIN_DATE,
  dateFrom,
  firstDayOfMonth,
  lastDayOfMonth,
  pred,
  succ,
  today,
} from "./calendar.js";
import { matches } from "./compare.js";
import { HolidayError } from "./error.js";
import type {
  DayOfMonth,
  NthWeekdayOfMonth,
  RecurrencePattern,
} from "./pattern.js";
import { maxDaysInMonth, monthName } from "./pattern.js";

type PD = Temporal.PlainDate;

// =============================================================================
// Iteration Safety Limits
// =============================================================================
// Fixed dates are scanned one day at a time. February 29 is the sparsest
// fixed date: consecutive occurrences can be eight years apart (1896-02-29
// to 1904-02-29), so MAX_FIXED_STEPS covers eight years of days.
//
// Nth weekdays jump between years and only scan inside the target month.
// The fifth weekday of February is the sparsest: it needs a leap year whose
// February starts on that weekday, and the calendar repeats every 400 years.
// MAX_NTH_STEPS covers 400 years of at most 32 candidate days each.
// =============================================================================

const MAX_FIXED_STEPS = 8 * 366;
const MAX_NTH_STEPS = 400 * 32;

function checkReachable(pattern: DayOfMonth): void {
  if (pattern.day < 1 || pattern.day > maxDaysInMonth(pattern.month)) {
    throw HolidayError.unreachable(
      `${monthName(pattern.month)} ${pattern.day} never occurs`,
    );
  }
}

function describeNth(pattern: NthWeekdayOfMonth): string {
  return `${pattern.nth} ${pattern.weekday} in ${monthName(pattern.month)}`;
}

// --- Fixed dates ---

function afterDayOfMonth(pattern: DayOfMonth, date: PD): PD {
  checkReachable(pattern);
  let check = date;
  for (let i = 0; i < MAX_FIXED_STEPS; i++) {
    if (matches(pattern, check)) return check;
    check = succ(check);
  }
  throw HolidayError.unreachable(
    `no ${monthName(pattern.month)} ${pattern.day} within eight years after ${date.toString()}`,
  );
}

function beforeDayOfMonth(pattern: DayOfMonth, date: PD): PD {
  checkReachable(pattern);
  let check = pred(date);
  for (let i = 0; i < MAX_FIXED_STEPS; i++) {
    if (matches(pattern, check)) return check;
    check = pred(check);
  }
  throw HolidayError.unreachable(
    `no ${monthName(pattern.month)} ${pattern.day} within eight years before ${date.toString()}`,
  );
}

// --- Nth weekdays ---

function afterNthWeekday(pattern: NthWeekdayOfMonth, date: PD): PD {
  let check = date;
  for (let i = 0; i < MAX_NTH_STEPS; i++) {
    if (matches(pattern, check)) return check;
    if (check.month < pattern.month) {
      check = firstDayOfMonth(check.year, pattern.month);
    } else if (check.month > pattern.month) {
      check = firstDayOfMonth(check.year + 1, pattern.month);
    } else {
      check = succ(check);
    }
  }
  throw HolidayError.unreachable(
    `no ${describeNth(pattern)} within 400 years after ${date.toString()}`,
  );
}

function beforeNthWeekday(pattern: NthWeekdayOfMonth, date: PD): PD {
  let check = pred(date);
  for (let i = 0; i < MAX_NTH_STEPS; i++) {
    if (matches(pattern, check)) return check;
    if (check.month > pattern.month) {
      check = lastDayOfMonth(check.year, pattern.month);
    } else if (check.month < pattern.month) {
      check = lastDayOfMonth(check.year - 1, pattern.month);
    } else {
      check = pred(check);
    }
  }
  throw HolidayError.unreachable(
    `no ${describeNth(pattern)} within 400 years before ${date.toString()}`,
  );
}

// --- Public API ---

/** The earliest occurrence on or after `date`. */
export function after(pattern: RecurrencePattern, date: PD): PD {
  switch (pattern.type) {
    case "fixed":
      return afterDayOfMonth(pattern, date);
    case "nth":
      return afterNthWeekday(pattern, date);
  }
}

/** The latest occurrence strictly before `date`. */
export function before(pattern: RecurrencePattern, date: PD): PD {
  switch (pattern.type) {
    case "fixed":
      return beforeDayOfMonth(pattern, date);
    case "nth":
      return beforeNthWeekday(pattern, date);
  }
}

/** The next occurrence, counting today. */
export function afterToday(pattern: RecurrencePattern, timeZone?: string): PD {
  return after(pattern, today(timeZone));
}

/** The most recent occurrence, not counting today. */
export function beforeToday(pattern: RecurrencePattern, timeZone?: string): PD {
  return before(pattern, today(timeZone));
}

/** The earliest occurrence Temporal can represent. */
export function firstDate(pattern: RecurrencePattern): PD {
  return after(pattern, MIN_DATE);
}

/** The latest occurrence Temporal can represent. */
export function lastDate(pattern: RecurrencePattern): PD {
  return before(pattern, MAX_DATE);
}

/** The occurrence in `year`, or the first one after it if `year` has none. */
export function inYear(pattern: RecurrencePattern, year: number): PD {
  return after(pattern, dateFrom(year, 1, 1));
}
