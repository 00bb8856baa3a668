// Matching and ordering of recurrence patterns.

import type { Temporal } from "@js-temporal/polyfill";
import { isLastWeekday } from "./calendar.js";
import type {
  DayOfMonth,
  NthWeekdayOfMonth,
  RecurrencePattern,
} from "./pattern.js";
import {
  ordinalFromN,
  ordinalToN,
  toMonth,
  weekdayFromNumber,
  weekdayIndex,
  weekdayNumber,
} from "./pattern.js";

type PD = Temporal.PlainDate;

/** How many times the date's weekday has occurred in its month, counting the date itself. */
function weekdayRank(date: PD): number {
  return Math.floor((date.day - 1) / 7) + 1;
}

/**
 * The numbered nth-weekday pattern a date is an instance of, e.g.
 * 2020-11-26 is the fourth Thursday in November. Never yields `"last"`.
 */
export function nthWeekdayFromDate(date: PD): NthWeekdayOfMonth {
  const weekday = weekdayFromNumber(date.dayOfWeek);
  const month = toMonth(date.month);
  if (weekday === null || month === null) {
    throw new RangeError(`not an ISO calendar date: ${date.toString()}`);
  }
  return { type: "nth", nth: ordinalFromN(weekdayRank(date)), weekday, month };
}

function matchesDayOfMonth(pattern: DayOfMonth, date: PD): boolean {
  return date.month === pattern.month && date.day === pattern.day;
}

function matchesNthWeekday(pattern: NthWeekdayOfMonth, date: PD): boolean {
  if (date.month !== pattern.month) return false;
  if (date.dayOfWeek !== weekdayNumber(pattern.weekday)) return false;
  if (pattern.nth === "last") return isLastWeekday(date);
  return weekdayRank(date) === ordinalToN(pattern.nth);
}

/** Whether `date` is an occurrence of `pattern`. */
export function matches(pattern: RecurrencePattern, date: PD): boolean {
  switch (pattern.type) {
    case "fixed":
      return matchesDayOfMonth(pattern, date);
    case "nth":
      return matchesNthWeekday(pattern, date);
  }
}

/** Structural equality. */
export function samePattern(
  a: RecurrencePattern,
  b: RecurrencePattern,
): boolean {
  if (a.type === "fixed" && b.type === "fixed") {
    return a.month === b.month && a.day === b.day;
  }
  if (a.type === "nth" && b.type === "nth") {
    return a.nth === b.nth && a.weekday === b.weekday && a.month === b.month;
  }
  return false;
}

function sign(n: number): number {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

/**
 * Sort order for patterns: by month, then within a month every fixed date
 * sorts before every nth weekday. Fixed dates compare by day; nth weekdays by
 * ordinal rank, then by weekday counted from Sunday.
 *
 * This is an ordering for listing patterns, not for comparing their dates in
 * a given year: "November 30" sorts before "First Thursday in November".
 */
export function comparePatterns(
  a: RecurrencePattern,
  b: RecurrencePattern,
): number {
  if (a.month !== b.month) return sign(a.month - b.month);
  if (a.type === "fixed" && b.type === "fixed") return sign(a.day - b.day);
  if (a.type === "nth" && b.type === "nth") {
    if (a.nth !== b.nth) return sign(ordinalToN(a.nth) - ordinalToN(b.nth));
    return sign(weekdayIndex(a.weekday) - weekdayIndex(b.weekday));
  }
  return a.type === "fixed" ? -1 : 1;
}

export interface Named {
  readonly name: string;
  readonly pattern: RecurrencePattern;
}

/** Pattern order, with equal patterns ordered by name. */
export function compareNamed(a: Named, b: Named): number {
  if (samePattern(a.pattern, b.pattern)) {
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
  }
  return comparePatterns(a.pattern, b.pattern);
}
