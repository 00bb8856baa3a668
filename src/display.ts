// Display (toString) for recurrence patterns.

import type {
  NthWeekdayOfMonth,
  OrdinalPosition,
  RecurrencePattern,
  Weekday,
} from "./pattern.js";
import { monthName } from "./pattern.js";

function capitalize(s: string): string {
  return s.charAt(0).toUpperCase() + s.slice(1);
}

function displayOrdinal(ord: OrdinalPosition): string {
  return capitalize(ord);
}

function displayWeekday(day: Weekday): string {
  return capitalize(day);
}

function displayNth(pattern: NthWeekdayOfMonth): string {
  return `${displayOrdinal(pattern.nth)} ${displayWeekday(pattern.weekday)} in ${monthName(pattern.month)}`;
}

/** Render a pattern, e.g. "October 31" or "Fourth Thursday in November". */
export function displayPattern(pattern: RecurrencePattern): string {
  switch (pattern.type) {
    case "fixed":
      return `${monthName(pattern.month)} ${pattern.day}`;
    case "nth":
      return displayNth(pattern);
  }
}
