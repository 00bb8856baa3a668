// Calendar helpers over Temporal.PlainDate.

import { Temporal } from "@js-temporal/polyfill";
import { HolidayError } from "./error.js";

type PD = Temporal.PlainDate;

/** Earliest date Temporal can represent. */
export const MIN_DATE: PD = Temporal.PlainDate.from("-271821-04-19");

/** Latest date Temporal can represent. */
export const MAX_DATE: PD = Temporal.PlainDate.from("+275760-09-13");

/** Build a date, reporting dates outside the representable range as `range` errors. */
export function dateFrom(year: number, month: number, day: number): PD {
  try {
    return Temporal.PlainDate.from(
      { year, month, day },
      { overflow: "reject" },
    );
  } catch (err) {
    if (err instanceof RangeError) {
      throw HolidayError.range(
        `${year}-${month}-${day} is not a representable date`,
      );
    }
    throw err;
  }
}

/** The following day. */
export function succ(date: PD): PD {
  if (Temporal.PlainDate.compare(date, MAX_DATE) >= 0) {
    throw HolidayError.range(`no date after ${date.toString()}`);
  }
  return date.add({ days: 1 });
}

/** The preceding day. */
export function pred(date: PD): PD {
  if (Temporal.PlainDate.compare(date, MIN_DATE) <= 0) {
    throw HolidayError.range(`no date before ${date.toString()}`);
  }
  return date.subtract({ days: 1 });
}

export function firstDayOfMonth(year: number, month: number): PD {
  return dateFrom(year, month, 1);
}

/** Day 1 of the following month, minus one day. */
export function lastDayOfMonth(year: number, month: number): PD {
  const next = month === 12 ? { year: year + 1, month: 1 } : { year, month: month + 1 };
  return pred(firstDayOfMonth(next.year, next.month));
}

/**
 * Whether `date` is the final occurrence of its weekday in its month, i.e.
 * the same weekday a week later falls in the next month.
 */
export function isLastWeekday(date: PD): boolean {
  return date.day + 7 > date.daysInMonth;
}

/** Current local date, in `timeZone` when given. */
export function today(timeZone?: string): PD {
  return Temporal.Now.plainDateISO(timeZone);
}

export function daysBetween(a: PD, b: PD): number {
  return a.until(b, { largestUnit: "days" }).days;
}
