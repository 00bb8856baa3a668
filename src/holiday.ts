import type { Temporal } from "@js-temporal/polyfill";
import { compareNamed, matches, samePattern } from "./compare.js";
import { displayPattern } from "./display.js";
import {
  after,
  afterToday,
  before,
  beforeToday,
  firstDate,
  inYear,
  lastDate,
} from "./eval.js";
import { OccurrenceIterator, type Resolvable } from "./iter.js";
import {
  type OrdinalPosition,
  type RecurrencePattern,
  type Weekday,
  dayOfMonth,
  nthWeekdayOfMonth,
} from "./pattern.js";

type PD = Temporal.PlainDate;

/** A named, annually repeating date such as "Thanksgiving". */
export class Holiday implements Resolvable {
  readonly name: string;
  readonly pattern: RecurrencePattern;

  constructor(name: string, pattern: RecurrencePattern) {
    this.name = name;
    this.pattern = pattern;
  }

  /** A holiday on the same day every year, e.g. `Holiday.fixed("Halloween", 10, 31)`. */
  static fixed(name: string, month: number, day: number): Holiday {
    return new Holiday(name, dayOfMonth(month, day));
  }

  /**
   * A holiday on the nth weekday of a month, e.g.
   * `Holiday.nth("Thanksgiving", "fourth", "thursday", 11)`.
   */
  static nth(
    name: string,
    nth: OrdinalPosition | number,
    weekday: Weekday,
    month: number,
  ): Holiday {
    return new Holiday(name, nthWeekdayOfMonth(nth, weekday, month));
  }

  /** Sort order: by pattern, then by name. */
  static compare(a: Holiday, b: Holiday): number {
    return compareNamed(a, b);
  }

  /** The earliest occurrence on or after `date`. */
  after(date: PD): PD {
    return after(this.pattern, date);
  }

  /** The latest occurrence strictly before `date`. */
  before(date: PD): PD {
    return before(this.pattern, date);
  }

  afterToday(timeZone?: string): PD {
    return afterToday(this.pattern, timeZone);
  }

  beforeToday(timeZone?: string): PD {
    return beforeToday(this.pattern, timeZone);
  }

  firstDate(): PD {
    return firstDate(this.pattern);
  }

  lastDate(): PD {
    return lastDate(this.pattern);
  }

  /** The date of this holiday in `year`. */
  inYear(year: number): PD {
    return inYear(this.pattern, year);
  }

  /** Check if a date is an occurrence of this holiday. */
  matches(date: PD): boolean {
    return matches(this.pattern, date);
  }

  /** Same name and same pattern. */
  equals(other: Holiday): boolean {
    return this.name === other.name && samePattern(this.pattern, other.pattern);
  }

  /** Iterate over occurrences; see `OccurrenceIterator` for positioning. */
  iter(): OccurrenceIterator {
    return new OccurrenceIterator(this);
  }

  [Symbol.iterator](): OccurrenceIterator {
    return this.iter();
  }

  /** Name and rule, e.g. "Thanksgiving: Fourth Thursday in November". */
  describe(): string {
    return `${this.name}: ${displayPattern(this.pattern)}`;
  }

  toString(): string {
    return this.name;
  }
}
