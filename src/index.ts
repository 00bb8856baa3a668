// recurring-holidays: Public API

export { Temporal } from "@js-temporal/polyfill";
export {
  MAX_DATE,
  MIN_DATE,
  firstDayOfMonth,
  isLastWeekday,
  lastDayOfMonth,
} from "./calendar.js";
export {
  comparePatterns,
  matches,
  nthWeekdayFromDate,
  samePattern,
} from "./compare.js";
export { displayPattern } from "./display.js";
export type { HolidayErrorKind } from "./error.js";
export { HolidayError } from "./error.js";
export {
  after,
  afterToday,
  before,
  beforeToday,
  firstDate,
  inYear,
  lastDate,
} from "./eval.js";
export { Holiday } from "./holiday.js";
export {
  ALL_HOLIDAYS,
  findHoliday,
  globalHolidays,
  lookupHoliday,
  normalizeHolidayName,
  usHolidays,
} from "./holidays/index.js";
export { OccurrenceIterator, iterate, resolver } from "./iter.js";
export type { Resolvable } from "./iter.js";
export type {
  DayOfMonth,
  Month,
  NthWeekdayOfMonth,
  OrdinalPosition,
  RecurrencePattern,
  Weekday,
} from "./pattern.js";
export {
  dayOfMonth,
  nthWeekdayOfMonth,
  ordinalFromN,
  ordinalToN,
} from "./pattern.js";
