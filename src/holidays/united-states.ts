// Holidays and observances in the United States.

import { Holiday } from "../holiday.js";

/** Third Monday in January */
export const MLK_DAY = Holiday.nth(
  "Martin Luther King Jr. Day",
  "third",
  "monday",
  1,
);

export const GROUNDHOG_DAY = Holiday.fixed("Groundhog Day", 2, 2);

/** First Sunday in February */
export const SUPERBOWL_SUNDAY = Holiday.nth(
  "Super Bowl Sunday",
  "first",
  "sunday",
  2,
);

/** Third Monday in February */
export const PRESIDENTS_DAY = Holiday.nth(
  "President's Day",
  "third",
  "monday",
  2,
);

export const VALENTINES_DAY = Holiday.fixed("Valentine's Day", 2, 14);

/** Second Sunday in March */
export const DST_START = Holiday.nth(
  "Daylight Saving Time Starts",
  "second",
  "sunday",
  3,
);

export const APRIL_FOOLS_DAY = Holiday.fixed("April Fool's Day", 4, 1);

/** First Saturday in May */
export const KENTUCKY_DERBY = Holiday.nth(
  "Kentucky Derby",
  "first",
  "saturday",
  5,
);

/** Last Monday in May */
export const MEMORIAL_DAY = Holiday.nth("Memorial Day", "last", "monday", 5);

/** Second Sunday in May */
export const MOTHERS_DAY = Holiday.nth("Mother's Day", "second", "sunday", 5);

export const FLAG_DAY = Holiday.fixed("Flag Day", 6, 14);

export const INDEPENDENCE_DAY = Holiday.fixed("Independence Day", 7, 4);

/** Third Sunday in June */
export const FATHERS_DAY = Holiday.nth("Father's Day", "third", "sunday", 6);

/** First Monday in September */
export const LABOR_DAY = Holiday.nth("Labor Day", "first", "monday", 9);

export const HALLOWEEN = Holiday.fixed("Halloween", 10, 31);

/** Second Monday in October */
export const COLUMBUS_DAY = Holiday.nth("Columbus Day", "second", "monday", 10);

export const VETERANS_DAY = Holiday.fixed("Veteran's Day", 11, 11);

/** First Sunday in November */
export const DST_END = Holiday.nth(
  "Daylight Saving Time Ends",
  "first",
  "sunday",
  11,
);

/** Fourth Thursday in November */
export const THANKSGIVING = Holiday.nth(
  "Thanksgiving",
  "fourth",
  "thursday",
  11,
);
