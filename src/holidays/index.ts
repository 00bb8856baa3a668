// Holiday catalog and name lookup.

import { HolidayError } from "../error.js";
import { Holiday } from "../holiday.js";
import * as globalHolidays from "./global.js";
import * as usHolidays from "./united-states.js";

export { globalHolidays, usHolidays };

/** Every catalogued holiday, in calendar order. */
export const ALL_HOLIDAYS: readonly Holiday[] = [
  ...Object.values(globalHolidays),
  ...Object.values(usHolidays),
].sort(Holiday.compare);

const NAMES: Record<string, Holiday> = {
  "new years": globalHolidays.NEW_YEARS_DAY,
  "st. patricks": globalHolidays.ST_PATRICKS_DAY,
  "st patricks": globalHolidays.ST_PATRICKS_DAY,
  "christmas eve": globalHolidays.CHRISTMAS_EVE,
  christmas: globalHolidays.CHRISTMAS,
  "new years eve": globalHolidays.NEW_YEARS_EVE,
  "martin luther king jr.": usHolidays.MLK_DAY,
  "martin luther king jr": usHolidays.MLK_DAY,
  mlk: usHolidays.MLK_DAY,
  groundhog: usHolidays.GROUNDHOG_DAY,
  "superbowl sunday": usHolidays.SUPERBOWL_SUNDAY,
  "super bowl sunday": usHolidays.SUPERBOWL_SUNDAY,
  superbowl: usHolidays.SUPERBOWL_SUNDAY,
  presidents: usHolidays.PRESIDENTS_DAY,
  valentines: usHolidays.VALENTINES_DAY,
  "daylight saving time starts": usHolidays.DST_START,
  "april fools": usHolidays.APRIL_FOOLS_DAY,
  "kentucky derby": usHolidays.KENTUCKY_DERBY,
  memorial: usHolidays.MEMORIAL_DAY,
  mothers: usHolidays.MOTHERS_DAY,
  flag: usHolidays.FLAG_DAY,
  independence: usHolidays.INDEPENDENCE_DAY,
  "july 4th": usHolidays.INDEPENDENCE_DAY,
  "july fourth": usHolidays.INDEPENDENCE_DAY,
  "fourth of july": usHolidays.INDEPENDENCE_DAY,
  "4th of july": usHolidays.INDEPENDENCE_DAY,
  fathers: usHolidays.FATHERS_DAY,
  labor: usHolidays.LABOR_DAY,
  halloween: usHolidays.HALLOWEEN,
  columbus: usHolidays.COLUMBUS_DAY,
  veterans: usHolidays.VETERANS_DAY,
  "daylight saving time ends": usHolidays.DST_END,
  thanksgiving: usHolidays.THANKSGIVING,
};

/**
 * Reduce a holiday name to its lookup key: lowercase, without apostrophes,
 * a leading "the" or a trailing " day". "The Valentine's Day" becomes
 * "valentines".
 */
export function normalizeHolidayName(text: string): string {
  let key = text.trim().toLowerCase().replace(/['’]/g, "");
  while (key.startsWith("the")) {
    key = key.slice(3);
  }
  while (key.endsWith(" day")) {
    key = key.slice(0, -4);
  }
  return key.trim();
}

/** The holiday named by `text`, or `null`. */
export function findHoliday(text: string): Holiday | null {
  const key = normalizeHolidayName(text);
  return Object.hasOwn(NAMES, key) ? NAMES[key] : null;
}

function suggest(key: string): string | undefined {
  if (key.length < 3) return undefined;
  const match = Object.keys(NAMES).find((name) => name.startsWith(key));
  return match === undefined ? undefined : NAMES[match].name;
}

/** The holiday named by `text`; throws `HolidayError` ("notFound") otherwise. */
export function lookupHoliday(text: string): Holiday {
  const holiday = findHoliday(text);
  if (holiday === null) {
    throw HolidayError.notFound(text, suggest(normalizeHolidayName(text)));
  }
  return holiday;
}
