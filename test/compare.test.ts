import { describe, expect, it } from "vitest";
import {
  Holiday,
  Temporal,
  comparePatterns,
  dayOfMonth,
  globalHolidays,
  matches,
  nthWeekdayFromDate,
  nthWeekdayOfMonth,
  samePattern,
  usHolidays,
} from "../src/index.js";

const { CHRISTMAS, NEW_YEARS_DAY, NEW_YEARS_EVE } = globalHolidays;
const { HALLOWEEN, THANKSGIVING } = usHolidays;

function date(s: string): Temporal.PlainDate {
  return Temporal.PlainDate.from(s);
}

describe("matches", () => {
  it("fixed dates match the same day every year", () => {
    expect(HALLOWEEN.matches(date("2020-10-31"))).toBe(true);
    expect(HALLOWEEN.matches(date("2021-10-31"))).toBe(true);
    expect(HALLOWEEN.matches(date("2020-10-30"))).toBe(false);
  });

  it("nth weekdays match by rank within the month", () => {
    expect(THANKSGIVING.matches(date("2020-11-26"))).toBe(true);
    expect(THANKSGIVING.matches(date("2021-11-25"))).toBe(true);
    expect(THANKSGIVING.matches(date("2020-11-19"))).toBe(false);
    expect(THANKSGIVING.matches(date("2020-11-27"))).toBe(false);
  });

  it("a date can be both the fourth and the last of its weekday", () => {
    const last = Holiday.nth("Last Tuesday in July", "last", "tuesday", 7);
    const fourth = Holiday.nth("Fourth Tuesday in July", "fourth", "tuesday", 7);
    const d = date("2020-07-28");

    expect(last.matches(d)).toBe(true);
    expect(fourth.matches(d)).toBe(true);
    expect(last.equals(fourth)).toBe(false);
  });

  it("last requires the final occurrence", () => {
    const lastTuesday = nthWeekdayOfMonth("last", "tuesday", 7);
    expect(matches(lastTuesday, date("2020-07-21"))).toBe(false);
  });

  it("fifth only matches when the month has five", () => {
    const fifthWednesday = nthWeekdayOfMonth("fifth", "wednesday", 12);
    expect(matches(fifthWednesday, date("2020-12-30"))).toBe(true);
    expect(matches(fifthWednesday, date("2020-12-23"))).toBe(false);
  });
});

describe("nthWeekdayFromDate", () => {
  it("derives rank, weekday and month", () => {
    expect(nthWeekdayFromDate(date("2020-06-08"))).toEqual({
      type: "nth",
      nth: "second",
      weekday: "monday",
      month: 6,
    });
  });

  it("derives a numeric rank for the last occurrence", () => {
    expect(nthWeekdayFromDate(date("2021-05-31")).nth).toBe("fifth");
  });
});

describe("samePattern", () => {
  it("compares structurally", () => {
    expect(samePattern(THANKSGIVING.pattern, nthWeekdayOfMonth(4, "thursday", 11))).toBe(true);
    expect(samePattern(dayOfMonth(10, 31), HALLOWEEN.pattern)).toBe(true);
    expect(samePattern(dayOfMonth(11, 26), THANKSGIVING.pattern)).toBe(false);
  });
});

describe("ordering", () => {
  it("sorts holidays by month", () => {
    const sorted = [NEW_YEARS_EVE, THANKSGIVING, NEW_YEARS_DAY, HALLOWEEN, CHRISTMAS]
      .sort(Holiday.compare)
      .map((h) => h.name);

    expect(sorted).toEqual([
      "New Year's Day",
      "Halloween",
      "Thanksgiving",
      "Christmas",
      "New Year's Eve",
    ]);
  });

  it("puts fixed dates before nth weekdays in the same month", () => {
    const lateNovember = dayOfMonth(11, 30);
    const firstThursday = nthWeekdayOfMonth("first", "thursday", 11);

    expect(comparePatterns(lateNovember, firstThursday)).toBe(-1);
    expect(comparePatterns(firstThursday, lateNovember)).toBe(1);
  });

  it("orders nth weekdays by rank, then from Sunday", () => {
    const firstSunday = nthWeekdayOfMonth("first", "sunday", 11);
    const firstMonday = nthWeekdayOfMonth("first", "monday", 11);
    const lastSunday = nthWeekdayOfMonth("last", "sunday", 11);

    expect(comparePatterns(firstSunday, firstMonday)).toBe(-1);
    expect(comparePatterns(lastSunday, firstMonday)).toBe(1);
    expect(comparePatterns(firstMonday, firstMonday)).toBe(0);
  });

  it("breaks ties between equal patterns by name", () => {
    const a = Holiday.fixed("Alpha", 5, 1);
    const b = Holiday.fixed("Beta", 5, 1);

    expect(Holiday.compare(a, b)).toBe(-1);
    expect(Holiday.compare(b, a)).toBe(1);
    expect(Holiday.compare(a, Holiday.fixed("Alpha", 5, 1))).toBe(0);
  });
});
