import { describe, expect, it } from "vitest";
import {
  ALL_HOLIDAYS,
  HolidayError,
  findHoliday,
  globalHolidays,
  lookupHoliday,
  normalizeHolidayName,
  usHolidays,
} from "../src/index.js";

describe("catalog", () => {
  it("resolves holidays in a year", () => {
    expect(globalHolidays.CHRISTMAS.inYear(2020).toString()).toBe("2020-12-25");
    expect(usHolidays.THANKSGIVING.inYear(2020).toString()).toBe("2020-11-26");
    expect(globalHolidays.NEW_YEARS_DAY.inYear(2020).toString()).toBe("2020-01-01");
    expect(globalHolidays.NEW_YEARS_EVE.inYear(2020).toString()).toBe("2020-12-31");
    expect(usHolidays.LABOR_DAY.inYear(2021).toString()).toBe("2021-09-06");
    expect(usHolidays.MLK_DAY.inYear(2021).toString()).toBe("2021-01-18");
  });

  it("lists every holiday in calendar order", () => {
    expect(ALL_HOLIDAYS.length).toBe(24);
    expect(ALL_HOLIDAYS[0].name).toBe("New Year's Day");
    expect(ALL_HOLIDAYS[1].name).toBe("Martin Luther King Jr. Day");
    expect(ALL_HOLIDAYS[ALL_HOLIDAYS.length - 1].name).toBe("New Year's Eve");
  });
});

describe("normalizeHolidayName", () => {
  it("drops case, apostrophes, a leading article and a trailing 'day'", () => {
    expect(normalizeHolidayName("Mother's Day")).toBe("mothers");
    expect(normalizeHolidayName("  The Fourth of July ")).toBe("fourth of july");
    expect(normalizeHolidayName("St. Patrick’s Day")).toBe("st. patricks");
    expect(normalizeHolidayName("THANKSGIVING")).toBe("thanksgiving");
  });
});

describe("lookup", () => {
  it("finds every holiday by its own name", () => {
    for (const holiday of ALL_HOLIDAYS) {
      expect(findHoliday(holiday.name)).toBe(holiday);
    }
  });

  it("accepts aliases", () => {
    expect(findHoliday("the 4th of July")).toBe(usHolidays.INDEPENDENCE_DAY);
    expect(findHoliday("july fourth")).toBe(usHolidays.INDEPENDENCE_DAY);
    expect(findHoliday("Superbowl")).toBe(usHolidays.SUPERBOWL_SUNDAY);
    expect(findHoliday("new years day")).toBe(globalHolidays.NEW_YEARS_DAY);
  });

  it("returns null for unknown names", () => {
    expect(findHoliday("Easter")).toBeNull();
    expect(findHoliday("")).toBeNull();
  });

  it("throws notFound with a suggestion", () => {
    expect(() => lookupHoliday("Easter")).toThrow(HolidayError);
    try {
      lookupHoliday("thanks");
    } catch (err) {
      expect(err).toBeInstanceOf(HolidayError);
      if (err instanceof HolidayError) {
        expect(err.kind).toBe("notFound");
        expect(err.suggestion).toBe("Thanksgiving");
        expect(err.displayRich()).toBe(
          `error: unknown holiday: 'thanks' try: "Thanksgiving"`,
        );
      }
    }
  });
});
