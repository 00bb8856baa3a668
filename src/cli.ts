// daysto: print the number of days until holidays or dates.

import { parseArgs } from "node:util";
import { Temporal } from "@js-temporal/polyfill";
import { daysBetween, today } from "./calendar.js";
import { HolidayError } from "./error.js";
import { findHoliday } from "./holidays/index.js";

export const USAGE = `usage: daysto [--today YYYY-MM-DD] [--tz ZONE] <holiday-or-date>...

Prints the days until the next occurrence of each holiday, or until each
ISO 8601 date. Holiday names are matched loosely: "the 4th of July",
"Mother's Day" and "thanksgiving" all work.`;

export interface Output {
  write(chunk: string): unknown;
}

export interface CliOptions {
  stdout?: Output;
  stderr?: Output;
}

/** A count of days until `arg`, or null when it is neither a holiday nor a date. */
export function daysUntil(
  arg: string,
  from: Temporal.PlainDate,
): { label: string; days: number } | null {
  const holiday = findHoliday(arg);
  if (holiday !== null) {
    return { label: holiday.name, days: daysBetween(from, holiday.after(from)) };
  }
  const date = parseDate(arg);
  if (date !== null) {
    return { label: arg, days: daysBetween(from, date) };
  }
  return null;
}

/** An ISO 8601 date; annotations naming another calendar are rejected. */
function parseDate(text: string): Temporal.PlainDate | null {
  try {
    const date = Temporal.PlainDate.from(text);
    return date.calendarId === "iso8601" ? date : null;
  } catch (err) {
    if (err instanceof RangeError) return null;
    throw err;
  }
}

function resolveToday(
  pinned: string | undefined,
  timeZone: string | undefined,
): Temporal.PlainDate {
  if (pinned !== undefined) {
    const date = parseDate(pinned);
    if (date === null) {
      throw HolidayError.invalid(`--today is not a date: '${pinned}'`);
    }
    return date;
  }
  return today(timeZone);
}

/** Run the CLI and return its exit code. */
export function main(argv: string[], options: CliOptions = {}): number {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;

  let parsed: ReturnType<typeof parse>;
  let from: Temporal.PlainDate;
  try {
    parsed = parse(argv);
    if (parsed.values.help) {
      stdout.write(`${USAGE}\n`);
      return 0;
    }
    from = resolveToday(parsed.values.today, parsed.values.tz);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    stderr.write(`error: ${message}\n${USAGE}\n`);
    return 2;
  }

  if (parsed.positionals.length === 0) {
    stderr.write(`${USAGE}\n`);
    return 2;
  }

  let failed = false;
  for (const arg of parsed.positionals) {
    const result = daysUntil(arg, from);
    if (result === null) {
      stderr.write(`Unknown holiday: '${arg}'\n`);
      failed = true;
      continue;
    }
    stdout.write(`Days until ${result.label}: ${result.days}\n`);
  }
  return failed ? 1 : 0;
}

function parse(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      today: { type: "string" },
      tz: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });
}
