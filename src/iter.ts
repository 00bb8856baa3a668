// Bidirectional iteration over the occurrences of a pattern.

import { Temporal } from "@js-temporal/polyfill";
import { MAX_DATE, MIN_DATE, pred, succ } from "./calendar.js";
import { HolidayError } from "./error.js";
import { after, before } from "./eval.js";
import type { RecurrencePattern } from "./pattern.js";

type PD = Temporal.PlainDate;

/** Anything that can find its occurrences around a date. */
export interface Resolvable {
  /** The earliest occurrence on or after `date`. */
  after(date: PD): PD;
  /** The latest occurrence strictly before `date`. */
  before(date: PD): PD;
}

/** Adapts a bare pattern to `Resolvable`. */
export function resolver(pattern: RecurrencePattern): Resolvable {
  return {
    after: (date) => after(pattern, date),
    before: (date) => before(pattern, date),
  };
}

/** Runs one step, treating a step past the representable range as the end. */
function step(fn: () => PD): PD | null {
  try {
    return fn();
  } catch (err) {
    if (err instanceof HolidayError && err.kind === "range") return null;
    throw err;
  }
}

/**
 * A window of occurrences walked with a shared cursor: `next()` moves
 * forward, `nextBack()` moves backward, and the two can be interleaved.
 *
 * By default the window spans every representable occurrence and the cursor
 * sits on the first one, so forward iteration starts at the second. Use
 * `at`, `startingAt` and `endingAt` to position it.
 */
export class OccurrenceIterator implements IterableIterator<PD> {
  private readonly source: Resolvable;
  private first: PD;
  private last: PD;
  private current: PD;

  constructor(source: Resolvable) {
    this.source = source;
    this.first = source.after(MIN_DATE);
    this.last = source.before(MAX_DATE);
    this.current = this.first;
  }

  /** Move the cursor so the next forward step yields the occurrence on or after `date`. */
  at(date: PD): this {
    this.current = pred(date);
    this.widen(date);
    return this;
  }

  /** Begin the window at the occurrence on or after `date`. */
  startingAt(date: PD): this {
    this.first = this.source.after(date);
    this.widen(date);
    return this;
  }

  /** End the window at the occurrence strictly before `date`. */
  endingAt(date: PD): this {
    this.last = this.source.before(date);
    this.widen(date);
    return this;
  }

  get cursor(): PD {
    return this.current;
  }

  get start(): PD {
    return this.first;
  }

  get end(): PD {
    return this.last;
  }

  next(): IteratorResult<PD, undefined> {
    if (Temporal.PlainDate.compare(this.current, this.last) >= 0) {
      return { done: true, value: undefined };
    }
    const current = this.current;
    const next = step(() => this.source.after(succ(current)));
    if (next === null || Temporal.PlainDate.compare(next, this.last) > 0) {
      return { done: true, value: undefined };
    }
    this.current = next;
    return { done: false, value: next };
  }

  nextBack(): IteratorResult<PD, undefined> {
    if (Temporal.PlainDate.compare(this.current, this.first) < 0) {
      return { done: true, value: undefined };
    }
    const current = this.current;
    const prev = step(() => this.source.before(current));
    if (prev === null) {
      return { done: true, value: undefined };
    }
    this.current = prev;
    return { done: false, value: prev };
  }

  [Symbol.iterator](): this {
    return this;
  }

  /** Walk backward from the cursor. */
  *reversed(): Generator<PD, void, unknown> {
    for (;;) {
      const result = this.nextBack();
      if (result.done) return;
      yield result.value;
    }
  }

  /** Up to `n` forward steps. */
  nextN(n: number): PD[] {
    const results: PD[] = [];
    for (let i = 0; i < n; i++) {
      const result = this.next();
      if (result.done) break;
      results.push(result.value);
    }
    return results;
  }

  private widen(date: PD): void {
    if (Temporal.PlainDate.compare(date, this.first) < 0) {
      this.first = date;
    }
    if (Temporal.PlainDate.compare(date, this.last) > 0) {
      this.last = date;
    }
  }
}

/** An iterator over every representable occurrence of `pattern`. */
export function iterate(pattern: RecurrencePattern): OccurrenceIterator {
  return new OccurrenceIterator(resolver(pattern));
}
