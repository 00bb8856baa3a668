export type HolidayErrorKind = "invalid" | "notFound" | "unreachable" | "range";

/** All errors produced by recurring-holidays. */
export class HolidayError extends Error {
  readonly kind: HolidayErrorKind;
  readonly input?: string;
  readonly suggestion?: string;

  constructor(
    kind: HolidayErrorKind,
    message: string,
    input?: string,
    suggestion?: string,
  ) {
    super(message);
    this.name = "HolidayError";
    this.kind = kind;
    this.input = input;
    this.suggestion = suggestion;
  }

  static invalid(message: string): HolidayError {
    return new HolidayError("invalid", message);
  }

  static notFound(input: string, suggestion?: string): HolidayError {
    return new HolidayError(
      "notFound",
      `unknown holiday: '${input}'`,
      input,
      suggestion,
    );
  }

  static unreachable(message: string): HolidayError {
    return new HolidayError("unreachable", message);
  }

  static range(message: string): HolidayError {
    return new HolidayError("range", message);
  }

  displayRich(): string {
    if (this.kind === "notFound" && this.suggestion) {
      return `error: ${this.message} try: "${this.suggestion}"`;
    }
    return `error: ${this.message}`;
  }
}
