import { Either } from "effect";
import { ValidationError } from "../types/errors";
import {
  STRIKE,
  fixedDate,
  makeRule,
  soundFile,
  weekdayRange,
  type Rule,
  type RuleDays,
  type Weekday,
  MAX_RULE_YEAR,
  MIN_RULE_YEAR,
} from "../types/rule";

/**
 * Parser for the line-oriented rule editor
 *
 * A line is `N`, `N DAY HOURS MINUTE SOUND`, `?` or empty, with fields
 * separated by single spaces. SOUND is the rest of the line and may contain
 * spaces.
 */

export type EditorCommand =
  | { readonly _tag: "ShowInstructions" }
  | { readonly _tag: "ShowSchedule" }
  | { readonly _tag: "Delete"; readonly position: number }
  | { readonly _tag: "Upsert"; readonly position: number; readonly rule: Rule };

const WEEKDAY_INDEX: ReadonlyMap<string, Weekday> = new Map<string, Weekday>([
  ["su", 0],
  ["mo", 1],
  ["tu", 2],
  ["we", 3],
  ["th", 4],
  ["fr", 5],
  ["sa", 6],
]);

const DIGITS = /^\d+$/;
const TWO_DIGITS = /^\d{2}$/;

function invalid(
  field: string,
  message: string,
  value?: unknown,
  suggestion?: string,
): Either.Either<never, ValidationError> {
  return Either.left(
    new ValidationError({
      field,
      message,
      ...(value !== undefined ? { value } : {}),
      ...(suggestion !== undefined ? { suggestion } : {}),
    }),
  );
}

function daysInMonth(fullYear: number, month: number): number {
  return new Date(fullYear, month, 0).getDate();
}

/**
 * `mm/dd/yy` into a fixed-date day selector.
 */
export function parseDate(text: string): Either.Either<RuleDays, ValidationError> {
  const parts = text.split("/");
  if (parts.length !== 3 || !parts.every((part) => TWO_DIGITS.test(part))) {
    return invalid("date", "Date must be mm/dd/yy", text);
  }
  const [month, day, year] = parts.map((part) => parseInt(part, 10));
  if (month === undefined || day === undefined || year === undefined) {
    return invalid("date", "Date must be mm/dd/yy", text);
  }
  if (month < 1 || month > 12) {
    return invalid("date", `${month} is not a valid month`, text);
  }
  const fullYear = 2000 + year;
  if (fullYear < MIN_RULE_YEAR || fullYear > MAX_RULE_YEAR) {
    return invalid(
      "date",
      `${year} is not a valid year`,
      text,
      `Use a year from ${MIN_RULE_YEAR % 100} on`,
    );
  }
  if (day < 1 || day > daysInMonth(fullYear, month)) {
    return invalid("date", `${day} is not a valid day`, text);
  }
  return Either.right(fixedDate({ year: fullYear, month, day }));
}

/**
 * `su`, or an inclusive range such as `mo-fr`, into a weekday day selector.
 */
export function parseWeekdays(text: string): Either.Either<RuleDays, ValidationError> {
  const parts = text.toLowerCase().split("-");
  if (parts.length > 2) {
    return invalid("days", "Weekday list. Use multiple events instead", text);
  }
  const [first, second = first] = parts;
  const start = first === undefined ? undefined : WEEKDAY_INDEX.get(first);
  const end = second === undefined ? undefined : WEEKDAY_INDEX.get(second);
  if (start === undefined || end === undefined) {
    return invalid("days", "Day(s) must be su, mo, tu, we, th, fr or sa", text);
  }
  if (end < start) {
    return invalid(
      "days",
      `Weekday range ${text} wraps past Saturday`,
      text,
      `Enter two events instead, e.g. ${first}-sa and su-${second}`,
    );
  }
  return Either.right(weekdayRange(start, end));
}

/**
 * `9` or `9-17` into an inclusive hour range.
 */
export function parseHours(
  text: string,
): Either.Either<{ readonly startHour: number; readonly endHour: number }, ValidationError> {
  const parts = text.split("-");
  if (parts.length > 2) {
    return invalid("hours", "Hour range must be start-end", text);
  }
  const [startText = "", endText = startText] = parts;
  if (!DIGITS.test(startText)) {
    return invalid("hours", `Start hour ${startText} must be numeric`, text);
  }
  const startHour = parseInt(startText, 10);
  if (startHour > 23) {
    return invalid("hours", `Start hour ${startHour} must be between 0 and 23`, text);
  }
  if (!DIGITS.test(endText)) {
    return invalid("hours", `End hour ${endText} must be numeric`, text);
  }
  const endHour = parseInt(endText, 10);
  if (endHour > 23) {
    return invalid("hours", `End hour ${endHour} must be between 0 and 23`, text);
  }
  if (endHour < startHour) {
    return invalid(
      "hours",
      `Hour range ${text} wraps past midnight`,
      text,
      `Enter two events instead, e.g. ${startHour}-23 and 0-${endHour}`,
    );
  }
  return Either.right({ startHour, endHour });
}

export function parseMinute(text: string): Either.Either<number, ValidationError> {
  if (!DIGITS.test(text)) {
    return invalid("minute", `Minute ${text} must be numeric`, text);
  }
  const minute = parseInt(text, 10);
  if (minute > 59) {
    return invalid("minute", `Minute ${minute} must be between 0 and 59`, text);
  }
  return Either.right(minute);
}

/**
 * Turn one editor line into a command. Nothing here touches the store or the
 * sound directory; sound availability is checked by the caller.
 */
export function parseCommand(line: string): Either.Either<EditorCommand, ValidationError> {
  const trimmed = line.trim();
  if (trimmed === "?") {
    return Either.right<EditorCommand>({ _tag: "ShowInstructions" });
  }
  if (trimmed === "") {
    return Either.right<EditorCommand>({ _tag: "ShowSchedule" });
  }

  const items = trimmed.split(" ");
  const [positionText = ""] = items;
  if (!DIGITS.test(positionText) || parseInt(positionText, 10) < 1) {
    return invalid("line", "Input must begin with a line number", positionText);
  }
  const position = parseInt(positionText, 10);

  if (items.length === 1) {
    return Either.right<EditorCommand>({ _tag: "Delete", position });
  }

  if (items.length < 5) {
    return invalid(
      "line",
      "Enter five items, separated by single space",
      trimmed,
      "Line# Day Hour(s) Minute and Tune",
    );
  }

  const [, dayText = "", hourText = "", minuteText = ""] = items;
  const soundText = items.slice(4).join(" ");

  return Either.gen(function* () {
    const days = dayText.includes("/")
      ? yield* parseDate(dayText)
      : yield* parseWeekdays(dayText);
    const hours = yield* parseHours(hourText);
    const minute = yield* parseMinute(minuteText);
    const sound = soundText.toLowerCase() === "strike" ? STRIKE : soundFile(soundText);
    const rule = makeRule({ days, ...hours, minute, sound });
    return { _tag: "Upsert", position, rule } as const;
  });
}
