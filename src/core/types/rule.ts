/**
 * Rule model for scheduled playouts
 */

/** Day of week as returned by `Date#getDay()`: 0 = Sunday … 6 = Saturday. */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export const WEEKDAY_SYMBOLS = ["su", "mo", "tu", "we", "th", "fr", "sa"] as const;

export type WeekdaySymbol = (typeof WEEKDAY_SYMBOLS)[number];

/**
 * Years a fixed-date rule can name. Operators type two digits, read as 20yy.
 */
export const MIN_RULE_YEAR = 2021;
export const MAX_RULE_YEAR = 2099;

/**
 * A local calendar date. `month` is 1-based and `year` has four digits.
 */
export interface CalendarDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;
}

/**
 * The days a rule is active on: one fixed date, or an inclusive weekday range.
 */
export type RuleDays =
  | {
      readonly kind: "date";
      readonly date: CalendarDate;
    }
  | {
      readonly kind: "weekdays";
      readonly start: Weekday;
      readonly end: Weekday;
    };

/**
 * What a rule plays. `strike` expands to the hour-count strike sound at playout time.
 */
export type SoundRef =
  | {
      readonly kind: "strike";
    }
  | {
      readonly kind: "file";
      readonly name: string;
    };

export interface Rule {
  readonly days: RuleDays;
  readonly startHour: number;
  readonly endHour: number;
  readonly minute: number;
  readonly sound: SoundRef;
}

export const STRIKE: SoundRef = Object.freeze({ kind: "strike" });

export function soundFile(name: string): SoundRef {
  return Object.freeze({ kind: "file", name });
}

export function everyDay(): RuleDays {
  return weekdayRange(0, 6);
}

export function weekdayRange(start: Weekday, end: Weekday = start): RuleDays {
  return Object.freeze({ kind: "weekdays", start, end });
}

export function fixedDate(date: CalendarDate): RuleDays {
  return Object.freeze({ kind: "date", date: Object.freeze({ ...date }) });
}

/**
 * Build a frozen rule. Rules are never edited in place; the store replaces them whole.
 */
export function makeRule(fields: {
  readonly days: RuleDays;
  readonly startHour: number;
  readonly endHour?: number;
  readonly minute: number;
  readonly sound: SoundRef;
}): Rule {
  return Object.freeze({
    days: fields.days,
    startHour: fields.startHour,
    endHour: fields.endHour ?? fields.startHour,
    minute: fields.minute,
    sound: fields.sound,
  });
}

/** Format a date the way operators enter it: `mm/dd/yy`. */
export function formatCalendarDate(date: CalendarDate): string {
  const mm = String(date.month).padStart(2, "0");
  const dd = String(date.day).padStart(2, "0");
  const yy = String(date.year % 100).padStart(2, "0");
  return `${mm}/${dd}/${yy}`;
}

export function describeSound(sound: SoundRef): string {
  return sound.kind === "strike" ? "Strike" : sound.name;
}
