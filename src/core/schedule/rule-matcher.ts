import type { CalendarDate, Rule, SoundRef } from "../types/rule";

/**
 * Decides whether a rule fires at a given local time.
 *
 * Pure: every rule is judged on its own, with no precedence between rules.
 * Only the minute is compared, so callers evaluate once per minute at :00.
 */
export function isDue(rule: Rule, now: Date): boolean {
  if (rule.days.kind === "date") {
    if (!isSameCalendarDate(rule.days.date, now)) {
      return false;
    }
  } else {
    const weekday = now.getDay();
    if (weekday < rule.days.start || weekday > rule.days.end) {
      return false;
    }
  }

  const hour = now.getHours();
  if (hour < rule.startHour || hour > rule.endHour) {
    return false;
  }

  return now.getMinutes() === rule.minute;
}

export function isSameCalendarDate(date: CalendarDate, now: Date): boolean {
  return (
    now.getFullYear() === date.year &&
    now.getMonth() + 1 === date.month &&
    now.getDate() === date.day
  );
}

/**
 * Number of strikes for a 24-hour clock hour: 12-hour time, with 12 at noon and midnight.
 */
export function strikeCount(hour: number): number {
  const count = hour % 12;
  return count === 0 ? 12 : count;
}

/**
 * Sound identifier a rule plays at `now`.
 *
 * @example
 * resolveSoundId(STRIKE, new Date(2021, 11, 25, 13, 0)) // "Strike1"
 */
export function resolveSoundId(sound: SoundRef, now: Date, strikePrefix = "Strike"): string {
  if (sound.kind === "strike") {
    return `${strikePrefix}${strikeCount(now.getHours())}`;
  }
  return sound.name;
}

/** The twelve strike sound identifiers, one per hour count. */
export function strikeSoundIds(strikePrefix = "Strike"): readonly string[] {
  return Array.from({ length: 12 }, (_, index) => `${strikePrefix}${index + 1}`);
}
