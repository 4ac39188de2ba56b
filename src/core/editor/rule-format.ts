import {
  WEEKDAY_SYMBOLS,
  describeSound,
  formatCalendarDate,
  type Rule,
  type RuleDays,
} from "../types/rule";

export const RULE_TABLE_HEADER = "Day(s) Hr(s) Min Tune";

function formatDays(days: RuleDays): string {
  if (days.kind === "date") {
    return formatCalendarDate(days.date);
  }
  const start = WEEKDAY_SYMBOLS[days.start];
  const end = WEEKDAY_SYMBOLS[days.end];
  return start === end ? start : `${start}-${end}`;
}

function formatHours(rule: Rule): string {
  return rule.startHour === rule.endHour
    ? String(rule.startHour)
    : `${rule.startHour}-${rule.endHour}`;
}

/**
 * One rule in the same column order operators type it: days, hours, minute, sound.
 */
export function formatRule(rule: Rule): string {
  return `${formatDays(rule.days)} ${formatHours(rule)} ${rule.minute} ${describeSound(rule.sound)}`;
}

/**
 * Numbered rule table. Positions are recomputed on every render, so they
 * change after a delete.
 */
export function formatRuleTable(rules: readonly Rule[]): string[] {
  return [RULE_TABLE_HEADER, ...rules.map((rule, index) => `${index + 1}: ${formatRule(rule)}`)];
}
