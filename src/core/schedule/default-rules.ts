import type { ScheduleConfig } from "../types/config";
import { STRIKE, everyDay, makeRule, soundFile, type Rule } from "../types/rule";

/**
 * Tower clock schedule installed on first start: the hour chime at :59,
 * the strike on the hour, and the quarter, half and three-quarter chimes.
 */
export function defaultRules(span: ScheduleConfig = { startHour: 0, endHour: 23 }): readonly Rule[] {
  const hours = { startHour: span.startHour, endHour: span.endHour };
  return [
    makeRule({ days: everyDay(), ...hours, minute: 59, sound: soundFile("Hour") }),
    makeRule({ days: everyDay(), ...hours, minute: 0, sound: STRIKE }),
    makeRule({ days: everyDay(), ...hours, minute: 15, sound: soundFile("Quarter") }),
    makeRule({ days: everyDay(), ...hours, minute: 30, sound: soundFile("Half") }),
    makeRule({ days: everyDay(), ...hours, minute: 45, sound: soundFile("ThreeQuarter") }),
  ];
}
