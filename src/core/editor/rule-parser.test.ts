import { Either } from "effect";
import { describe, expect, it } from "vitest";
import type { ValidationError } from "../types/errors";
import {
  STRIKE,
  everyDay,
  fixedDate,
  makeRule,
  soundFile,
  weekdayRange,
} from "../types/rule";
import { parseCommand, parseDate, parseHours, parseWeekdays, type EditorCommand } from "./rule-parser";

function expectRight<A>(result: Either.Either<A, ValidationError>): A {
  if (Either.isLeft(result)) {
    throw new Error(`Expected success, got: ${result.left.message}`);
  }
  return result.right;
}

function expectLeft<A>(result: Either.Either<A, ValidationError>): ValidationError {
  if (Either.isRight(result)) {
    throw new Error("Expected a validation error");
  }
  return result.left;
}

describe("parseCommand", () => {
  it("should read ? and an empty line as display commands", () => {
    expect(expectRight(parseCommand("?"))).toEqual({ _tag: "ShowInstructions" });
    expect(expectRight(parseCommand(""))).toEqual({ _tag: "ShowSchedule" });
    expect(expectRight(parseCommand("   "))).toEqual({ _tag: "ShowSchedule" });
  });

  it("should read a bare line number as a delete", () => {
    expect(expectRight(parseCommand("3"))).toEqual({ _tag: "Delete", position: 3 });
  });

  it("should parse a full rule line", () => {
    const expected: EditorCommand = {
      _tag: "Upsert",
      position: 1,
      rule: makeRule({ days: everyDay(), startHour: 0, endHour: 23, minute: 59, sound: soundFile("Hour") }),
    };
    expect(expectRight(parseCommand("1 su-sa 0-23 59 Hour"))).toEqual(expected);
  });

  it("should parse a fixed date and the Strike keyword in any case", () => {
    const command = expectRight(parseCommand("2 12/25/21 0-23 0 strike"));
    expect(command).toEqual({
      _tag: "Upsert",
      position: 2,
      rule: makeRule({
        days: fixedDate({ year: 2021, month: 12, day: 25 }),
        startHour: 0,
        endHour: 23,
        minute: 0,
        sound: STRIKE,
      }),
    });
  });

  it("should keep spaces inside the sound name", () => {
    const command = expectRight(parseCommand("4 mo-fr 9-17 30 Westminster Quarters"));
    expect(command._tag === "Upsert" && command.rule.sound).toEqual(soundFile("Westminster Quarters"));
  });

  it("should accept upper-case weekday symbols", () => {
    const command = expectRight(parseCommand("1 SU 9 0 Bell"));
    expect(command._tag === "Upsert" && command.rule.days).toEqual(weekdayRange(0));
  });

  it("should reject lines that do not start with a line number", () => {
    const error = expectLeft(parseCommand("su 9 0 Bell"));
    expect(error.field).toBe("line");
    expect(error.message).toBe("Input must begin with a line number");
    expect(expectLeft(parseCommand("0")).message).toBe("Input must begin with a line number");
  });

  it("should reject lines with too few items", () => {
    const error = expectLeft(parseCommand("1 su 9 0"));
    expect(error.message).toBe("Enter five items, separated by single space");
    expect(error.suggestion).toBe("Line# Day Hour(s) Minute and Tune");
  });

  it("should reject a double space between items", () => {
    expect(expectLeft(parseCommand("1 su  9 0 Bell")).field).toBe("hours");
  });

  it("should reject out-of-range hours and minutes", () => {
    expect(expectLeft(parseCommand("1 su 24 0 Bell")).message).toBe(
      "Start hour 24 must be between 0 and 23",
    );
    expect(expectLeft(parseCommand("1 su 9-24 0 Bell")).message).toBe(
      "End hour 24 must be between 0 and 23",
    );
    expect(expectLeft(parseCommand("1 su 9 60 Bell")).message).toBe(
      "Minute 60 must be between 0 and 59",
    );
    expect(expectLeft(parseCommand("1 su 9 x Bell")).message).toBe("Minute x must be numeric");
  });

  it("should reject unknown weekdays and weekday lists", () => {
    expect(expectLeft(parseCommand("1 xx 9 0 Bell")).message).toBe(
      "Day(s) must be su, mo, tu, we, th, fr or sa",
    );
    expect(expectLeft(parseCommand("1 su-mo-tu 9 0 Bell")).message).toBe(
      "Weekday list. Use multiple events instead",
    );
  });
});

describe("parseWeekdays", () => {
  it("should reject a range that wraps past Saturday", () => {
    const error = expectLeft(parseWeekdays("fr-mo"));
    expect(error.message).toBe("Weekday range fr-mo wraps past Saturday");
    expect(error.suggestion).toBe("Enter two events instead, e.g. fr-sa and su-mo");
  });

  it("should parse a single day as a one-day range", () => {
    expect(expectRight(parseWeekdays("we"))).toEqual(weekdayRange(3, 3));
  });
});

describe("parseHours", () => {
  it("should parse a single hour as a one-hour range", () => {
    expect(expectRight(parseHours("9"))).toEqual({ startHour: 9, endHour: 9 });
  });

  it("should reject a range that wraps past midnight", () => {
    const error = expectLeft(parseHours("22-2"));
    expect(error.message).toBe("Hour range 22-2 wraps past midnight");
    expect(error.suggestion).toBe("Enter two events instead, e.g. 22-23 and 0-2");
  });

  it("should reject a non-numeric end hour", () => {
    expect(expectLeft(parseHours("9-x")).message).toBe("End hour x must be numeric");
  });
});

describe("parseDate", () => {
  it("should accept real calendar days", () => {
    expect(expectRight(parseDate("02/29/24"))).toEqual(fixedDate({ year: 2024, month: 2, day: 29 }));
  });

  it("should reject impossible dates", () => {
    expect(expectLeft(parseDate("13/01/21")).message).toBe("13 is not a valid month");
    expect(expectLeft(parseDate("02/29/23")).message).toBe("29 is not a valid day");
    expect(expectLeft(parseDate("04/31/22")).message).toBe("31 is not a valid day");
    expect(expectLeft(parseDate("01/01/20")).message).toBe("20 is not a valid year");
  });

  it("should require the mm/dd/yy layout", () => {
    expect(expectLeft(parseDate("1/1/21")).message).toBe("Date must be mm/dd/yy");
    expect(expectLeft(parseDate("12/25/2021")).message).toBe("Date must be mm/dd/yy");
    expect(expectLeft(parseDate("1/2/2021")).message).toBe("Date must be mm/dd/yy");
    expect(expectLeft(parseDate("12/5/021")).message).toBe("Date must be mm/dd/yy");
  });
});
