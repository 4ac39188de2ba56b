import { Either } from "effect";
import { z } from "zod";
import {
  fixedDate,
  makeRule,
  MAX_RULE_YEAR,
  MIN_RULE_YEAR,
  soundFile,
  STRIKE,
  weekdayRange,
  type Rule,
  type RuleDays,
  type SoundRef,
} from "@/core/types/rule";

/**
 * On-disk format of rules.json
 */

export const RULES_FILE_VERSION = 1;

const WeekdaySchema = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
  z.literal(6),
]);

const HourSchema = z.number().int().min(0).max(23);

const DaysSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("date"),
    date: z.object({
      year: z.number().int().min(MIN_RULE_YEAR).max(MAX_RULE_YEAR),
      month: z.number().int().min(1).max(12),
      day: z.number().int().min(1).max(31),
    }),
  }),
  z.object({
    kind: z.literal("weekdays"),
    start: WeekdaySchema,
    end: WeekdaySchema,
  }),
]);

const SoundSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("strike") }),
  z.object({ kind: z.literal("file"), name: z.string().min(1) }),
]);

const RuleSchema = z
  .object({
    days: DaysSchema,
    startHour: HourSchema,
    endHour: HourSchema,
    minute: z.number().int().min(0).max(59),
    sound: SoundSchema,
  })
  .refine((rule) => rule.endHour >= rule.startHour, {
    message: "endHour must not be before startHour",
    path: ["endHour"],
  })
  .refine((rule) => rule.days.kind === "date" || rule.days.end >= rule.days.start, {
    message: "weekday range must not wrap",
    path: ["days"],
  });

const RulesFileSchema = z.object({
  version: z.literal(RULES_FILE_VERSION),
  rules: z.array(RuleSchema),
});

type StoredRule = z.infer<typeof RuleSchema>;

function toDays(days: StoredRule["days"]): RuleDays {
  return days.kind === "date" ? fixedDate(days.date) : weekdayRange(days.start, days.end);
}

function toSound(sound: StoredRule["sound"]): SoundRef {
  return sound.kind === "strike" ? STRIKE : soundFile(sound.name);
}

export function encodeRules(rules: readonly Rule[]): string {
  return JSON.stringify({ version: RULES_FILE_VERSION, rules }, null, 2) + "\n";
}

/**
 * Validate parsed JSON and rebuild frozen rules. Left carries a readable
 * summary of the first issues.
 */
export function decodeRules(json: unknown): Either.Either<readonly Rule[], string> {
  const parsed = RulesFileSchema.safeParse(json);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return Either.left(summary);
  }
  return Either.right(
    parsed.data.rules.map((rule) =>
      makeRule({
        days: toDays(rule.days),
        startHour: rule.startHour,
        endHour: rule.endHour,
        minute: rule.minute,
        sound: toSound(rule.sound),
      }),
    ),
  );
}
