import { Cause, Effect, Exit } from "effect";
import { describe, expect, it } from "vitest";
import { RuleNotFoundError } from "@/core/types/errors";
import { everyDay, makeRule, soundFile, type Rule } from "@/core/types/rule";
import { makeInMemoryRuleStore } from "./inMemory";

const rule = (minute: number, name = "Bell") =>
  makeRule({ days: everyDay(), startHour: 0, endHour: 23, minute, sound: soundFile(name) });

describe("InMemoryRuleStore", () => {
  it("should append at len + 1 whatever position past the end is given", async () => {
    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const store = yield* makeInMemoryRuleStore();
        const first = yield* store.upsertAt(1, rule(0));
        const second = yield* store.upsertAt(10, rule(15));
        const len = yield* store.len();
        return { first, second, len };
      }),
    );

    expect(result.first).toEqual({ position: 1, action: "inserted" });
    expect(result.second).toEqual({ position: 2, action: "inserted" });
    expect(result.len).toBe(2);
  });

  it("should replace the rule at an existing position", async () => {
    const replacement = rule(45, "ThreeQuarter");
    const rules = await Effect.runPromise(
      Effect.gen(function* () {
        const store = yield* makeInMemoryRuleStore([rule(0), rule(15), rule(30)]);
        const result = yield* store.upsertAt(2, replacement);
        expect(result).toEqual({ position: 2, action: "replaced" });
        return yield* store.snapshot();
      }),
    );

    expect(rules).toHaveLength(3);
    expect(rules[1]).toBe(replacement);
  });

  it("should shift later rules down after a delete", async () => {
    const a = rule(0);
    const b = rule(15);
    const c = rule(30);
    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const store = yield* makeInMemoryRuleStore([a, b, c]);
        const removed = yield* store.deleteAt(2);
        const rules = yield* store.snapshot();
        return { removed, rules };
      }),
    );

    expect(result.removed).toBe(b);
    expect(result.rules).toEqual([a, c]);
  });

  it("should fail with RuleNotFoundError for a missing line", async () => {
    const error = await Effect.runPromise(
      Effect.gen(function* () {
        const store = yield* makeInMemoryRuleStore([rule(0), rule(15)]);
        return yield* Effect.flip(store.deleteAt(5));
      }),
    );

    expect(error).toBeInstanceOf(RuleNotFoundError);
    expect(error.position).toBe(5);
    expect(error.length).toBe(2);
  });

  it("should die on a position below 1", async () => {
    const exit = await Effect.runPromiseExit(
      Effect.gen(function* () {
        const store = yield* makeInMemoryRuleStore();
        return yield* store.upsertAt(0, rule(0));
      }),
    );

    expect(Exit.isFailure(exit) && Cause.isDie(exit.cause)).toBe(true);
  });

  it("should hand out snapshots that later mutations do not change", async () => {
    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const store = yield* makeInMemoryRuleStore([rule(0)]);
        const before = yield* store.snapshot();
        yield* store.upsertAt(2, rule(15));
        yield* store.deleteAt(1);
        const after = yield* store.snapshot();
        return { before, after };
      }),
    );

    expect(result.before).toHaveLength(1);
    expect(result.before[0]?.minute).toBe(0);
    expect(Object.isFrozen(result.before)).toBe(true);
    expect(result.after.map((r) => r.minute)).toEqual([15]);
  });

  describe("deleteRule", () => {
    it("should find a rule that moved since the snapshot", async () => {
      const x = rule(0, "X");
      const a = rule(15, "A");
      const b = rule(30, "B");
      const result = await Effect.runPromise(
        Effect.gen(function* () {
          const store = yield* makeInMemoryRuleStore([x, a, b]);
          // The operator deletes line 1 while a is being played from position 2
          yield* store.deleteAt(1);
          const position = yield* store.deleteRule(a, 2);
          const rules = yield* store.snapshot();
          return { position, rules };
        }),
      );

      expect(result.position).toBe(1);
      expect(result.rules).toEqual([b]);
    });

    it("should remove the same instance, not an equal rule", async () => {
      const original = rule(0);
      const lookalike = rule(0);
      const result = await Effect.runPromise(
        Effect.gen(function* () {
          const store = yield* makeInMemoryRuleStore([lookalike, original]);
          const position = yield* store.deleteRule(original, 1);
          const rules = yield* store.snapshot();
          return { position, rules };
        }),
      );

      expect(result.position).toBe(2);
      expect(result.rules).toHaveLength(1);
      expect(result.rules[0]).toBe(lookalike);
    });

    it("should fail when the rule was already removed", async () => {
      const gone = rule(0);
      const error = await Effect.runPromise(
        Effect.gen(function* () {
          const store = yield* makeInMemoryRuleStore([rule(15)]);
          return yield* Effect.flip(store.deleteRule(gone, 1));
        }),
      );

      expect(error._tag).toBe("RuleNotFoundError");
    });
  });

  it("should notify the listener after each successful change only", async () => {
    const seen: number[] = [];
    await Effect.runPromise(
      Effect.gen(function* () {
        const store = yield* makeInMemoryRuleStore([], (rules) =>
          Effect.sync(() => {
            seen.push(rules.length);
          }),
        );
        yield* store.upsertAt(1, rule(0));
        yield* store.upsertAt(2, rule(15));
        yield* Effect.either(store.deleteAt(9));
        yield* store.deleteAt(1);
        yield* store.replaceAll([rule(0), rule(15), rule(30)]);
      }),
    );

    expect(seen).toEqual([1, 2, 1, 3]);
  });

  it("should keep interleaved edits and snapshots consistent", async () => {
    const result = await Effect.runPromise(
      Effect.gen(function* () {
        const initial = Array.from({ length: 20 }, (_, i) => rule(i));
        const versions: (readonly Rule[])[] = [];
        const store = yield* makeInMemoryRuleStore(initial, (rules) =>
          Effect.sync(() => {
            versions.push(rules);
          }),
        );
        const first = yield* store.snapshot();

        const appends = Array.from({ length: 20 }, (_, i) =>
          Effect.asVoid(store.upsertAt(1000, rule(i, "Added"))),
        );
        const replaces = Array.from({ length: 20 }, (_, i) =>
          Effect.asVoid(store.upsertAt((i % 5) + 1, rule(i, "Replaced"))),
        );
        // Never more deletes than initial rules, so each one finds a line
        const deletes = Array.from({ length: 15 }, () => Effect.asVoid(store.deleteAt(1)));
        const reads = Array.from({ length: 40 }, () => store.snapshot());

        const [, snapshots] = yield* Effect.all(
          [
            Effect.all([...appends, ...replaces, ...deletes], { concurrency: "unbounded" }),
            Effect.all(reads, { concurrency: "unbounded" }),
          ],
          { concurrency: "unbounded" },
        );
        const final = yield* store.snapshot();
        return { first, versions, snapshots, final };
      }),
    );

    // 20 initial rules, 20 appends, 15 deletes
    expect(result.final).toHaveLength(25);
    expect(result.versions).toHaveLength(55);
    expect(result.final).toBe(result.versions.at(-1));
    const known = new Set<readonly Rule[]>([result.first, ...result.versions]);
    for (const snapshot of result.snapshots) {
      expect(known.has(snapshot)).toBe(true);
    }
  });
});
