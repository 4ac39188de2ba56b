import { Effect, Fiber, Option, TestClock, TestContext } from "effect";
import { describe, expect, it } from "vitest";
import {
  minuteKey,
  msUntilNextMinute,
  sleepUntilNextMinute,
  waitForMinuteBoundary,
} from "./clock-sync";

const runTest = <A>(effect: Effect.Effect<A>) =>
  Effect.runPromise(effect.pipe(Effect.provide(TestContext.TestContext)));

const local = (hour: number, minute: number, second: number, ms = 0) =>
  new Date(2024, 0, 7, hour, minute, second, ms).getTime();

describe("clock-sync", () => {
  it("should compute the time left in the minute", () => {
    expect(msUntilNextMinute(0)).toBe(60_000);
    expect(msUntilNextMinute(59_750)).toBe(250);
    expect(msUntilNextMinute(120_001)).toBe(59_999);
  });

  it("should key times by whole minute", () => {
    expect(minuteKey(60_000)).toBe(1);
    expect(minuteKey(119_999)).toBe(1);
    expect(minuteKey(120_000)).toBe(2);
  });

  it("should return at once when already on second 0", async () => {
    const now = await runTest(
      Effect.gen(function* () {
        yield* TestClock.setTime(local(10, 0, 0));
        return yield* waitForMinuteBoundary(1000);
      }),
    );
    expect(now.getTime()).toBe(local(10, 0, 0));
  });

  it("should wait for the next minute boundary", async () => {
    const result = await runTest(
      Effect.gen(function* () {
        yield* TestClock.setTime(local(9, 59, 58, 400));
        const fiber = yield* Effect.fork(waitForMinuteBoundary(1000));

        yield* TestClock.adjust("1 second");
        const early = yield* Fiber.poll(fiber);

        yield* TestClock.adjust("1 second");
        const now = yield* Fiber.join(fiber);
        return { early, now };
      }),
    );

    expect(Option.isNone(result.early)).toBe(true);
    expect(result.now.getHours()).toBe(10);
    expect(result.now.getMinutes()).toBe(0);
    expect(result.now.getSeconds()).toBe(0);
  });

  it("should sleep until the lead time before the next minute", async () => {
    const result = await runTest(
      Effect.gen(function* () {
        yield* TestClock.setTime(local(10, 0, 30));
        const fiber = yield* Effect.fork(sleepUntilNextMinute(1000));

        yield* TestClock.adjust("28 seconds");
        const beforeLead = yield* Fiber.poll(fiber);

        yield* TestClock.adjust("1 second");
        yield* Fiber.join(fiber);
        return beforeLead;
      }),
    );

    expect(Option.isNone(result)).toBe(true);
  });

  it("should not sleep when already inside the lead window", async () => {
    await runTest(
      Effect.gen(function* () {
        yield* TestClock.setTime(local(10, 0, 59, 500));
        yield* sleepUntilNextMinute(1000);
      }),
    );
  });
});
