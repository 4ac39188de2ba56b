import { Clock, Duration, Effect } from "effect";

const MINUTE_MS = 60_000;

export const DEFAULT_POLL_INTERVAL_MS = 250;

/**
 * Milliseconds left until the next minute boundary; 60000 exactly on a boundary.
 */
export function msUntilNextMinute(epochMillis: number): number {
  return MINUTE_MS - (epochMillis % MINUTE_MS);
}

/** Minutes since the epoch, used to recognise a minute that was already evaluated. */
export function minuteKey(epochMillis: number): number {
  return Math.floor(epochMillis / MINUTE_MS);
}

/**
 * Suspend until the clock's seconds field reads 0, then return the current time.
 *
 * Checks at most every `pollIntervalMs` and never sleeps past the boundary, so a
 * coarse clock cannot make it miss second 0 or spin on it.
 */
export function waitForMinuteBoundary(
  pollIntervalMs: number = DEFAULT_POLL_INTERVAL_MS,
): Effect.Effect<Date, never> {
  const interval = Math.max(1, pollIntervalMs);
  return Effect.gen(function* () {
    for (;;) {
      const millis = yield* Clock.currentTimeMillis;
      const now = new Date(millis);
      if (now.getSeconds() === 0) {
        return now;
      }
      yield* Effect.sleep(Duration.millis(Math.min(interval, msUntilNextMinute(millis))));
    }
  });
}

/**
 * Sleep until `leadMs` before the next minute boundary. Returns at once when
 * already inside that window, e.g. after a playout that ran long.
 */
export function sleepUntilNextMinute(leadMs: number): Effect.Effect<void, never> {
  return Effect.gen(function* () {
    const millis = yield* Clock.currentTimeMillis;
    const remaining = msUntilNextMinute(millis) - leadMs;
    if (remaining > 0) {
      yield* Effect.sleep(Duration.millis(remaining));
    }
  });
}
