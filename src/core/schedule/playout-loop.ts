import { Duration, Effect, Either, Option, Ref } from "effect";
import { formatRule } from "../editor/rule-format";
import { AudioPlayerTag, type AudioPlayer } from "../interfaces/audio-player";
import { LoggerServiceTag, type LoggerService } from "../interfaces/logger";
import { RuleStoreTag, type RuleStore } from "../interfaces/rule-store";
import { TerminalServiceTag, type TerminalService } from "../interfaces/terminal";
import { PlaybackError } from "../types/errors";
import { describeSound, type Rule } from "../types/rule";
import {
  DEFAULT_POLL_INTERVAL_MS,
  minuteKey,
  sleepUntilNextMinute,
  waitForMinuteBoundary,
} from "./clock-sync";
import { isDue, resolveSoundId } from "./rule-matcher";

export type PlayoutPhase = "idle" | "syncing" | "evaluating" | "playing";

export interface PlayedSound {
  readonly position: number;
  readonly soundId: string;
}

/**
 * A rule that failed to play and was taken out of the schedule.
 */
export interface RemovedRule {
  readonly position: number;
  readonly rule: Rule;
  readonly error: PlaybackError;
}

export interface TickReport {
  readonly at: Date;
  readonly played: readonly PlayedSound[];
  readonly removed: readonly RemovedRule[];
}

/**
 * Observable state of the playout loop, for status output and tests.
 */
export class PlayoutState {
  constructor(
    private readonly phaseRef: Ref.Ref<PlayoutPhase>,
    private readonly lastTickRef: Ref.Ref<Option.Option<TickReport>>,
  ) {}

  static make(): Effect.Effect<PlayoutState, never> {
    return Effect.gen(function* () {
      const phase = yield* Ref.make<PlayoutPhase>("idle");
      const lastTick = yield* Ref.make<Option.Option<TickReport>>(Option.none());
      return new PlayoutState(phase, lastTick);
    });
  }

  get phase(): Effect.Effect<PlayoutPhase, never> {
    return Ref.get(this.phaseRef);
  }

  get lastTick(): Effect.Effect<Option.Option<TickReport>, never> {
    return Ref.get(this.lastTickRef);
  }

  setPhase(phase: PlayoutPhase): Effect.Effect<void, never> {
    return Ref.set(this.phaseRef, phase);
  }

  recordTick(report: TickReport): Effect.Effect<void, never> {
    return Ref.set(this.lastTickRef, Option.some(report));
  }
}

export interface TickOptions {
  readonly strikePrefix?: string;
  /** Upper bound for one playback; 0 or absent waits indefinitely */
  readonly timeoutMs?: number;
  readonly state?: PlayoutState;
}

export interface PlayoutOptions extends TickOptions {
  readonly pollIntervalMs?: number;
  /** How long before the next boundary to wake and start polling */
  readonly wakeLeadMs?: number;
}

type PlayoutServices = RuleStore | AudioPlayer | LoggerService | TerminalService;

function playWithTimeout(
  player: AudioPlayer,
  soundId: string,
  timeoutMs: number,
): Effect.Effect<void, PlaybackError> {
  const play = player.play(soundId);
  if (timeoutMs <= 0) {
    return play;
  }
  return play.pipe(
    Effect.timeoutFail({
      duration: Duration.millis(timeoutMs),
      onTimeout: () =>
        new PlaybackError({
          soundId,
          path: player.resolvePath(soundId),
          reason: "timeout",
          detail: `Playback did not finish within ${timeoutMs}ms`,
        }),
    }),
  );
}

function playRule(
  player: AudioPlayer,
  rule: Rule,
  now: Date,
  options: TickOptions,
): Effect.Effect<string, PlaybackError> {
  return Effect.sync(() => resolveSoundId(rule.sound, now, options.strikePrefix)).pipe(
    Effect.flatMap((soundId) =>
      playWithTimeout(player, soundId, options.timeoutMs ?? 0).pipe(Effect.as(soundId)),
    ),
    Effect.catchAllDefect((defect) =>
      Effect.fail(
        new PlaybackError({
          soundId: describeSound(rule.sound),
          path: "",
          reason: "unexpected",
          detail: defect instanceof Error ? defect.message : String(defect),
        }),
      ),
    ),
  );
}

function describePlaybackError(error: PlaybackError): string {
  switch (error.reason) {
    case "missing":
      return `${error.path} not found`;
    case "timeout":
      return error.detail ?? `${error.soundId} timed out`;
    case "failed":
    case "unexpected":
      return error.detail ?? `${error.soundId} could not be played`;
  }
}

/**
 * Evaluate one minute: play every due rule in position order, one after another.
 *
 * A rule whose sound cannot be played is reported, removed from the store and
 * skipped; the remaining rules are still evaluated.
 */
export function runTick(
  now: Date,
  options: TickOptions = {},
): Effect.Effect<TickReport, never, PlayoutServices> {
  return Effect.gen(function* () {
    const store = yield* RuleStoreTag;
    const player = yield* AudioPlayerTag;
    const logger = yield* LoggerServiceTag;
    const terminal = yield* TerminalServiceTag;

    const rules = yield* store.snapshot();
    const played: PlayedSound[] = [];
    const removed: RemovedRule[] = [];

    for (const [index, rule] of rules.entries()) {
      if (!isDue(rule, now)) {
        continue;
      }

      const position = index + 1;
      if (options.state) yield* options.state.setPhase("playing");
      const outcome = yield* Effect.either(playRule(player, rule, now, options));
      if (options.state) yield* options.state.setPhase("evaluating");

      if (Either.isRight(outcome)) {
        played.push({ position, soundId: outcome.right });
        yield* logger.info("Played scheduled sound", { position, soundId: outcome.right });
        continue;
      }

      const error = outcome.left;
      removed.push({ position, rule, error });
      yield* logger.error("Scheduled event could not be played", {
        position,
        rule: formatRule(rule),
        reason: error.reason,
        detail: describePlaybackError(error),
      });
      yield* terminal.error(
        `A scheduled event could not be played: ${describePlaybackError(error)}`,
      );
      yield* terminal.log(`Event ${position}: ${formatRule(rule)}`);

      const removal = yield* Effect.either(store.deleteRule(rule, position));
      if (Either.isRight(removal)) {
        yield* terminal.warn(`Event ${removal.right} deleted. Resuming schedule`);
      } else {
        yield* logger.debug("Failed rule was already removed", { position });
      }
    }

    return { at: now, played, removed };
  });
}

/**
 * The scheduler: wait for :00, evaluate the current snapshot, sleep until just
 * before the next minute, repeat for the life of the process.
 *
 * Playback longer than the time left in the minute delays the next evaluation;
 * rules due only in a minute that has already passed are skipped, not queued.
 */
export function runPlayoutLoop(
  options: PlayoutOptions = {},
): Effect.Effect<never, never, PlayoutServices> {
  return Effect.gen(function* () {
    const logger = yield* LoggerServiceTag;
    const state = options.state ?? (yield* PlayoutState.make());
    const tickOptions: TickOptions = { ...options, state };
    let lastMinute: number | undefined;

    yield* logger.info("Playout loop started", {
      pollIntervalMs: options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
    });

    const cycle = Effect.gen(function* () {
      yield* state.setPhase("syncing");
      const now = yield* waitForMinuteBoundary(options.pollIntervalMs);
      const key = minuteKey(now.getTime());

      if (key === lastMinute) {
        yield* state.setPhase("idle");
        yield* sleepUntilNextMinute(0);
        return;
      }
      lastMinute = key;

      yield* state.setPhase("evaluating");
      const report = yield* runTick(now, tickOptions);
      yield* state.recordTick(report);

      yield* state.setPhase("idle");
      yield* sleepUntilNextMinute(options.wakeLeadMs ?? 1000);
    });

    return yield* Effect.forever(cycle);
  });
}
