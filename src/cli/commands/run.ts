import { Effect, Fiber } from "effect";
import {
  findMissingSounds,
  requiredSoundIds,
  runEditorLoop,
  type EditorServices,
} from "../../core/editor/editor-session";
import { ConfigServiceTag } from "../../core/interfaces/config";
import { LoggerServiceTag } from "../../core/interfaces/logger";
import { RuleStoreTag } from "../../core/interfaces/rule-store";
import { TerminalServiceTag } from "../../core/interfaces/terminal";
import { PlayoutState, runPlayoutLoop } from "../../core/schedule/playout-loop";

export interface RunOptions {
  /** Play the schedule without the interactive editor */
  readonly headless?: boolean;
}

/**
 * Start the scheduler
 *
 * The playout loop runs on a forked fiber for the life of the command; the
 * editor prompt runs on this one. Interrupting the command stops both.
 */
export function runSchedulerCommand(
  options: RunOptions = {},
): Effect.Effect<void, never, EditorServices> {
  return Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag;
    const config = yield* ConfigServiceTag;
    const logger = yield* LoggerServiceTag;
    const store = yield* RuleStoreTag;

    const appConfig = yield* config.appConfig;
    const rules = yield* store.snapshot();

    yield* terminal.heading("Carillon");
    yield* terminal.info(`Sounds from ${appConfig.sounds.basePath}`);

    const required = [
      ...new Set(rules.flatMap((rule) => requiredSoundIds(rule, appConfig.sounds.strikePrefix))),
    ];
    const missing = yield* findMissingSounds(required);
    if (missing.length > 0) {
      yield* terminal.warn(
        `${missing.length} scheduled ${missing.length === 1 ? "sound is" : "sounds are"} missing; ` +
          "events using them will be removed when due. Run 'carillon sounds check' for details.",
      );
    }

    yield* logger.info("Scheduler started", {
      rules: rules.length,
      headless: options.headless === true,
      soundsPath: appConfig.sounds.basePath,
    });

    const state = yield* PlayoutState.make();
    const playout = yield* Effect.fork(
      runPlayoutLoop({
        pollIntervalMs: appConfig.playout.pollIntervalMs,
        wakeLeadMs: appConfig.playout.wakeLeadMs,
        timeoutMs: appConfig.playout.timeoutMs,
        strikePrefix: appConfig.sounds.strikePrefix,
        state,
      }),
    );

    if (options.headless) {
      yield* terminal.info("Playing the schedule. Press Ctrl+C to stop.");
      return yield* Fiber.join(playout);
    }

    return yield* runEditorLoop();
  });
}
