import { Effect } from "effect";
import { findMissingSounds, requiredSoundIds } from "../../core/editor/editor-session";
import { AudioPlayerTag, type AudioPlayer } from "../../core/interfaces/audio-player";
import { ConfigServiceTag, type ConfigService } from "../../core/interfaces/config";
import { RuleStoreTag, type RuleStore } from "../../core/interfaces/rule-store";
import { TerminalServiceTag, type TerminalService } from "../../core/interfaces/terminal";
import { strikeSoundIds } from "../../core/schedule/rule-matcher";

/**
 * Check that every sound the schedule can play is in the sound directory:
 * the twelve strike sounds and each named file.
 *
 * @returns The missing sound identifiers
 */
export function checkSoundsCommand(): Effect.Effect<
  readonly string[],
  never,
  AudioPlayer | ConfigService | RuleStore | TerminalService
> {
  return Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag;
    const config = yield* ConfigServiceTag;
    const player = yield* AudioPlayerTag;
    const store = yield* RuleStoreTag;

    const { sounds } = yield* config.appConfig;
    const rules = yield* store.snapshot();
    const required = [
      ...new Set([
        ...strikeSoundIds(sounds.strikePrefix),
        ...rules.flatMap((rule) => requiredSoundIds(rule, sounds.strikePrefix)),
      ]),
    ];

    yield* terminal.info(`Checking ${required.length} sounds in ${sounds.basePath}`);
    const missing = yield* findMissingSounds(required);

    if (missing.length === 0) {
      yield* terminal.success("All sounds found");
      return missing;
    }

    yield* terminal.error(`${missing.length} missing:`);
    yield* terminal.list(missing.map((soundId) => player.resolvePath(soundId)));
    return missing;
  });
}
