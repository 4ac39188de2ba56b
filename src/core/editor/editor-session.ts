import { Effect, Either } from "effect";
import { AudioPlayerTag, type AudioPlayer } from "../interfaces/audio-player";
import { ConfigServiceTag, type ConfigService } from "../interfaces/config";
import { LoggerServiceTag, type LoggerService } from "../interfaces/logger";
import { RuleStoreTag, type RuleStore } from "../interfaces/rule-store";
import { TerminalServiceTag, type TerminalService } from "../interfaces/terminal";
import type { ValidationError } from "../types/errors";
import type { Rule } from "../types/rule";
import { strikeSoundIds } from "../schedule/rule-matcher";
import { INSTRUCTIONS } from "./instructions";
import { formatRule, formatRuleTable } from "./rule-format";
import { parseCommand, type EditorCommand } from "./rule-parser";

export type EditorServices =
  | RuleStore
  | AudioPlayer
  | ConfigService
  | LoggerService
  | TerminalService;

/**
 * Sound identifiers a rule needs: the twelve strike sounds for `Strike`,
 * otherwise its one named file.
 */
export function requiredSoundIds(rule: Rule, strikePrefix: string): readonly string[] {
  return rule.sound.kind === "strike" ? strikeSoundIds(strikePrefix) : [rule.sound.name];
}

/**
 * Required sounds that are not present in the sound directory, in order.
 */
export function findMissingSounds(
  soundIds: readonly string[],
): Effect.Effect<readonly string[], never, AudioPlayer> {
  return Effect.gen(function* () {
    const player = yield* AudioPlayerTag;
    const availability = yield* Effect.forEach(soundIds, (id) => player.isAvailable(id));
    return soundIds.filter((_, index) => !availability[index]);
  });
}

export function showSchedule(): Effect.Effect<void, never, RuleStore | TerminalService> {
  return Effect.gen(function* () {
    const store = yield* RuleStoreTag;
    const terminal = yield* TerminalServiceTag;
    const rules = yield* store.snapshot();
    yield* terminal.log("");
    for (const line of formatRuleTable(rules)) {
      yield* terminal.log(line);
    }
    yield* terminal.log("");
  });
}

export function showInstructions(): Effect.Effect<void, never, TerminalService> {
  return Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag;
    yield* terminal.list(INSTRUCTIONS);
  });
}

function reportInvalidInput(error: ValidationError): Effect.Effect<void, never, TerminalService> {
  return Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag;
    yield* terminal.error(error.message);
    if (error.suggestion) {
      yield* terminal.log(`   ${error.suggestion}`);
    }
  });
}

function applyCommand(command: EditorCommand): Effect.Effect<void, never, EditorServices> {
  return Effect.gen(function* () {
    const store = yield* RuleStoreTag;
    const player = yield* AudioPlayerTag;
    const config = yield* ConfigServiceTag;
    const logger = yield* LoggerServiceTag;
    const terminal = yield* TerminalServiceTag;

    switch (command._tag) {
      case "ShowInstructions": {
        yield* showInstructions();
        return;
      }

      case "ShowSchedule": {
        yield* showSchedule();
        return;
      }

      case "Delete": {
        const removed = yield* Effect.either(store.deleteAt(command.position));
        if (Either.isLeft(removed)) {
          yield* terminal.error(`No line ${command.position} to delete`);
          return;
        }
        yield* logger.info("Rule deleted", {
          position: command.position,
          rule: formatRule(removed.right),
        });
        yield* terminal.success(`Line ${command.position} deleted`);
        yield* showSchedule();
        return;
      }

      case "Upsert": {
        const appConfig = yield* config.appConfig;
        const missing = yield* findMissingSounds(
          requiredSoundIds(command.rule, appConfig.sounds.strikePrefix),
        );
        if (missing.length > 0) {
          for (const soundId of missing) {
            yield* terminal.error(`${player.resolvePath(soundId)} not found - check sPeLLing`);
          }
          return;
        }

        const result = yield* store.upsertAt(command.position, command.rule);
        yield* logger.info(result.action === "inserted" ? "Rule added" : "Rule replaced", {
          position: result.position,
          rule: formatRule(command.rule),
        });
        yield* terminal.success(
          result.action === "inserted"
            ? `Line ${result.position} added`
            : `Line ${result.position} replaced`,
        );
        yield* showSchedule();
        return;
      }
    }
  });
}

/**
 * Handle one line typed into the editor. Invalid input is reported and the
 * store is left untouched.
 */
export function handleEditorLine(line: string): Effect.Effect<void, never, EditorServices> {
  return Either.match(parseCommand(line), {
    onLeft: (error) => reportInvalidInput(error),
    onRight: (command) => applyCommand(command),
  });
}

/**
 * Prompt for editor lines until the fiber is interrupted.
 */
export function runEditorLoop(): Effect.Effect<never, never, EditorServices> {
  return Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag;
    yield* showInstructions();
    yield* showSchedule();
    return yield* Effect.forever(
      terminal.ask("Edit").pipe(Effect.flatMap((line) => handleEditorLine(line))),
    );
  });
}
