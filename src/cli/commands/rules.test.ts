import { Effect } from "effect";
import { describe, expect, it } from "vitest";
import { RuleStoreTag } from "../../core/interfaces/rule-store";
import { defaultRules } from "../../core/schedule/default-rules";
import { strikeSoundIds } from "../../core/schedule/rule-matcher";
import {
  makeFakeAudioPlayer,
  makeRecordingLogger,
  makeRecordingTerminal,
  makeTestLayer,
} from "../../core/testing/test-services";
import { makeRule, soundFile, weekdayRange } from "../../core/types/rule";
import { makeInMemoryRuleStore } from "../../services/rule-store/inMemory";
import { resetRulesCommand } from "./rules";
import { checkSoundsCommand } from "./sounds";

const bell = makeRule({ days: weekdayRange(0), startHour: 9, minute: 0, sound: soundFile("Bell") });

describe("resetRulesCommand", () => {
  it("should leave the table alone when the operator declines", async () => {
    const terminal = makeRecordingTerminal([], false);
    const layer = makeTestLayer({
      terminal,
      logger: makeRecordingLogger(),
      player: makeFakeAudioPlayer([]),
    });

    const rules = await Effect.runPromise(
      Effect.gen(function* () {
        const store = yield* makeInMemoryRuleStore([bell]);
        yield* resetRulesCommand({}).pipe(Effect.provideService(RuleStoreTag, store));
        return yield* store.snapshot();
      }).pipe(Effect.provide(layer)),
    );

    expect(rules).toEqual([bell]);
    expect(terminal.lines).toEqual([{ level: "info", message: "Reset cancelled" }]);
  });

  it("should install the default schedule without asking when told to", async () => {
    const terminal = makeRecordingTerminal([], false);
    const logger = makeRecordingLogger();
    const layer = makeTestLayer({ terminal, logger, player: makeFakeAudioPlayer([]) });

    const rules = await Effect.runPromise(
      Effect.gen(function* () {
        const store = yield* makeInMemoryRuleStore([bell]);
        yield* resetRulesCommand({ yes: true }).pipe(Effect.provideService(RuleStoreTag, store));
        return yield* store.snapshot();
      }).pipe(Effect.provide(layer)),
    );

    expect(rules).toEqual(defaultRules());
    expect(terminal.lines[0]).toEqual({ level: "success", message: "Schedule reset to 5 default rules" });
    expect(logger.entries).toEqual([
      { level: "info", message: "Rule table reset to defaults", meta: { previous: 1, rules: 5 } },
    ]);
  });
});

describe("checkSoundsCommand", () => {
  it("should list the paths of missing sounds once each", async () => {
    const terminal = makeRecordingTerminal();
    const available = [...strikeSoundIds("Strike"), "Hour", "Quarter", "ThreeQuarter"];
    const layer = makeTestLayer({
      terminal,
      logger: makeRecordingLogger(),
      player: makeFakeAudioPlayer(available),
    });

    const missing = await Effect.runPromise(
      Effect.gen(function* () {
        const store = yield* makeInMemoryRuleStore(defaultRules());
        return yield* checkSoundsCommand().pipe(Effect.provideService(RuleStoreTag, store));
      }).pipe(Effect.provide(layer)),
    );

    expect(missing).toEqual(["Half"]);
    expect(terminal.lines).toEqual([
      { level: "info", message: "Checking 16 sounds in /srv/bells" },
      { level: "error", message: "1 missing:" },
      { level: "list", message: "/srv/bells/Half.mp3" },
    ]);
  });

  it("should report success when every sound is present", async () => {
    const terminal = makeRecordingTerminal();
    const layer = makeTestLayer({
      terminal,
      logger: makeRecordingLogger(),
      player: makeFakeAudioPlayer([...strikeSoundIds("Strike"), "Bell"]),
    });

    const missing = await Effect.runPromise(
      Effect.gen(function* () {
        const store = yield* makeInMemoryRuleStore([bell]);
        return yield* checkSoundsCommand().pipe(Effect.provideService(RuleStoreTag, store));
      }).pipe(Effect.provide(layer)),
    );

    expect(missing).toEqual([]);
    expect(terminal.lines.at(-1)).toEqual({ level: "success", message: "All sounds found" });
  });
});
