import { Effect } from "effect";
import { showSchedule } from "../../core/editor/editor-session";
import { ConfigServiceTag, type ConfigService } from "../../core/interfaces/config";
import { LoggerServiceTag, type LoggerService } from "../../core/interfaces/logger";
import { RuleStoreTag, type RuleStore } from "../../core/interfaces/rule-store";
import { TerminalServiceTag, type TerminalService } from "../../core/interfaces/terminal";
import { defaultRules } from "../../core/schedule/default-rules";

/**
 * Print the numbered rule table
 */
export function listRulesCommand(): Effect.Effect<void, never, RuleStore | TerminalService> {
  return Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag;
    yield* terminal.heading("Schedule");
    yield* showSchedule();
  });
}

/**
 * Replace the rule table with the default schedule
 */
export function resetRulesCommand(options: {
  readonly yes?: boolean;
}): Effect.Effect<void, never, RuleStore | ConfigService | LoggerService | TerminalService> {
  return Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag;
    const config = yield* ConfigServiceTag;
    const logger = yield* LoggerServiceTag;
    const store = yield* RuleStoreTag;

    const count = yield* store.len();
    if (!options.yes) {
      const confirmed = yield* terminal.confirm(
        `Replace all ${count} rules with the default schedule?`,
        false,
      );
      if (!confirmed) {
        yield* terminal.info("Reset cancelled");
        return;
      }
    }

    const appConfig = yield* config.appConfig;
    const rules = defaultRules(appConfig.schedule);
    yield* store.replaceAll(rules);
    yield* logger.info("Rule table reset to defaults", { previous: count, rules: rules.length });
    yield* terminal.success(`Schedule reset to ${rules.length} default rules`);
    yield* showSchedule();
  });
}
