import { Effect } from "effect";
import { ConfigServiceTag, type ConfigService } from "../../core/interfaces/config";
import { TerminalServiceTag, type TerminalService } from "../../core/interfaces/terminal";
import type { LogLevel } from "../../core/types/config";
import type { ConfigurationValidationError, StorageError } from "../../core/types/errors";
import { coerceCliValue } from "../../core/utils/json";

/**
 * CLI commands for configuration management
 */

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Show the effective configuration, defaults included
 */
export function listConfigCommand(): Effect.Effect<void, never, ConfigService | TerminalService> {
  return Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag;
    const configService = yield* ConfigServiceTag;
    const config = yield* configService.appConfig;
    const configPath = yield* configService.configPath;
    yield* terminal.heading("Current Configuration");
    yield* terminal.log(JSON.stringify(config, null, 2));
    yield* terminal.log("");
    yield* terminal.log(`File: ${configPath}`);
  });
}

/**
 * Get a configuration value
 * Supports nested keys (e.g., "sounds.basePath")
 */
export function getConfigCommand(
  key: string,
): Effect.Effect<void, never, ConfigService | TerminalService> {
  return Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag;
    const configService = yield* ConfigServiceTag;
    const value = yield* configService.get(key);

    if (value === undefined) {
      yield* terminal.warn(`No configuration value at '${key}'`);
      return;
    }
    yield* terminal.log(JSON.stringify(value, null, 2));
  });
}

/**
 * Set a configuration value
 * Supports nested keys (e.g., "playout.timeoutMs"). Values are read as JSON
 * when they parse, so `250` is a number and `true` a boolean.
 */
export function setConfigCommand(
  key: string,
  value?: string,
): Effect.Effect<
  void,
  StorageError | ConfigurationValidationError,
  ConfigService | TerminalService
> {
  return Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag;
    const configService = yield* ConfigServiceTag;

    if (value === undefined) {
      if (key === "logging" || key === "logging.level") {
        const level = yield* terminal.select<LogLevel>("Select logging level:", {
          choices: LOG_LEVELS,
        });
        yield* configService.set("logging.level", level);
        yield* terminal.success("Logging configuration updated.");
        return;
      }

      const current = yield* configService.get(key);
      const answer = yield* terminal.ask(`Enter value for ${key}:`, {
        ...(typeof current === "string" || typeof current === "number"
          ? { defaultValue: String(current) }
          : {}),
      });
      yield* configService.set(key, coerceCliValue(answer));
      yield* terminal.success(`Config set: ${key} = ${answer}`);
      return;
    }

    yield* terminal.info(`Setting config: ${key} = ${value}`);
    yield* configService.set(key, coerceCliValue(value));
    yield* terminal.success(`Config set: ${key} = ${value}`);
  });
}
