import { Effect, Layer } from "effect";
import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import { ConfigServiceTag, type ConfigService } from "../core/interfaces/config";
import { LoggerServiceTag, type LoggerService } from "../core/interfaces/logger";
import type { AppConfig, LogLevel } from "../core/types/config";

/**
 * File logger writing one line per entry to carillon.log
 */

export const LOG_FILE_NAME = "carillon.log";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLevelEnabled(threshold: LogLevel, level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Error) return { name: value.name, message: value.message };
  return value;
}

/**
 * Shared helper to format a log line for file output
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
  now: Date = new Date(),
): string {
  const metaText =
    meta && Object.keys(meta).length > 0 ? " " + JSON.stringify(meta, jsonReplacer) : "";
  return `${now.toISOString()} [${level.toUpperCase()}] ${message}${metaText}\n`;
}

/**
 * Where logs go
 * 1. CARILLON_LOG_DIR environment variable
 * 2. logging.directory
 * 3. <storage.path>/logs
 */
export function resolveLogsDirectory(config: AppConfig): string {
  const override = process.env["CARILLON_LOG_DIR"];
  if (override && override.trim().length > 0) {
    return path.resolve(override);
  }
  if (config.logging.directory) {
    return path.resolve(config.logging.directory);
  }
  return path.join(config.storage.path, "logs");
}

export class LoggerServiceImpl implements LoggerService {
  constructor(
    private readonly threshold: LogLevel,
    private readonly logFilePath: string,
  ) {}

  private write(
    level: LogLevel,
    message: string,
    meta?: Record<string, unknown>,
  ): Effect.Effect<void, never> {
    if (!isLevelEnabled(this.threshold, level)) {
      return Effect.void;
    }
    const logFilePath = this.logFilePath;
    return Effect.tryPromise({
      try: async () => {
        await mkdir(path.dirname(logFilePath), { recursive: true });
        await appendFile(logFilePath, formatLogLine(level, message, meta), { encoding: "utf8" });
      },
      catch: (error: unknown) =>
        new Error(
          `Failed to write to log file: ${error instanceof Error ? error.message : String(error)}`,
        ),
    }).pipe(
      // Logging must not fail the caller; fall back to stderr
      Effect.catchAll((error) => Effect.sync(() => process.stderr.write(`${error.message}\n`))),
      Effect.asVoid,
    );
  }

  debug(message: string, meta?: Record<string, unknown>): Effect.Effect<void, never> {
    return this.write("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): Effect.Effect<void, never> {
    return this.write("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): Effect.Effect<void, never> {
    return this.write("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): Effect.Effect<void, never> {
    return this.write("error", message, meta);
  }
}

/**
 * Create the logger layer from the loaded configuration
 */
export function createLoggerLayer(): Layer.Layer<LoggerService, never, ConfigService> {
  return Layer.effect(
    LoggerServiceTag,
    Effect.gen(function* () {
      const config = yield* ConfigServiceTag;
      const appConfig = yield* config.appConfig;
      const logFilePath = path.join(resolveLogsDirectory(appConfig), LOG_FILE_NAME);
      return new LoggerServiceImpl(appConfig.logging.level, logFilePath);
    }),
  );
}
