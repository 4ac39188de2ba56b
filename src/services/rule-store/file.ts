import { FileSystem } from "@effect/platform";
import { Effect, Either, Layer, Option } from "effect";
import path from "node:path";
import { ConfigServiceTag, type ConfigService } from "../../core/interfaces/config";
import { LoggerServiceTag, type LoggerService } from "../../core/interfaces/logger";
import { RuleStoreTag, type RuleStore } from "../../core/interfaces/rule-store";
import { defaultRules } from "../../core/schedule/default-rules";
import { StorageError } from "../../core/types/errors";
import type { Rule } from "../../core/types/index";
import { parseJson } from "../../core/utils/json";
import { decodeRules, encodeRules } from "./codec";
import { makeInMemoryRuleStore } from "./inMemory";

export const RULES_FILE_NAME = "rules.json";

export function getRulesFilePath(storagePath: string): string {
  return path.join(storagePath, RULES_FILE_NAME);
}

/**
 * Reads and writes the rule table as JSON in the data directory
 */
export class RuleFile {
  constructor(
    readonly filePath: string,
    private readonly fs: FileSystem.FileSystem,
  ) {}

  /**
   * The stored table, or none when no file has been written yet.
   */
  load(): Effect.Effect<Option.Option<readonly Rule[]>, StorageError> {
    return Effect.gen(
      function* (this: RuleFile) {
        const exists = yield* this.fs.exists(this.filePath).pipe(
          Effect.mapError((error) => this.storageError("read", error)),
        );
        if (!exists) {
          return Option.none();
        }

        const content = yield* this.fs.readFileString(this.filePath).pipe(
          Effect.mapError((error) => this.storageError("read", error)),
        );
        const json = yield* parseJson(content).pipe(
          Effect.mapError(
            (error) =>
              new StorageError({
                operation: "read",
                path: this.filePath,
                reason: `Invalid JSON format: ${error.message}`,
              }),
          ),
        );
        const decoded = decodeRules(json);
        if (Either.isLeft(decoded)) {
          return yield* Effect.fail(
            new StorageError({
              operation: "read",
              path: this.filePath,
              reason: `Invalid rule table: ${decoded.left}`,
              suggestion: "Fix the file by hand, or run 'carillon rules reset' to start over",
            }),
          );
        }
        return Option.some(decoded.right);
      }.bind(this),
    );
  }

  /**
   * Write to a sibling temp file then rename, so a crash mid-write leaves the old table.
   */
  save(rules: readonly Rule[]): Effect.Effect<void, StorageError> {
    return Effect.gen(
      function* (this: RuleFile) {
        const tempPath = `${this.filePath}.tmp`;
        yield* this.fs.makeDirectory(path.dirname(this.filePath), { recursive: true }).pipe(
          Effect.mapError((error) => this.storageError("mkdir", error)),
        );
        yield* this.fs.writeFileString(tempPath, encodeRules(rules)).pipe(
          Effect.mapError((error) => this.storageError("write", error)),
        );
        yield* this.fs.rename(tempPath, this.filePath).pipe(
          Effect.mapError((error) => this.storageError("write", error)),
        );
      }.bind(this),
    );
  }

  private storageError(operation: string, error: unknown): StorageError {
    const reason = error instanceof Error ? error.message : String(error);
    return new StorageError({ operation, path: this.filePath, reason });
  }
}

/**
 * Initial table for a persisted store: the saved file if it is readable,
 * otherwise the default schedule.
 */
function loadInitialRules(
  file: RuleFile,
  fallback: readonly Rule[],
  logger: LoggerService,
): Effect.Effect<readonly Rule[], never> {
  return file.load().pipe(
    Effect.flatMap(
      Option.match({
        onNone: () =>
          logger
            .info("No saved rule table, using the default schedule", { path: file.filePath })
            .pipe(Effect.as(fallback)),
        onSome: (rules) =>
          logger
            .debug("Loaded rule table", { path: file.filePath, count: rules.length })
            .pipe(Effect.as(rules)),
      }),
    ),
    Effect.catchAll((error) =>
      logger
        .warn("Saved rule table could not be loaded, using the default schedule", {
          path: error.path,
          reason: error.reason,
        })
        .pipe(Effect.as(fallback)),
    ),
  );
}

/**
 * Rule store for the running application
 *
 * With `storage.persist` on, the table is loaded from rules.json at start and
 * written back after every change. A failed write is logged and the in-memory
 * table stays authoritative.
 */
export function createRuleStoreLayer(): Layer.Layer<
  RuleStore,
  never,
  FileSystem.FileSystem | ConfigService | LoggerService
> {
  return Layer.effect(
    RuleStoreTag,
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const config = yield* ConfigServiceTag;
      const logger = yield* LoggerServiceTag;
      const appConfig = yield* config.appConfig;
      const defaults = defaultRules(appConfig.schedule);

      if (!appConfig.storage.persist) {
        return yield* makeInMemoryRuleStore(defaults);
      }

      const file = new RuleFile(getRulesFilePath(appConfig.storage.path), fs);
      const initial = yield* loadInitialRules(file, defaults, logger);

      return yield* makeInMemoryRuleStore(initial, (rules) =>
        file.save(rules).pipe(
          Effect.catchAll((error) =>
            logger.error("Failed to save rule table", {
              path: error.path,
              operation: error.operation,
              reason: error.reason,
            }),
          ),
        ),
      );
    }),
  );
}
