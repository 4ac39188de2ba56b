import { FileSystem } from "@effect/platform";
import { Effect, Layer, Option } from "effect";
import path from "node:path";
import { z } from "zod";
import { ConfigServiceTag, type ConfigService } from "../core/interfaces/config";
import type { AppConfig } from "../core/types/index";
import {
  ConfigurationError,
  ConfigurationValidationError,
  StorageError,
} from "../core/types/errors";
import { expandHome, getDefaultDataDirectory } from "../core/utils/data-directory";
import { isRecord, safeParseJson } from "../core/utils/json";

/**
 * Configuration service
 *
 * Keeps two views: the raw object stored in the config file, which is what
 * gets written back, and the validated AppConfig with every default filled in.
 */

const PathSchema = z.string().min(1).transform(expandHome);
const HourSchema = z.number().int().min(0).max(23);

export const AppConfigSchema = z
  .object({
    storage: z
      .object({
        path: PathSchema.default(() => getDefaultDataDirectory()),
        persist: z.boolean().default(true),
      })
      .strict()
      .default({}),
    logging: z
      .object({
        level: z.enum(["debug", "info", "warn", "error"]).default("info"),
        directory: PathSchema.optional(),
      })
      .strict()
      .default({}),
    sounds: z
      .object({
        basePath: PathSchema.default(() => path.join(getDefaultDataDirectory(), "sounds")),
        extension: z.string().default(".mp3"),
        strikePrefix: z.string().min(1).default("Strike"),
      })
      .strict()
      .default({}),
    audio: z
      .object({
        command: z.string().min(1).optional(),
        args: z.array(z.string()).optional(),
      })
      .strict()
      .default({}),
    schedule: z
      .object({
        startHour: HourSchema.default(0),
        endHour: HourSchema.default(23),
      })
      .strict()
      .refine((schedule) => schedule.endHour >= schedule.startHour, {
        message: "endHour must not be before startHour",
        path: ["endHour"],
      })
      .default({}),
    playout: z
      .object({
        pollIntervalMs: z.number().int().min(10).max(60_000).default(250),
        wakeLeadMs: z.number().int().min(0).max(59_000).default(1000),
        timeoutMs: z.number().int().min(0).default(0),
      })
      .strict()
      .default({}),
  })
  .strict();

export class ConfigServiceImpl implements ConfigService {
  private fileConfig: Record<string, unknown>;
  private currentConfig: AppConfig;
  private readonly filePath: string;
  private readonly fs: FileSystem.FileSystem;
  /** Applied on top of the file for this process only, never written */
  private readonly overrides: Record<string, unknown>;

  constructor(
    fileConfig: Record<string, unknown>,
    currentConfig: AppConfig,
    filePath: string,
    fs: FileSystem.FileSystem,
    overrides: Record<string, unknown> = {},
  ) {
    this.fileConfig = fileConfig;
    this.currentConfig = currentConfig;
    this.filePath = filePath;
    this.fs = fs;
    this.overrides = overrides;
  }

  get(key: string): Effect.Effect<unknown, never> {
    return Effect.sync(() => deepGet(this.currentConfig, key));
  }

  set(
    key: string,
    value: unknown,
  ): Effect.Effect<void, StorageError | ConfigurationValidationError> {
    return Effect.gen(
      function* (this: ConfigServiceImpl) {
        const parts = key.split(".").filter(Boolean);
        if (parts.length === 0) {
          return yield* Effect.fail(
            new ConfigurationValidationError({
              field: key,
              expected: "a dot-notation key such as sounds.basePath",
              actual: key,
            }),
          );
        }

        const nextFileConfig = deepSet(this.fileConfig, parts, value);
        const nextConfig = yield* validateConfig(mergeSections(nextFileConfig, this.overrides));

        const dir = path.dirname(this.filePath);
        yield* this.fs.makeDirectory(dir, { recursive: true }).pipe(
          Effect.mapError(
            (error) =>
              new StorageError({
                operation: "mkdir",
                path: dir,
                reason: `Failed to create directory: ${String(error)}`,
              }),
          ),
        );
        yield* this.fs
          .writeFileString(this.filePath, JSON.stringify(nextFileConfig, null, 2) + "\n")
          .pipe(
            Effect.mapError(
              (error) =>
                new StorageError({
                  operation: "write",
                  path: this.filePath,
                  reason: `Failed to write config file: ${String(error)}`,
                }),
            ),
          );

        this.fileConfig = nextFileConfig;
        this.currentConfig = nextConfig;
      }.bind(this),
    );
  }

  get appConfig(): Effect.Effect<AppConfig, never> {
    return Effect.sync(() => this.currentConfig);
  }

  get configPath(): Effect.Effect<string, never> {
    return Effect.succeed(this.filePath);
  }
}

export function createConfigLayer(
  debug?: boolean,
  customConfigPath?: string,
): Layer.Layer<ConfigService, ConfigurationError, FileSystem.FileSystem> {
  return Layer.effect(
    ConfigServiceTag,
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const loaded = yield* loadConfigFile(fs, customConfigPath);
      const fileConfig = loaded.fileConfig ?? {};

      // --debug raises the log level for this run without touching the file
      const overrides: Record<string, unknown> = debug ? { logging: { level: "debug" } } : {};

      const appConfig = yield* validateConfig(mergeSections(fileConfig, overrides)).pipe(
        Effect.mapError(
          (error) =>
            new ConfigurationError({
              field: error.field,
              message: `Invalid configuration in ${loaded.configPath}: ${error.expected}`,
              value: error.actual,
              suggestion: `Fix '${error.field}' in ${loaded.configPath} or remove it to use the default`,
            }),
        ),
      );

      return new ConfigServiceImpl(fileConfig, appConfig, loaded.configPath, fs, overrides);
    }),
  );
}

// -----------------
// Internal helpers
// -----------------

/**
 * Validate a raw config object and fill in defaults. The first issue is reported.
 */
export function validateConfig(
  raw: Record<string, unknown>,
): Effect.Effect<AppConfig, ConfigurationValidationError> {
  const parsed = AppConfigSchema.safeParse(raw);
  if (parsed.success) {
    return Effect.succeed(parsed.data);
  }
  const issue = parsed.error.issues[0];
  const field = issue ? issue.path.join(".") : "";
  return Effect.fail(
    new ConfigurationValidationError({
      field: field || "(root)",
      expected: issue ? issue.message : "a configuration object",
      actual: field ? deepGet(raw, field) : raw,
      ...(issue?.code === "unrecognized_keys" && {
        suggestion: "Run 'carillon config show' to see the available keys",
      }),
    }),
  );
}

/**
 * Merge two raw configs one section deep; the override wins key by key.
 */
function mergeSections(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [section, value] of Object.entries(override)) {
    const existing = merged[section];
    merged[section] = isRecord(existing) && isRecord(value) ? { ...existing, ...value } : value;
  }
  return merged;
}

function readConfigObject(
  fs: FileSystem.FileSystem,
  filePath: string,
): Effect.Effect<Option.Option<Record<string, unknown>>, string> {
  return Effect.gen(function* () {
    const content = yield* fs
      .readFileString(filePath)
      .pipe(Effect.mapError((error) => `Cannot read config file: ${String(error)}`));
    if (content.trim().length === 0) {
      return Option.none();
    }
    const parsed = safeParseJson(content);
    if (Option.isNone(parsed)) {
      return yield* Effect.fail("Invalid JSON in config file");
    }
    if (!isRecord(parsed.value)) {
      return yield* Effect.fail("Config file must contain a JSON object");
    }
    return Option.some(parsed.value);
  });
}

function loadConfigFile(
  fs: FileSystem.FileSystem,
  customConfigPath?: string,
): Effect.Effect<
  {
    configPath: string;
    fileConfig?: Record<string, unknown>;
  },
  ConfigurationError
> {
  return Effect.gen(function* () {
    // If custom config path is provided, validate and use it exclusively
    if (customConfigPath) {
      const expandedPath = path.resolve(expandHome(customConfigPath));
      const exists = yield* fs
        .exists(expandedPath)
        .pipe(Effect.catchAll(() => Effect.succeed(false)));

      if (!exists) {
        return yield* Effect.fail(
          new ConfigurationError({
            field: "config",
            message: `Config file not found at: ${expandedPath}`,
            value: customConfigPath,
            suggestion: "Please ensure the file exists and the path is correct",
          }),
        );
      }

      const fileConfig = yield* readConfigObject(fs, expandedPath).pipe(
        Effect.mapError(
          (reason) =>
            new ConfigurationError({
              field: "config",
              message: `${reason}: ${expandedPath}`,
              value: customConfigPath,
            }),
        ),
      );

      return Option.match(fileConfig, {
        onNone: () => ({ configPath: expandedPath }),
        onSome: (config) => ({ configPath: expandedPath, fileConfig: config }),
      });
    }

    // Otherwise, use the default search order
    const envConfigPath = process.env["CARILLON_CONFIG_PATH"];
    const defaultPath = path.join(getDefaultDataDirectory(), "config.json");
    const candidates: readonly string[] = [
      envConfigPath ? path.resolve(expandHome(envConfigPath)) : "",
      path.join(process.cwd(), ".carillon", "config.json"),
      path.join(process.cwd(), "carillon.config.json"),
      defaultPath,
    ].filter(Boolean);

    for (const candidate of candidates) {
      const exists = yield* fs
        .exists(candidate)
        .pipe(Effect.catchAll(() => Effect.succeed(false)));
      if (!exists) continue;
      const fileConfig = yield* Effect.option(readConfigObject(fs, candidate));
      // Unreadable candidates are skipped in favour of the next one
      if (Option.isNone(fileConfig)) continue;
      if (Option.isNone(fileConfig.value)) return { configPath: candidate };
      return { configPath: candidate, fileConfig: fileConfig.value.value };
    }

    return { configPath: defaultPath };
  });
}

/**
 * Deep object property access using dot notation paths.
 *
 * - "sounds" -> obj.sounds
 * - "sounds.basePath" -> obj.sounds.basePath
 */
export function deepGet(obj: unknown, key: string): unknown {
  const parts = key.split(".").filter(Boolean);
  let cur: unknown = obj;
  for (const part of parts) {
    if (isRecord(cur) && part in cur) {
      cur = cur[part];
    } else {
      return undefined;
    }
  }
  return cur;
}

/**
 * Returns a copy of `obj` with the value at `parts` replaced, creating
 * intermediate objects as needed.
 *
 * Example: deepSet({}, ["sounds", "extension"], ".wav") -> { sounds: { extension: ".wav" } }
 */
export function deepSet(
  obj: Record<string, unknown>,
  parts: readonly string[],
  value: unknown,
): Record<string, unknown> {
  const [head, ...rest] = parts;
  if (head === undefined) {
    return obj;
  }
  if (rest.length === 0) {
    return { ...obj, [head]: value };
  }
  const child = obj[head];
  return { ...obj, [head]: deepSet(isRecord(child) ? child : {}, rest, value) };
}
