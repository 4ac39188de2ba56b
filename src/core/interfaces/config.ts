import { Context, Effect } from "effect";
import type { ConfigurationValidationError, StorageError } from "../types/errors";
import type { AppConfig } from "../types/index";

export interface ConfigService {
  /** Reads a value by dot-notation key (e.g. "sounds.basePath"); undefined when absent. */
  readonly get: (key: string) => Effect.Effect<unknown, never>;
  /**
   * Sets a value by dot-notation key and writes the config file.
   * Fails without writing when the result is not a valid configuration.
   */
  readonly set: (
    key: string,
    value: unknown,
  ) => Effect.Effect<void, StorageError | ConfigurationValidationError>;
  /** Gets the complete application configuration. */
  readonly appConfig: Effect.Effect<AppConfig, never>;
  /** Path of the config file that was loaded or will be written. */
  readonly configPath: Effect.Effect<string, never>;
}

export const ConfigServiceTag = Context.GenericTag<ConfigService>("ConfigService");
