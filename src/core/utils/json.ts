import { Effect, Option } from "effect";

/**
 * Utility functions for safe JSON parsing
 */

/**
 * Safely parse JSON string, returning an Option.
 * Returns Option.some(parsed) on success, Option.none() on parse error.
 */
export function safeParseJson(text: string): Option.Option<unknown> {
  try {
    return Option.some<unknown>(JSON.parse(text));
  } catch {
    return Option.none();
  }
}

/**
 * Parse JSON string as an Effect, failing with a descriptive error on parse failure.
 *
 * @example
 * ```ts
 * const parsed = yield* parseJson(content);
 * ```
 */
export function parseJson(text: string): Effect.Effect<unknown, Error> {
  return Effect.try({
    try: (): unknown => JSON.parse(text),
    catch: (error) => {
      const message =
        error instanceof Error
          ? error.message
          : typeof error === "string"
            ? error
            : "Unknown parse error";
      return new Error(`Failed to parse JSON: ${message}`);
    },
  });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Read a config-style value typed on the command line: JSON literals
 * (`250`, `true`, `["-q"]`) become their value, anything else stays a string.
 */
export function coerceCliValue(text: string): unknown {
  return Option.getOrElse(safeParseJson(text), (): unknown => text);
}
