import { Effect } from "effect";
import { TerminalServiceTag, type TerminalService } from "../interfaces/terminal";
import type { CarillonError } from "../types/errors";

/**
 * Error display with actionable suggestions
 */

export interface ErrorDisplay {
  readonly title: string;
  readonly message: string;
  readonly suggestion?: string;
  readonly recovery?: readonly string[];
  readonly relatedCommands?: readonly string[];
}

const CARILLON_ERROR_TAGS: ReadonlySet<string> = new Set<CarillonError["_tag"]>([
  "ValidationError",
  "RuleNotFoundError",
  "PlaybackError",
  "ConfigurationError",
  "ConfigurationValidationError",
  "StorageError",
]);

export function isCarillonError(error: CarillonError | Error): error is CarillonError {
  return "_tag" in error && typeof error._tag === "string" && CARILLON_ERROR_TAGS.has(error._tag);
}

function describeValue(value: unknown): string {
  if (value === undefined) return "undefined";
  if (typeof value === "string") return `"${value}"`;
  return JSON.stringify(value) ?? String(value);
}

/**
 * Generate actionable suggestions for different error types
 *
 * @internal
 */
function generateSuggestions(error: CarillonError): ErrorDisplay {
  switch (error._tag) {
    case "ValidationError": {
      return {
        title: "Validation Error",
        message: `Field "${error.field}" validation failed: ${error.message}`,
        suggestion: error.suggestion || "Type ? and press enter for the input format",
        recovery: [
          "Separate items with a single space",
          "Days are mm/dd/yy or su, mo, tu, we, th, fr, sa",
          "Hours are 0-23, minutes are 0-59",
        ],
        relatedCommands: ["carillon rules list"],
      };
    }

    case "RuleNotFoundError": {
      return {
        title: "Rule Not Found",
        message: `No line ${error.position} to delete (the schedule has ${error.length} ${error.length === 1 ? "line" : "lines"})`,
        suggestion: error.suggestion || "Check the line number against the current schedule",
        relatedCommands: ["carillon rules list"],
      };
    }

    case "PlaybackError": {
      const message =
        error.reason === "missing"
          ? `Sound "${error.soundId}" not found at ${error.path}`
          : `Sound "${error.soundId}" could not be played${error.detail ? `: ${error.detail}` : ""}`;
      return {
        title: "Playback Failed",
        message,
        suggestion:
          error.suggestion ||
          (error.reason === "missing"
            ? "Sound names are case sensitive; check the spelling"
            : "Check the audio player command in your configuration"),
        recovery: [
          "Check the sound directory: `carillon sounds check`",
          "Set another player: `carillon config set audio.command <command>`",
        ],
        relatedCommands: ["carillon sounds check", "carillon config get sounds"],
      };
    }

    case "ConfigurationError": {
      return {
        title: "Configuration Error",
        message: `Configuration error in field "${error.field}": ${error.message}`,
        suggestion: error.suggestion || "Fix the configuration value",
        recovery: [
          "Show the effective configuration: `carillon config show`",
          "Point at another file: `carillon --config <path>`",
        ],
        relatedCommands: ["carillon config show", "carillon config set"],
      };
    }

    case "ConfigurationValidationError": {
      return {
        title: "Invalid Configuration Value",
        message: `Field "${error.field}" is invalid: ${error.expected} (got ${describeValue(error.actual)})`,
        suggestion:
          error.suggestion ||
          `Run 'carillon config get ${error.field}' to check the current value`,
        relatedCommands: ["carillon config show", "carillon config get"],
      };
    }

    case "StorageError": {
      return {
        title: "Storage Error",
        message: `Storage ${error.operation} failed for ${error.path}: ${error.reason}`,
        suggestion: error.suggestion || "Check that the data directory exists and is writable",
        recovery: [
          `Check file permissions for ${error.path}`,
          "Change the data directory: `carillon config set storage.path <dir>`",
        ],
        relatedCommands: ["carillon config get storage"],
      };
    }
  }
}

/**
 * Format an error for display with suggestions, recovery steps and related commands
 */
export function formatError(error: CarillonError): string {
  const display = generateSuggestions(error);

  let output = `❌ ${display.title}\n`;
  output += `   ${display.message}\n`;

  if (display.suggestion) {
    output += `\n💡 Suggestion: ${display.suggestion}\n`;
  }

  if (display.recovery && display.recovery.length > 0) {
    output += `\n🔧 Recovery Steps:\n`;
    display.recovery.forEach((step, index) => {
      output += `   ${index + 1}. ${step}\n`;
    });
  }

  if (display.relatedCommands && display.relatedCommands.length > 0) {
    output += `\n📚 Related Commands:\n`;
    display.relatedCommands.forEach((cmd) => {
      output += `   • ${cmd}\n`;
    });
  }

  return output;
}

/**
 * Print a structured error with its suggestions, or a generic error with
 * general guidance. Ctrl+C during a prompt exits quietly.
 *
 * @example
 * ```typescript
 * yield* handleError(new RuleNotFoundError({ position: 7, length: 5 }));
 * ```
 */
export function handleError(
  error: CarillonError | Error,
): Effect.Effect<void, never, TerminalService> {
  return Effect.gen(function* () {
    const terminal = yield* TerminalServiceTag;

    // Handle ExitPromptError from inquirer (Ctrl+C during prompts)
    if (
      error instanceof Error &&
      (error.name === "ExitPromptError" || error.message.includes("SIGINT"))
    ) {
      yield* terminal.log("\n👋 Goodbye!");
      return;
    }

    if (isCarillonError(error)) {
      console.error(formatError(error));
    } else {
      console.error(
        `❌ Error\n   ${error.message}\n\n💡 Suggestion: Check the error details and try again\n\n📚 Related Commands:\n   • carillon --help`,
      );
    }
  });
}
