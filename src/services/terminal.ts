import { confirm as confirmPrompt, input, select as selectPrompt } from "@inquirer/prompts";
import chalk from "chalk";
import { Effect, Layer } from "effect";
import { TerminalServiceTag, type TerminalService } from "../core/interfaces/terminal";

/**
 * Terminal output service implementation for consistent CLI styling
 *
 * Provides a unified interface for terminal output with automatic
 * emoji prefixes, color coding, and formatting.
 */
export class TerminalServiceImpl implements TerminalService {
  info(message: string): Effect.Effect<void, never> {
    return Effect.sync(() => {
      console.log(chalk.cyan("🔔") + "  " + message);
    });
  }

  success(message: string): Effect.Effect<void, never> {
    return Effect.sync(() => {
      console.log(chalk.green("✅") + "  " + message);
    });
  }

  error(message: string): Effect.Effect<void, never> {
    return Effect.sync(() => {
      console.log(chalk.red("❌") + "  " + message);
    });
  }

  warn(message: string): Effect.Effect<void, never> {
    return Effect.sync(() => {
      console.log(chalk.yellow("⚠️") + "  " + message);
    });
  }

  log(message: string): Effect.Effect<void, never> {
    return Effect.sync(() => {
      console.log(message);
    });
  }

  heading(message: string): Effect.Effect<void, never> {
    return Effect.sync(() => {
      console.log();
      console.log(chalk.bold.cyan(message));
      console.log();
    });
  }

  list(items: readonly string[]): Effect.Effect<void, never> {
    return Effect.sync(() => {
      for (const item of items) {
        console.log("   • " + item);
      }
    });
  }

  ask(
    message: string,
    options?: {
      defaultValue?: string;
    },
  ): Effect.Effect<string, never> {
    // The signal closes the prompt when the fiber is interrupted
    return Effect.promise(async (signal) => {
      const answer = await input(
        {
          message,
          ...(options?.defaultValue !== undefined ? { default: options.defaultValue } : {}),
        },
        { signal },
      );
      return answer;
    });
  }

  select<T extends string>(
    message: string,
    options: {
      choices: readonly T[];
      default?: T;
    },
  ): Effect.Effect<T, never> {
    return Effect.promise(async (signal) => {
      const answer = await selectPrompt<T>(
        {
          message,
          choices: options.choices.map((choice) => ({ name: choice, value: choice })),
          ...(options.default !== undefined ? { default: options.default } : {}),
        },
        { signal },
      );
      return answer;
    });
  }

  confirm(message: string, defaultValue: boolean = false): Effect.Effect<boolean, never> {
    return Effect.promise(async (signal) => {
      const answer = await confirmPrompt(
        {
          message,
          default: defaultValue,
        },
        { signal },
      );
      return answer;
    });
  }
}

/**
 * Create the terminal service layer
 */
export function createTerminalServiceLayer(): Layer.Layer<TerminalService, never, never> {
  return Layer.succeed(TerminalServiceTag, new TerminalServiceImpl());
}
