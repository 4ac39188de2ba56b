#!/usr/bin/env node
import { NodeFileSystem } from "@effect/platform-node";
import { Command } from "commander";
import { Cause, Effect, Exit, Fiber, Layer, Option } from "effect";
import packageJson from "../package.json";
import { getConfigCommand, listConfigCommand, setConfigCommand } from "./cli/commands/config";
import { listRulesCommand, resetRulesCommand } from "./cli/commands/rules";
import { runSchedulerCommand } from "./cli/commands/run";
import { checkSoundsCommand } from "./cli/commands/sounds";
import { TerminalServiceTag } from "./core/interfaces/terminal";
import type { CarillonError } from "./core/types/errors";
import { handleError } from "./core/utils/error-handler";
import { createAudioPlayerLayer } from "./services/audio-player";
import { createConfigLayer } from "./services/config";
import { createLoggerLayer } from "./services/logger";
import { createRuleStoreLayer } from "./services/rule-store/file";
import { createTerminalServiceLayer, TerminalServiceImpl } from "./services/terminal";

/**
 * Main entry point for the carillon CLI
 */

/**
 * Create the application layer with all required services
 *
 * Composes file system, configuration, logging, terminal, rule store and
 * audio player layers.
 */
function createAppLayer(debug?: boolean, configPath?: string) {
  const fileSystemLayer = NodeFileSystem.layer;
  const configLayer = createConfigLayer(debug, configPath).pipe(Layer.provide(fileSystemLayer));
  const loggerLayer = createLoggerLayer().pipe(Layer.provide(configLayer));
  const terminalLayer = createTerminalServiceLayer();
  const ruleStoreLayer = createRuleStoreLayer().pipe(
    Layer.provide(fileSystemLayer),
    Layer.provide(configLayer),
    Layer.provide(loggerLayer),
  );
  const audioPlayerLayer = createAudioPlayerLayer().pipe(
    Layer.provide(fileSystemLayer),
    Layer.provide(configLayer),
    Layer.provide(loggerLayer),
  );

  return Layer.mergeAll(
    fileSystemLayer,
    configLayer,
    loggerLayer,
    terminalLayer,
    ruleStoreLayer,
    audioPlayerLayer,
  );
}

type AppServices = Layer.Layer.Success<ReturnType<typeof createAppLayer>>;

interface GlobalOptions {
  readonly debug?: boolean;
  readonly config?: string;
}

/**
 * Run a CLI effect with graceful shutdown handling for termination signals.
 *
 * Ctrl+C / SIGTERM interrupt the command fiber so finalizers run and any
 * player process is killed before the process exits.
 */
function runCliEffect<E extends CarillonError>(
  effect: Effect.Effect<void, E, AppServices>,
  options: GlobalOptions,
): void {
  const program = effect.pipe(Effect.provide(createAppLayer(options.debug, options.config)));

  const managedEffect = Effect.scoped(
    Effect.gen(function* () {
      const fiber = yield* Effect.fork(program);

      let signalCount = 0;
      type SignalName = "SIGINT" | "SIGTERM";
      function handler(signal: SignalName): void {
        signalCount += 1;
        const label = signal === "SIGINT" ? "Ctrl+C" : signal;
        if (signalCount === 1) {
          process.stdout.write(`\nReceived ${label}. Stopping the schedule...\n`);
          Effect.runFork(Fiber.interrupt(fiber));
        } else {
          process.stdout.write("\nForce exiting immediately.\n");
          process.exit(1);
        }
      }

      yield* Effect.acquireRelease(
        Effect.sync(() => {
          process.on("SIGINT", handler);
          process.on("SIGTERM", handler);
        }),
        () =>
          Effect.sync(() => {
            process.off("SIGINT", handler);
            process.off("SIGTERM", handler);
          }),
      );

      const exit = yield* Fiber.await(fiber);
      if (Exit.isFailure(exit)) {
        if (Exit.isInterrupted(exit)) {
          return;
        }
        process.exitCode = 1;
        const maybeError = Cause.failureOption(exit.cause);
        if (Option.isSome(maybeError)) {
          yield* handleError(maybeError.value);
          return;
        }
        const defect = Cause.squash(exit.cause);
        yield* handleError(defect instanceof Error ? defect : new Error(Cause.pretty(exit.cause)));
      }
    }),
  ).pipe(Effect.provideService(TerminalServiceTag, new TerminalServiceImpl()));

  Effect.runFork(managedEffect);
}

/**
 * Main CLI application entry point
 *
 * Sets up the commander program:
 * - run (scheduler with the rule editor, or headless)
 * - rules list / reset
 * - sounds check
 * - config show / get / set
 */
function main(): Effect.Effect<void, never> {
  return Effect.sync(() => {
    const program = new Command();

    program
      .name("carillon")
      .description("Play carillon chimes, tolls and hourly strikes from an editable schedule")
      .version(packageJson.version);

    // Global options
    program
      .option("--debug", "Enable debug level logging")
      .option("--config <path>", "Path to configuration file");

    const globalOptions = (): GlobalOptions => {
      const opts = program.opts<{ debug?: boolean; config?: string }>();
      return {
        debug: Boolean(opts.debug),
        ...(opts.config !== undefined ? { config: opts.config } : {}),
      };
    };

    program
      .command("run", { isDefault: true })
      .description("Start the scheduler and the rule editor")
      .option("--headless", "Play the schedule without the editor")
      .action((options: { headless?: boolean }) => {
        runCliEffect(runSchedulerCommand({ headless: Boolean(options.headless) }), globalOptions());
      });

    // Rule commands
    const rulesCommand = program.command("rules").description("Inspect the rule table");

    rulesCommand
      .command("list")
      .alias("ls")
      .description("Show the numbered rule table")
      .action(() => {
        runCliEffect(listRulesCommand(), globalOptions());
      });

    rulesCommand
      .command("reset")
      .description("Replace the rule table with the default schedule")
      .option("-y, --yes", "Do not ask for confirmation")
      .action((options: { yes?: boolean }) => {
        runCliEffect(resetRulesCommand({ yes: Boolean(options.yes) }), globalOptions());
      });

    // Sound commands
    const soundsCommand = program.command("sounds").description("Inspect the sound directory");

    soundsCommand
      .command("check")
      .description("Check that every scheduled sound is present")
      .action(() => {
        runCliEffect(
          checkSoundsCommand().pipe(
            Effect.tap((missing) =>
              Effect.sync(() => {
                if (missing.length > 0) process.exitCode = 1;
              }),
            ),
            Effect.asVoid,
          ),
          globalOptions(),
        );
      });

    // Config commands
    const configCommand = program.command("config").description("Manage configuration");

    configCommand
      .command("show")
      .alias("list")
      .description("Show all configuration values")
      .action(() => {
        runCliEffect(listConfigCommand(), globalOptions());
      });

    configCommand
      .command("get <key>")
      .description("Get a configuration value")
      .action((key: string) => {
        runCliEffect(getConfigCommand(key), globalOptions());
      });

    configCommand
      .command("set <key> [value]")
      .description("Set a configuration value")
      .action((key: string, value?: string) => {
        runCliEffect(setConfigCommand(key, value), globalOptions());
      });

    program.parse();
  });
}

Effect.runPromise(main()).catch((error: unknown) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
