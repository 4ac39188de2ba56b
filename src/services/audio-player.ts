import { FileSystem } from "@effect/platform";
import { Effect, Layer } from "effect";
import path from "node:path";
import { AudioPlayerTag, type AudioPlayer } from "../core/interfaces/audio-player";
import { ConfigServiceTag, type ConfigService } from "../core/interfaces/config";
import { LoggerServiceTag, type LoggerService } from "../core/interfaces/logger";
import type { AudioConfig, SoundsConfig } from "../core/types/config";
import { PlaybackError } from "../core/types/errors";
import { execCommand } from "../core/utils/shell-utils";

/**
 * Runs a player command to completion; fails with the command's error output.
 */
export type CommandRunner = (
  command: string,
  args: readonly string[],
) => Effect.Effect<string, Error>;

export interface PlayerCommand {
  readonly command: string;
  readonly args: readonly string[];
}

/**
 * Player used when `audio.command` is not configured.
 */
export function defaultPlayerCommand(platform: NodeJS.Platform = process.platform): PlayerCommand {
  switch (platform) {
    case "darwin":
      return { command: "afplay", args: [] };
    case "win32":
      return { command: "ffplay", args: ["-nodisp", "-autoexit", "-loglevel", "quiet"] };
    default:
      return { command: "mpg123", args: ["-q"] };
  }
}

export function resolvePlayerCommand(audio: AudioConfig): PlayerCommand {
  if (!audio.command) {
    return defaultPlayerCommand();
  }
  return { command: audio.command, args: audio.args ?? [] };
}

/**
 * Plays sound files through an external command-line player
 *
 * A sound identifier is a file name relative to `sounds.basePath`; the
 * configured extension is added when the name does not already end in it.
 */
export class CommandAudioPlayer implements AudioPlayer {
  constructor(
    private readonly sounds: SoundsConfig,
    private readonly player: PlayerCommand,
    private readonly fs: FileSystem.FileSystem,
    private readonly logger: LoggerService,
    private readonly run: CommandRunner = execCommand,
  ) {}

  resolvePath(soundId: string): string {
    const extension = this.sounds.extension;
    const fileName =
      extension.length > 0 && !soundId.toLowerCase().endsWith(extension.toLowerCase())
        ? `${soundId}${extension}`
        : soundId;
    return path.resolve(this.sounds.basePath, fileName);
  }

  isAvailable(soundId: string): Effect.Effect<boolean, never> {
    const filePath = this.resolvePath(soundId);
    return this.fs.access(filePath, { readable: true }).pipe(
      Effect.as(true),
      Effect.catchAll(() => Effect.succeed(false)),
    );
  }

  play(soundId: string): Effect.Effect<void, PlaybackError> {
    return Effect.gen(
      function* (this: CommandAudioPlayer) {
        const filePath = this.resolvePath(soundId);
        const available = yield* this.isAvailable(soundId);
        if (!available) {
          return yield* Effect.fail(
            new PlaybackError({
              soundId,
              path: filePath,
              reason: "missing",
              suggestion: `Check that ${path.basename(filePath)} is in ${this.sounds.basePath}; names are case sensitive`,
            }),
          );
        }

        yield* this.logger.debug("Starting playback", {
          soundId,
          path: filePath,
          command: this.player.command,
        });
        yield* this.run(this.player.command, [...this.player.args, filePath]).pipe(
          Effect.mapError(
            (error) =>
              new PlaybackError({
                soundId,
                path: filePath,
                reason: "failed",
                detail: error.message,
                suggestion: `Check that '${this.player.command}' is installed, or set audio.command`,
              }),
          ),
        );
      }.bind(this),
    );
  }
}

export function createAudioPlayerLayer(): Layer.Layer<
  AudioPlayer,
  never,
  FileSystem.FileSystem | ConfigService | LoggerService
> {
  return Layer.effect(
    AudioPlayerTag,
    Effect.gen(function* () {
      const fs = yield* FileSystem.FileSystem;
      const config = yield* ConfigServiceTag;
      const logger = yield* LoggerServiceTag;
      const appConfig = yield* config.appConfig;
      return new CommandAudioPlayer(
        appConfig.sounds,
        resolvePlayerCommand(appConfig.audio),
        fs,
        logger,
      );
    }),
  );
}
