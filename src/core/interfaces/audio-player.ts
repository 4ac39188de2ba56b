import { Context, Effect } from "effect";
import type { PlaybackError } from "../types/errors";

/**
 * Plays named sounds from the configured sound directory
 */
export interface AudioPlayer {
  /** Absolute path a sound identifier resolves to. */
  readonly resolvePath: (soundId: string) => string;
  /** Whether the sound file exists and can be read. */
  readonly isAvailable: (soundId: string) => Effect.Effect<boolean, never>;
  /** Play a sound, completing only once playback has finished. */
  readonly play: (soundId: string) => Effect.Effect<void, PlaybackError>;
}

export const AudioPlayerTag = Context.GenericTag<AudioPlayer>("AudioPlayer");
