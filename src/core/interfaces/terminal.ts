import { Context, Effect } from "effect";

/**
 * Operator-facing console: status lines for the editor and the playout loop,
 * and the prompts the editor and CLI commands read from.
 */
export interface TerminalService {
  /** Status line, e.g. where sounds are read from. */
  readonly info: (message: string) => Effect.Effect<void, never>;
  /** An edit was applied. */
  readonly success: (message: string) => Effect.Effect<void, never>;
  /** Rejected input or a failed playback. */
  readonly error: (message: string) => Effect.Effect<void, never>;
  readonly warn: (message: string) => Effect.Effect<void, never>;
  /** Unstyled line, used for the rule table. */
  readonly log: (message: string) => Effect.Effect<void, never>;
  readonly heading: (message: string) => Effect.Effect<void, never>;
  /** Bulleted lines, one per item. */
  readonly list: (items: readonly string[]) => Effect.Effect<void, never>;

  /**
   * Read one line. Interrupting the calling fiber closes the prompt.
   */
  readonly ask: (
    message: string,
    options?: {
      defaultValue?: string;
    },
  ) => Effect.Effect<string, never>;

  readonly select: <T extends string>(
    message: string,
    options: {
      choices: readonly T[];
      default?: T;
    },
  ) => Effect.Effect<T, never>;

  readonly confirm: (message: string, defaultValue?: boolean) => Effect.Effect<boolean, never>;
}

export const TerminalServiceTag = Context.GenericTag<TerminalService>("TerminalService");
