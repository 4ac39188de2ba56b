import { Data } from "effect";

/**
 * Tagged error types for the carillon scheduler
 * Using Effect's Data.TaggedError so recovery can branch on `_tag`
 */

// Editor input errors
export class ValidationError extends Data.TaggedError("ValidationError")<{
  readonly field: string;
  readonly message: string;
  readonly value?: unknown;
  readonly suggestion?: string;
}> {}

// Rule store errors
export class RuleNotFoundError extends Data.TaggedError("RuleNotFoundError")<{
  readonly position: number;
  readonly length: number;
  readonly suggestion?: string;
}> {}

// Playback errors
export class PlaybackError extends Data.TaggedError("PlaybackError")<{
  readonly soundId: string;
  readonly path: string;
  readonly reason: "missing" | "failed" | "timeout" | "unexpected";
  readonly detail?: string;
  readonly suggestion?: string;
}> {}

// Configuration Errors
export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly field: string;
  readonly message: string;
  readonly value?: unknown;
  readonly suggestion?: string;
}> {}

export class ConfigurationValidationError extends Data.TaggedError("ConfigurationValidationError")<{
  readonly field: string;
  readonly expected: string;
  readonly actual: unknown;
  readonly suggestion?: string;
}> {}

// Storage Errors
export class StorageError extends Data.TaggedError("StorageError")<{
  readonly operation: string;
  readonly path: string;
  readonly reason: string;
  readonly suggestion?: string;
}> {}

export type CarillonError =
  | ValidationError
  | RuleNotFoundError
  | PlaybackError
  | ConfigurationError
  | ConfigurationValidationError
  | StorageError;
