import { Context, Effect } from "effect";
import type { RuleNotFoundError } from "../types/errors";
import type { Rule } from "../types/rule";

export interface UpsertResult {
  /** 1-based position the rule now occupies */
  readonly position: number;
  readonly action: "inserted" | "replaced";
}

/**
 * Rule store interface shared by the editor and the playout loop
 *
 * Holds the ordered rule table addressed by 1-based position. Every
 * operation runs under one lock, so a snapshot never observes a
 * half-applied mutation and mutations land in the order they were issued.
 */
export interface RuleStore {
  /**
   * Point-in-time copy of the rule table in position order
   */
  readonly snapshot: () => Effect.Effect<readonly Rule[], never>;

  /**
   * Replace the rule at `position`, or append when `position` is past the end
   * @param position - 1-based position, at least 1
   */
  readonly upsertAt: (position: number, rule: Rule) => Effect.Effect<UpsertResult, never>;

  /**
   * Delete the rule at `position`
   * @returns The removed rule, or fails with RuleNotFoundError if there is no such line
   */
  readonly deleteAt: (position: number) => Effect.Effect<Rule, RuleNotFoundError>;

  /**
   * Delete this exact rule instance, looking at `lastKnownPosition` first
   * @returns The position it was removed from
   */
  readonly deleteRule: (
    rule: Rule,
    lastKnownPosition: number,
  ) => Effect.Effect<number, RuleNotFoundError>;

  /**
   * Number of rules in the table
   */
  readonly len: () => Effect.Effect<number, never>;

  /**
   * Replace the whole table
   */
  readonly replaceAll: (rules: readonly Rule[]) => Effect.Effect<void, never>;
}

export const RuleStoreTag = Context.GenericTag<RuleStore>("RuleStore");
