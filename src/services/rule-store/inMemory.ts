import { Effect, Either, Ref } from "effect";
import type { RuleStore, UpsertResult } from "@/core/interfaces/rule-store";
import { RuleNotFoundError } from "@/core/types/errors";
import type { Rule } from "@/core/types/index";

/**
 * Called with the new table after every successful mutation, while the lock is still held.
 */
export type RuleTableListener = (rules: readonly Rule[]) => Effect.Effect<void, never>;

const noChangeListener: RuleTableListener = () => Effect.void;

function notFound(position: number, length: number): RuleNotFoundError {
  return new RuleNotFoundError({
    position,
    length,
    suggestion:
      length === 0
        ? "The schedule is empty. Press enter to show it."
        : `Choose a line between 1 and ${length}.`,
  });
}

/**
 * Rule table held in a Ref
 *
 * The array inside the Ref is frozen and replaced on every mutation, so a
 * snapshot handed out earlier never changes underneath its reader. A
 * single-permit semaphore orders readers and writers.
 */
export class InMemoryRuleStore implements RuleStore {
  constructor(
    private readonly rules: Ref.Ref<readonly Rule[]>,
    private readonly lock: Effect.Semaphore,
    private readonly onChange: RuleTableListener = noChangeListener,
  ) {}

  private locked<A, E>(effect: Effect.Effect<A, E>): Effect.Effect<A, E> {
    return this.lock.withPermits(1)(effect);
  }

  private mutate<A, E>(
    f: (current: readonly Rule[]) => Either.Either<readonly [A, readonly Rule[]], E>,
  ): Effect.Effect<A, E> {
    return this.locked(
      Effect.gen(this, function* () {
        const current = yield* Ref.get(this.rules);
        const result = f(current);
        if (Either.isLeft(result)) {
          return yield* Effect.fail(result.left);
        }
        const [value, next] = result.right;
        const frozen = Object.freeze([...next]);
        yield* Ref.set(this.rules, frozen);
        yield* this.onChange(frozen);
        return value;
      }),
    );
  }

  snapshot(): Effect.Effect<readonly Rule[], never> {
    return this.locked(Ref.get(this.rules));
  }

  upsertAt(position: number, rule: Rule): Effect.Effect<UpsertResult, never> {
    if (!Number.isInteger(position) || position < 1) {
      return Effect.dieMessage(`Rule position must be a positive integer, got ${position}`);
    }
    return this.mutate<UpsertResult, never>((current) => {
      if (position > current.length) {
        const result: UpsertResult = { position: current.length + 1, action: "inserted" };
        return Either.right([result, [...current, rule]] as const);
      }
      const next = current.map((existing, index) => (index === position - 1 ? rule : existing));
      const result: UpsertResult = { position, action: "replaced" };
      return Either.right([result, next] as const);
    });
  }

  deleteAt(position: number): Effect.Effect<Rule, RuleNotFoundError> {
    return this.mutate<Rule, RuleNotFoundError>((current) => {
      const removed = Number.isInteger(position) ? current[position - 1] : undefined;
      if (position < 1 || removed === undefined) {
        return Either.left(notFound(position, current.length));
      }
      const next = current.filter((_, index) => index !== position - 1);
      return Either.right([removed, next] as const);
    });
  }

  deleteRule(rule: Rule, lastKnownPosition: number): Effect.Effect<number, RuleNotFoundError> {
    return this.mutate<number, RuleNotFoundError>((current) => {
      // Identity, not equality: an identical rule the operator added must survive.
      const index =
        current[lastKnownPosition - 1] === rule ? lastKnownPosition - 1 : current.indexOf(rule);
      if (index === -1) {
        return Either.left(notFound(lastKnownPosition, current.length));
      }
      const next = current.filter((_, i) => i !== index);
      return Either.right([index + 1, next] as const);
    });
  }

  len(): Effect.Effect<number, never> {
    return this.locked(Effect.map(Ref.get(this.rules), (rules) => rules.length));
  }

  replaceAll(rules: readonly Rule[]): Effect.Effect<void, never> {
    return this.mutate<void, never>(() => Either.right([undefined, rules] as const));
  }
}

export function makeInMemoryRuleStore(
  initial: readonly Rule[] = [],
  onChange?: RuleTableListener,
): Effect.Effect<InMemoryRuleStore, never> {
  return Effect.gen(function* () {
    const rules = yield* Ref.make<readonly Rule[]>(Object.freeze([...initial]));
    const lock = yield* Effect.makeSemaphore(1);
    return new InMemoryRuleStore(rules, lock, onChange);
  });
}
