import {
  Either,
  NonEmpty,
  Option,
  Unit,
  left,
  none,
  right,
  some,
  unit,
} from "./data";
import { Grammar, MatchOutput, fail, ok } from "./grammar";
import { Transform, iso } from "./transform";
import { GrammarError, assertUnreachable } from "./util";

export class Adapt<S, A, B> implements Grammar<S, B> {
  constructor(
    private readonly transform: Transform<A, B>,
    private readonly grammar: Grammar<S, A>
  ) {}
  construct(value: B, rest: S): S {
    return this.grammar.construct(this.transform.to(value), rest);
  }
  match(input: S): MatchOutput<S, B> {
    const result = this.grammar.match(input);
    if (result.type === "error") return result;
    const converted = this.transform.from(result.value);
    // a rejected conversion keeps what the inner grammar consumed
    if (converted.type === "none") return fail(result.rest);
    return ok(converted.value, result.rest);
  }
}

/**
 * Maps a grammar's values through a transform. Reading runs `from` on the
 * matched value; a rejection fails with the remainder after the inner match,
 * not with the original input.
 */
export const adapt = <S, A, B>(
  transform: Transform<A, B>,
  grammar: Grammar<S, A>
): Grammar<S, B> => new Adapt(transform, grammar);

// matches left then right; a failure on the right is not rolled back
export class Seq<S, L, R> implements Grammar<S, [L, R]> {
  constructor(
    private readonly left: Grammar<S, L>,
    private readonly right: Grammar<S, R>
  ) {}
  construct([l, r]: [L, R], rest: S): S {
    return this.left.construct(l, this.right.construct(r, rest));
  }
  match(input: S): MatchOutput<S, [L, R]> {
    const leftResult = this.left.match(input);
    if (leftResult.type === "error") return leftResult;
    const rightResult = this.right.match(leftResult.rest);
    if (rightResult.type === "error") return rightResult;
    return ok([leftResult.value, rightResult.value], rightResult.rest);
  }
}

export const sequence = <S, L, R>(
  left: Grammar<S, L>,
  right: Grammar<S, R>
): Grammar<S, [L, R]> => new Seq(left, right);

export class DiscardLeft<S, T> implements Grammar<S, T> {
  constructor(
    private readonly left: Grammar<S, Unit>,
    private readonly right: Grammar<S, T>
  ) {}
  construct(value: T, rest: S): S {
    return this.left.construct(unit, this.right.construct(value, rest));
  }
  match(input: S): MatchOutput<S, T> {
    const leftResult = this.left.match(input);
    if (leftResult.type === "error") return leftResult;
    return this.right.match(leftResult.rest);
  }
}

export const discardLeft = <S, T>(
  left: Grammar<S, Unit>,
  right: Grammar<S, T>
): Grammar<S, T> => new DiscardLeft(left, right);

export class DiscardRight<S, T> implements Grammar<S, T> {
  constructor(
    private readonly left: Grammar<S, T>,
    private readonly right: Grammar<S, Unit>
  ) {}
  construct(value: T, rest: S): S {
    return this.left.construct(value, this.right.construct(unit, rest));
  }
  match(input: S): MatchOutput<S, T> {
    const leftResult = this.left.match(input);
    if (leftResult.type === "error") return leftResult;
    const rightResult = this.right.match(leftResult.rest);
    if (rightResult.type === "error") return rightResult;
    return ok(leftResult.value, rightResult.rest);
  }
}

export const discardRight = <S, T>(
  left: Grammar<S, T>,
  right: Grammar<S, Unit>
): Grammar<S, T> => new DiscardRight(left, right);

// ordered choice: both alternatives see the same input, first match wins
export class Choice<S, L, R> implements Grammar<S, Either<L, R>> {
  constructor(
    private readonly left: Grammar<S, L>,
    private readonly right: Grammar<S, R>
  ) {}
  construct(value: Either<L, R>, rest: S): S {
    switch (value.type) {
      case "left":
        return this.left.construct(value.value, rest);
      case "right":
        return this.right.construct(value.value, rest);
      // istanbul ignore next
      default:
        assertUnreachable(value);
    }
  }
  match(input: S): MatchOutput<S, Either<L, R>> {
    const leftResult = this.left.match(input);
    if (leftResult.type === "value") {
      return ok(left(leftResult.value), leftResult.rest);
    }
    const rightResult = this.right.match(input);
    if (rightResult.type === "error") return rightResult;
    return ok(right(rightResult.value), rightResult.rest);
  }
}

export const choice = <S, L, R>(
  left: Grammar<S, L>,
  right: Grammar<S, R>
): Grammar<S, Either<L, R>> => new Choice(left, right);

export class Many<S, T> implements Grammar<S, T[]> {
  constructor(private readonly grammar: Grammar<S, T>) {}
  construct(values: T[], rest: S): S {
    for (let i = values.length - 1; i >= 0; i--) {
      rest = this.grammar.construct(values[i], rest);
    }
    return rest;
  }
  match(input: S): MatchOutput<S, T[]> {
    const results: T[] = [];
    let rest = input;
    // eslint-disable-next-line no-constant-condition
    while (true) {
      const result = this.grammar.match(rest);
      if (result.type === "error") break;
      if (Object.is(result.rest, rest)) {
        throw new GrammarError("repeated grammar matched without consuming");
      }
      results.push(result.value);
      rest = result.rest;
    }
    return ok(results, rest);
  }
}

/**
 * Matches `grammar` as many times as possible, zero or more.
 *
 * Every successful match of `grammar` must consume input. A match that
 * hands back the very sequence it was given raises a `GrammarError`; for
 * sequence types that build a fresh value even when nothing was consumed
 * this cannot be detected and the match loops forever.
 */
export const many = <S, T>(grammar: Grammar<S, T>): Grammar<S, T[]> =>
  new Many(grammar);

const nonEmpty = <T>(): Transform<[T, T[]], NonEmpty<T>> =>
  iso(
    ([head, tail]: [T, T[]]): NonEmpty<T> => [head, ...tail],
    ([head, ...tail]: NonEmpty<T>): [T, T[]] => [head, tail]
  );

export const many1 = <S, T>(grammar: Grammar<S, T>): Grammar<S, NonEmpty<T>> =>
  adapt(nonEmpty<T>(), sequence(grammar, many(grammar)));

// reads exactly `count` values; writes at most `count` and never pads
export class Replicate<S, T> implements Grammar<S, T[]> {
  constructor(
    private readonly count: number,
    private readonly grammar: Grammar<S, T>
  ) {
    if (!Number.isSafeInteger(count) || count < 0) {
      throw new GrammarError(`invalid repetition count ${count}`);
    }
  }
  construct(values: T[], rest: S): S {
    const written = values.slice(0, this.count);
    for (let i = written.length - 1; i >= 0; i--) {
      rest = this.grammar.construct(written[i], rest);
    }
    return rest;
  }
  match(input: S): MatchOutput<S, T[]> {
    const results: T[] = [];
    let rest = input;
    for (let i = 0; i < this.count; i++) {
      const result = this.grammar.match(rest);
      if (result.type === "error") return result;
      results.push(result.value);
      rest = result.rest;
    }
    return ok(results, rest);
  }
}

export const replicateN = <S, T>(
  count: number,
  grammar: Grammar<S, T>
): Grammar<S, T[]> => new Replicate(count, grammar);

export class Dependent<S, D, T> implements Grammar<S, T> {
  constructor(
    private readonly determinant: Grammar<S, D>,
    private readonly next: (determinant: D) => Grammar<S, T>,
    private readonly extract: (value: T) => D
  ) {}
  construct(value: T, rest: S): S {
    const determinant = this.extract(value);
    return this.determinant.construct(
      determinant,
      this.next(determinant).construct(value, rest)
    );
  }
  match(input: S): MatchOutput<S, T> {
    const result = this.determinant.match(input);
    if (result.type === "error") return result;
    let next: Grammar<S, T>;
    try {
      next = this.next(result.value);
    } catch (e) {
      // a determinant read from the input that `next` cannot build from
      if (e instanceof GrammarError) return fail(result.rest);
      throw e;
    }
    return next.match(result.rest);
  }
}

/**
 * Reads a determinant with `determinant`, then reads the value with the
 * grammar `next` picks for it. Writing recovers the determinant from the
 * value with `extract`, which must select the same grammar `next` would.
 * A `GrammarError` thrown by `next` while matching fails the match, so a
 * count read from the input that `replicateN` rejects is a parse failure.
 *
 * @example
 * // a digit count followed by that many letters
 * dependent(digit, (n) => replicateN(n, letter), (word) => word.length)
 */
export const dependent = <S, D, T>(
  determinant: Grammar<S, D>,
  next: (determinant: D) => Grammar<S, T>,
  extract: (value: T) => D
): Grammar<S, T> => new Dependent(determinant, next, extract);

export class WithDefault<S, T> implements Grammar<S, T> {
  constructor(
    private readonly defaultValue: T,
    private readonly grammar: Grammar<S, T>,
    private readonly equals: (left: T, right: T) => boolean
  ) {}
  construct(value: T, rest: S): S {
    if (this.equals(value, this.defaultValue)) return rest;
    return this.grammar.construct(value, rest);
  }
  match(input: S): MatchOutput<S, T> {
    const result = this.grammar.match(input);
    if (result.type === "error") return ok(this.defaultValue, input);
    return result;
  }
}

/**
 * Never fails to match: yields `defaultValue` without consuming when
 * `grammar` fails, and writes nothing for a value equal to the default.
 */
export const withDefault = <S, T>(
  defaultValue: T,
  grammar: Grammar<S, T>,
  equals: (left: T, right: T) => boolean = Object.is
): Grammar<S, T> => new WithDefault(defaultValue, grammar, equals);

export class Optional<S, T> implements Grammar<S, Option<T>> {
  constructor(private readonly grammar: Grammar<S, T>) {}
  construct(value: Option<T>, rest: S): S {
    switch (value.type) {
      case "some":
        return this.grammar.construct(value.value, rest);
      case "none":
        return rest;
      // istanbul ignore next
      default:
        assertUnreachable(value);
    }
  }
  match(input: S): MatchOutput<S, Option<T>> {
    const result = this.grammar.match(input);
    if (result.type === "error") return ok(none, input);
    return ok(some(result.value), result.rest);
  }
}

export const optional = <S, T>(grammar: Grammar<S, T>): Grammar<S, Option<T>> =>
  new Optional(grammar);

export const between = <S, T>(
  open: Grammar<S, Unit>,
  close: Grammar<S, Unit>,
  inner: Grammar<S, T>
): Grammar<S, T> => discardRight(discardLeft(open, inner), close);

export const sepBy1 = <S, T>(
  grammar: Grammar<S, T>,
  separator: Grammar<S, Unit>
): Grammar<S, NonEmpty<T>> =>
  adapt(
    nonEmpty<T>(),
    sequence(grammar, many(discardLeft(separator, grammar)))
  );

export const sepBy = <S, T>(
  grammar: Grammar<S, T>,
  separator: Grammar<S, Unit>
): Grammar<S, T[]> =>
  adapt(
    iso(
      (values: Option<NonEmpty<T>>): T[] =>
        values.type === "some" ? values.value : [],
      (values: T[]) =>
        values.length
          ? some<NonEmpty<T>>([values[0], ...values.slice(1)])
          : none
    ),
    optional(sepBy1(grammar, separator))
  );

export class Lazy<S, T> implements Grammar<S, T> {
  private grammar: Grammar<S, T> | null = null;
  constructor(private readonly getGrammar: () => Grammar<S, T>) {}
  private resolve(): Grammar<S, T> {
    if (!this.grammar) {
      const grammar = this.getGrammar();
      if (grammar === this) {
        throw new GrammarError("lazy grammar resolved to itself");
      }
      this.grammar = grammar;
    }
    return this.grammar;
  }
  construct(value: T, rest: S): S {
    return this.resolve().construct(value, rest);
  }
  match(input: S): MatchOutput<S, T> {
    return this.resolve().match(input);
  }
}

/**
 * Defers building a grammar until it is first used, so a grammar can refer
 * to itself:
 *
 * @example
 * const nested: Grammar<string, Tree> = lazy(() =>
 *   between(open, close, many(nested))
 * );
 */
export const lazy = <S, T>(getGrammar: () => Grammar<S, T>): Grammar<S, T> =>
  new Lazy(getGrammar);
