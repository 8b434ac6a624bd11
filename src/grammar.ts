import { Unit, unit } from "./data";
import { Sequence } from "./sequence";

export type MatchOutput<S, A> =
  | {
      type: "value";
      value: A;
      rest: S;
    }
  | {
      type: "error";
      rest: S;
    };

export function ok<S, A>(value: A, rest: S): MatchOutput<S, A> {
  return { type: "value", value, rest };
}

export function fail<S, A = never>(rest: S): MatchOutput<S, A> {
  return { type: "error", rest };
}

/**
 * A grammar over sequences `S` producing values `A`. `match` reads a value
 * off the front of a sequence; `construct` writes one onto the front.
 *
 * A grammar is lawful when the two directions agree:
 * - if `match(s)` yields `a` with remainder `s2`, then `construct(a, s2)` is `s`
 * - `match(construct(a, s2))` yields `a` with remainder `s2`
 */
export interface Grammar<S, A> {
  construct(value: A, rest: S): S;
  match(input: S): MatchOutput<S, A>;
}

// matches one element
export class Element<S, E> implements Grammar<S, E> {
  constructor(private readonly seq: Sequence<S, E>) {}
  construct(value: E, rest: S): S {
    return this.seq.cons(value, rest);
  }
  match(input: S): MatchOutput<S, E> {
    const split = this.seq.uncons(input);
    if (!split) return fail(input);
    return ok(split[0], split[1]);
  }
}

// matches one element that passes `predicate`. construct trusts its caller
// and writes the value without checking it.
export class Satisfy<S, E> implements Grammar<S, E> {
  constructor(
    private readonly seq: Sequence<S, E>,
    private readonly predicate: (element: E) => boolean
  ) {}
  construct(value: E, rest: S): S {
    return this.seq.cons(value, rest);
  }
  match(input: S): MatchOutput<S, E> {
    const split = this.seq.uncons(input);
    if (!split || !this.predicate(split[0])) return fail(input);
    return ok(split[0], split[1]);
  }
}

export class Literal<S, E> implements Grammar<S, Unit> {
  constructor(
    private readonly seq: Sequence<S, E>,
    private readonly expected: E,
    private readonly equals: (left: E, right: E) => boolean
  ) {}
  construct(_value: Unit, rest: S): S {
    return this.seq.cons(this.expected, rest);
  }
  match(input: S): MatchOutput<S, Unit> {
    const split = this.seq.uncons(input);
    if (!split || !this.equals(split[0], this.expected)) return fail(input);
    return ok(unit, split[1]);
  }
}

// matches zero elements, at the end of input only
export class Eof<S, E> implements Grammar<S, Unit> {
  constructor(private readonly seq: Sequence<S, E>) {}
  construct(_value: Unit, rest: S): S {
    return rest;
  }
  match(input: S): MatchOutput<S, Unit> {
    if (this.seq.uncons(input)) return fail(input);
    return ok(unit, input);
  }
}

export const element = <S, E>(seq: Sequence<S, E>): Grammar<S, E> =>
  new Element(seq);

export const satisfy = <S, E>(
  seq: Sequence<S, E>,
  predicate: (element: E) => boolean
): Grammar<S, E> => new Satisfy(seq, predicate);

export const symbol = <S, E>(
  seq: Sequence<S, E>,
  expected: E,
  equals: (left: E, right: E) => boolean = Object.is
): Grammar<S, E> => new Satisfy(seq, (x) => equals(x, expected));

export const literal = <S, E>(
  seq: Sequence<S, E>,
  expected: E,
  equals: (left: E, right: E) => boolean = Object.is
): Grammar<S, Unit> => new Literal(seq, expected, equals);

export const eof = <S, E>(seq: Sequence<S, E>): Grammar<S, Unit> =>
  new Eof(seq);

export type Primitives<S, E> = {
  element: Grammar<S, E>;
  satisfy: (predicate: (element: E) => boolean) => Grammar<S, E>;
  symbol: (expected: E) => Grammar<S, E>;
  literal: (expected: E) => Grammar<S, Unit>;
  eof: Grammar<S, Unit>;
};

/**
 * The primitive grammars for one kind of sequence, e.g.
 * `const { satisfy, literal, eof } = primitives(text)`.
 */
export function primitives<S, E>(
  seq: Sequence<S, E>,
  equals: (left: E, right: E) => boolean = Object.is
): Primitives<S, E> {
  return {
    element: element(seq),
    satisfy: (predicate) => satisfy(seq, predicate),
    symbol: (expected) => symbol(seq, expected, equals),
    literal: (expected) => literal(seq, expected, equals),
    eof: eof(seq),
  };
}
