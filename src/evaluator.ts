import { Option, none, some } from "./data";
import { discardRight } from "./combinators";
import { Grammar, eof } from "./grammar";
import { Sequence } from "./sequence";

/**
 * Run a grammar as a parser. Any input left over after the match is
 * discarded; use `parseAll` when the whole input must be consumed.
 */
export function parse<S, T>(grammar: Grammar<S, T>, input: S): Option<T> {
  const result = grammar.match(input);
  return result.type === "value" ? some(result.value) : none;
}

export function parseAll<S, E, T>(
  seq: Sequence<S, E>,
  grammar: Grammar<S, T>,
  input: S
): Option<T> {
  return parse(discardRight(grammar, eof(seq)), input);
}

/**
 * Run a grammar as a printer, writing onto the empty sequence.
 */
export function print<S, E, T>(
  seq: Sequence<S, E>,
  grammar: Grammar<S, T>,
  value: T
): S {
  return grammar.construct(value, seq.empty());
}
