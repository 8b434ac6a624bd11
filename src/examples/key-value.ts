import { Either, left, right } from "../data";
import {
  adapt,
  choice,
  discardRight,
  many,
  many1,
  sequence,
} from "../combinators";
import { Grammar, primitives } from "../grammar";
import { integer, safeInteger } from "../numeric";
import { text } from "../sequence";
import { iso, joined1 } from "../transform";

/*
 * A line-oriented settings format that reads and writes the same text:
 *
 *   name=server
 *   port=8080
 *   offset=-3
 *
 * Keys and word values are ASCII letters, numbers are signed integers.
 * Printing a word that isn't all letters writes it anyway and the result
 * will not read back.
 */

export type Setting = number | string;
export type Settings = Array<[string, Setting]>;

const { satisfy, literal } = primitives(text);

const isLetter = (ch: string) => /^[A-Za-z]$/.test(ch);

export const word: Grammar<string, string> = adapt(
  joined1,
  many1(satisfy(isLetter))
);

const setting: Grammar<string, Setting> = adapt(
  iso(
    (value: Either<number, string>): Setting => value.value,
    (value: Setting): Either<number, string> =>
      typeof value === "number" ? left(value) : right(value)
  ),
  choice(integer(text, safeInteger), word)
);

const line: Grammar<string, [string, Setting]> = discardRight(
  sequence(discardRight(word, literal("=")), setting),
  literal("\n")
);

export const settings: Grammar<string, Settings> = many(line);
