import { NonEmpty, Option, none, some } from "./data";
import { adapt, many1, optional, sequence } from "./combinators";
import { Grammar, satisfy, symbol } from "./grammar";
import { Sequence } from "./sequence";
import { Transform, compose, iso, joined1, prism } from "./transform";
import { GrammarError } from "./util";

/**
 * Conversion between an integral type and its decimal numeral. `show` is
 * total; `read` rejects numerals the type cannot hold.
 */
export interface Integral<N> {
  show(value: N): string;
  read(numeral: string): Option<N>;
}

const numeralPattern = /^-?[0-9]+$/;

function readBigInt(numeral: string): Option<bigint> {
  if (!numeralPattern.test(numeral)) return none;
  return some(BigInt(numeral));
}

export const bigInteger: Integral<bigint> = {
  show: (value) => value.toString(),
  read: readBigInt,
};

export const natural: Integral<bigint> = {
  show: (value) => value.toString(),
  read: (numeral) => {
    const result = readBigInt(numeral);
    if (result.type === "some" && result.value < BigInt(0)) return none;
    return result;
  },
};

// numbers within `[min, max]`, for fixed-width ranges; both limits must be
// safe integers
export function bounded(min: number, max: number): Integral<number> {
  if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
    throw new GrammarError(`bounds ${min}..${max} are not safe integers`);
  }
  const low = BigInt(min);
  const high = BigInt(max);
  return {
    show: (value) => String(value),
    read: (numeral) => {
      const result = readBigInt(numeral);
      if (result.type === "none") return result;
      if (result.value < low || result.value > high) return none;
      return some(Number(result.value));
    },
  };
}

export const safeInteger = bounded(
  Number.MIN_SAFE_INTEGER,
  Number.MAX_SAFE_INTEGER
);
export const int8 = bounded(-0x80, 0x7f);
export const int16 = bounded(-0x8000, 0x7fff);
export const int32 = bounded(-0x80000000, 0x7fffffff);
export const uint8 = bounded(0, 0xff);
export const uint16 = bounded(0, 0xffff);
export const uint32 = bounded(0, 0xffffffff);

export const isDigit = (ch: string): boolean =>
  ch.length === 1 && ch >= "0" && ch <= "9";

const signedNumeral: Transform<[Option<string>, NonEmpty<string>], string> =
  iso(
    ([sign, digits]: [Option<string>, NonEmpty<string>]): string =>
      (sign.type === "some" ? sign.value : "") + digits.join(""),
    (numeral: string): [Option<string>, NonEmpty<string>] =>
      numeral.startsWith("-")
        ? [some("-"), joined1.to(numeral.slice(1))]
        : [none, joined1.to(numeral)]
  );

const shown = <N>(integral: Integral<N>): Transform<string, N> =>
  prism(integral.show, integral.read);

/**
 * An optionally negative decimal integer. Leading zeros are accepted when
 * reading and never written.
 *
 * @example
 * parse(integer(text, safeInteger), "-42;") // some(-42)
 */
export function integer<S, N>(
  seq: Sequence<S, string>,
  integral: Integral<N>
): Grammar<S, N> {
  const numeral = sequence(
    optional(symbol(seq, "-")),
    many1(satisfy(seq, isDigit))
  );
  return adapt(compose(shown(integral), signedNumeral), numeral);
}
