import { none, some } from "./data";
import { parse, print } from "./evaluator";
import { checkLaws } from "./laws";
import {
  bigInteger,
  bounded,
  int8,
  integer,
  natural,
  safeInteger,
  uint8,
} from "./numeric";
import { text } from "./sequence";
import { GrammarError } from "./util";

test("reading integers", () => {
  const g = integer(text, safeInteger);
  expect(parse(g, "01.")).toEqual(some(1));
  expect(parse(g, "-42;")).toEqual(some(-42));
  expect(parse(g, "-0")).toEqual(some(0));
  expect(parse(g, "")).toEqual(none);
  expect(parse(g, "-")).toEqual(none);
  expect(parse(g, "+1")).toEqual(none);
});

test("printing integers", () => {
  const g = integer(text, safeInteger);
  expect(print(text, g, 42)).toEqual("42");
  expect(print(text, g, -42)).toEqual("-42");
  expect(print(text, g, 0)).toEqual("0");
});

test("numerals outside the target type are rejected", () => {
  expect(parse(integer(text, natural), "-1")).toEqual(none);
  expect(parse(integer(text, natural), "0")).toEqual(some(BigInt(0)));
  expect(parse(integer(text, uint8), "255")).toEqual(some(255));
  expect(parse(integer(text, uint8), "256")).toEqual(none);
  expect(parse(integer(text, int8), "-128")).toEqual(some(-128));
  expect(parse(integer(text, int8), "-129")).toEqual(none);
  expect(parse(integer(text, bounded(10, 20)), "9")).toEqual(none);
});

test("a rejected numeral keeps its digits consumed", () => {
  const g = integer(text, uint8);
  expect(g.match("256;")).toEqual({ type: "error", rest: ";" });
  expect(g.match("-x")).toEqual({ type: "error", rest: "x" });
});

test("bigInteger has no bounds", () => {
  const g = integer(text, bigInteger);
  const big = BigInt("-123456789012345678901234567890");
  expect(parse(g, "-123456789012345678901234567890")).toEqual(some(big));
  expect(print(text, g, big)).toEqual("-123456789012345678901234567890");
});

test("integer laws", () => {
  expect(
    checkLaws(integer(text, safeInteger), {
      inputs: ["42;", "-7", "x"],
      values: [0, -1, 99],
      rests: ["", ";"],
    })
  ).toEqual([]);
});

test("bounded limits must be safe integers", () => {
  expect(() => bounded(0, 2 ** 64)).toThrow(GrammarError);
  expect(() => bounded(0, Number.MAX_SAFE_INTEGER + 1)).toThrow(GrammarError);
  expect(() => bounded(1.5, 2)).toThrow(GrammarError);
  expect(parse(integer(text, bounded(-1, 1)), "-1")).toEqual(some(-1));
});
