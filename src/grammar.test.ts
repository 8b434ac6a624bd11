import { none, some, unit } from "./data";
import { element, eof, literal, primitives, satisfy, symbol } from "./grammar";
import { checkLaws } from "./laws";
import { parse, print } from "./evaluator";
import { bytes, list, text } from "./sequence";

const isAlpha = (ch: string) => /^[A-Za-z]$/.test(ch);

test("element", () => {
  const g = element(text);
  expect(g.match("ab")).toEqual({ type: "value", value: "a", rest: "b" });
  expect(g.match("")).toEqual({ type: "error", rest: "" });
  expect(g.construct("x", "yz")).toEqual("xyz");
  expect(
    checkLaws(g, { inputs: ["", "a", "ab"], values: ["q"], rests: ["", "z"] })
  ).toEqual([]);
});

test("element treats a surrogate pair as one element", () => {
  expect(element(text).match("😀!")).toEqual({
    type: "value",
    value: "😀",
    rest: "!",
  });
});

test("satisfy", () => {
  const g = satisfy(text, isAlpha);
  expect(g.match("a1")).toEqual({ type: "value", value: "a", rest: "1" });
  expect(g.match("1a")).toEqual({ type: "error", rest: "1a" });
  expect(g.match("")).toEqual({ type: "error", rest: "" });
  expect(
    checkLaws(g, { inputs: ["a1", "1a", ""], values: ["b"], rests: ["", "!"] })
  ).toEqual([]);
});

test("satisfy does not check values when constructing", () => {
  const g = satisfy(text, isAlpha);
  expect(print(text, g, "7")).toEqual("7");
  expect(parse(g, print(text, g, "7"))).toEqual(none);
});

test("symbol", () => {
  const g = symbol(text, "-");
  expect(parse(g, "-1")).toEqual(some("-"));
  expect(parse(g, "+1")).toEqual(none);
  expect(print(text, g, "-")).toEqual("-");
  expect(
    checkLaws(g, { inputs: ["-1", "+1"], values: ["-"], rests: ["", "-"] })
  ).toEqual([]);
});

test("literal", () => {
  const g = literal(text, "$");
  expect(g.match("$~")).toEqual({ type: "value", value: null, rest: "~" });
  expect(g.match("~$")).toEqual({ type: "error", rest: "~$" });
  expect(print(text, g, unit)).toEqual("$");
  expect(
    checkLaws(g, { inputs: ["$~", "~"], values: [unit], rests: ["", "$"] })
  ).toEqual([]);
});

test("literal with a custom equality", () => {
  const g = literal(list<string>(), "a", (l, r) => l.toLowerCase() === r);
  expect(parse(g, ["A", "b"])).toEqual(some(unit));
  expect(print(list<string>(), g, unit)).toEqual(["a"]);
});

test("eof", () => {
  const g = eof(text);
  expect(parse(g, "")).toEqual(some(unit));
  expect(parse(g, "x")).toEqual(none);
  expect(g.match("x")).toEqual({ type: "error", rest: "x" });
  expect(print(text, g, unit)).toEqual("");
});

test("primitives over bytes", () => {
  const { element, symbol, eof } = primitives(bytes);
  const input = Uint8Array.from([1, 2]);
  const result = element.match(input);
  expect(result.type).toEqual("value");
  expect(result.rest).toEqual(Uint8Array.from([2]));
  expect(parse(symbol(2), input)).toEqual(none);
  expect(parse(eof, new Uint8Array(0))).toEqual(some(unit));
  expect(print(bytes, element, 255)).toEqual(Uint8Array.from([255]));
});

test("primitives over lists", () => {
  const { satisfy, eof } = primitives(list<number>());
  const even = satisfy((n) => n % 2 === 0);
  expect(even.match([2, 3])).toEqual({ type: "value", value: 2, rest: [3] });
  expect(even.match([3])).toEqual({ type: "error", rest: [3] });
  expect(eof.match([])).toEqual({ type: "value", value: null, rest: [] });
});
