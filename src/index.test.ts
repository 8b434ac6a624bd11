import * as grammar from "./index";

const { adapt, many, parse, print, primitives, text, joined, some } = grammar;

test("public surface", () => {
  const { satisfy } = primitives(text);
  const letters = adapt(joined, many(satisfy((ch) => /^[a-z]$/.test(ch))));
  expect(parse(letters, "abc!")).toEqual(some("abc"));
  expect(print(text, letters, "xyz")).toEqual("xyz");
  expect(new grammar.GrammarError("x")).toBeInstanceOf(Error);
});
