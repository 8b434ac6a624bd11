import { bytes, list, text } from "./sequence";

test("text", () => {
  expect(text.uncons("abc")).toEqual(["a", "bc"]);
  expect(text.uncons("")).toEqual(undefined);
  expect(text.cons("a", "bc")).toEqual("abc");
  expect(text.empty()).toEqual("");
});

test("bytes", () => {
  const buf = Uint8Array.from([1, 2, 3]);
  expect(bytes.uncons(buf)).toEqual([1, Uint8Array.from([2, 3])]);
  expect(bytes.uncons(new Uint8Array(0))).toEqual(undefined);
  expect(bytes.cons(0, buf)).toEqual(Uint8Array.from([0, 1, 2, 3]));
  // the input is left alone
  expect(buf).toEqual(Uint8Array.from([1, 2, 3]));
});

test("list", () => {
  const numbers = list<number>();
  const xs = [1, 2];
  expect(numbers.uncons(xs)).toEqual([1, [2]]);
  expect(numbers.uncons([])).toEqual(undefined);
  expect(numbers.cons(0, xs)).toEqual([0, 1, 2]);
  expect(xs).toEqual([1, 2]);
  expect(numbers.empty()).toEqual([]);
});
