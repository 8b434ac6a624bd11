import { none, some } from "../data";
import { parse, parseAll, print } from "../evaluator";
import { text } from "../sequence";
import { settings, Settings } from "./key-value";

const source = "name=server\nport=8080\noffset=-3\n";
const parsed: Settings = [
  ["name", "server"],
  ["port", 8080],
  ["offset", -3],
];

test("reads settings", () => {
  expect(parseAll(text, settings, source)).toEqual(some(parsed));
});

test("writes settings back to the same text", () => {
  expect(print(text, settings, parsed)).toEqual(source);
  expect(print(text, settings, [])).toEqual("");
});

test("stops at the first malformed line", () => {
  expect(parse(settings, "name=x\nbad")).toEqual(some([["name", "x"]]));
  expect(parseAll(text, settings, "name=x\nbad")).toEqual(none);
  expect(parseAll(text, settings, "name=x")).toEqual(none);
});
