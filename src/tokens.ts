import moo from "moo";
import { Unit } from "./data";
import { Grammar, literal, satisfy } from "./grammar";
import { adapt } from "./combinators";
import { list } from "./sequence";
import { iso } from "./transform";

export type Token = {
  type: string;
  text: string;
};

export const tokenList = list<Token>();

export const sameToken = (left: Token, right: Token): boolean =>
  left.type === right.type && left.text === right.text;

/**
 * Run a moo lexer over `source`, keeping every token (whitespace and
 * comments included) so that `untokenize` gives back `source` exactly.
 * Lexer errors from moo are thrown as-is.
 */
export function tokenize(lexer: moo.Lexer, source: string): Token[] {
  const tokens: Token[] = [];
  for (const tok of lexer.reset(source)) {
    tokens.push({ type: tok.type ?? "", text: tok.text });
  }
  return tokens;
}

export function untokenize(tokens: readonly Token[]): string {
  return tokens.map((tok) => tok.text).join("");
}

/**
 * Matches one token of `type` and yields its text. Printing builds a token
 * of that type from the text.
 */
export const tokenOfType = (type: string): Grammar<readonly Token[], string> =>
  adapt(
    iso(
      (tok: Token) => tok.text,
      (text: string): Token => ({ type, text })
    ),
    satisfy(tokenList, (tok) => tok.type === type)
  );

// one exact token
export const keyword = (
  type: string,
  text: string
): Grammar<readonly Token[], Unit> =>
  literal(tokenList, { type, text }, sameToken);
