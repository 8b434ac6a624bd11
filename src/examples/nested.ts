import { Either, left, right } from "../data";
import { adapt, between, choice, lazy, sepBy } from "../combinators";
import { Grammar, primitives } from "../grammar";
import { text } from "../sequence";
import { iso } from "../transform";
import { word } from "./key-value";

// words and parenthesised, space-separated lists of trees: `(a (b c) ())`
export type Tree = string | Tree[];

const { literal } = primitives(text);

const fromEither = iso(
  (value: Either<string, Tree[]>): Tree => value.value,
  (tree: Tree): Either<string, Tree[]> =>
    typeof tree === "string" ? left(tree) : right(tree)
);

export const tree: Grammar<string, Tree> = lazy(() =>
  adapt(
    fromEither,
    choice(word, between(literal("("), literal(")"), sepBy(tree, literal(" "))))
  )
);
