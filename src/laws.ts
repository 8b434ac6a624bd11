import { Grammar, MatchOutput } from "./grammar";
import { deepEqual } from "./util";

export type LawViolation<S, T> =
  | {
      law: "match-construct";
      input: S;
      value: T;
      rest: S;
      rebuilt: S;
    }
  | {
      law: "construct-match";
      value: T;
      rest: S;
      built: S;
      result: MatchOutput<S, T>;
    };

export type LawSamples<S, T> = {
  // inputs to match; failed matches are skipped
  inputs?: S[];
  // values to construct, each onto every one of `rests`
  values?: T[];
  rests: S[];
  equals?: (left: unknown, right: unknown) => boolean;
};

/**
 * Check both round-trip laws of a grammar against sample data:
 * - a successful match, constructed back, gives the original input
 * - a constructed sequence matches back to the value and rest it was built from
 *
 * Returns every violation found; an empty array means the grammar is lawful
 * on these samples.
 */
export function checkLaws<S, T>(
  grammar: Grammar<S, T>,
  { inputs = [], values = [], rests, equals = deepEqual }: LawSamples<S, T>
): LawViolation<S, T>[] {
  const violations: LawViolation<S, T>[] = [];

  for (const input of inputs) {
    const result = grammar.match(input);
    if (result.type === "error") continue;
    const rebuilt = grammar.construct(result.value, result.rest);
    if (!equals(rebuilt, input)) {
      violations.push({
        law: "match-construct",
        input,
        value: result.value,
        rest: result.rest,
        rebuilt,
      });
    }
  }

  for (const value of values) {
    for (const rest of rests) {
      const built = grammar.construct(value, rest);
      const result = grammar.match(built);
      if (
        result.type === "error" ||
        !equals(result.value, value) ||
        !equals(result.rest, rest)
      ) {
        violations.push({ law: "construct-match", value, rest, built, result });
      }
    }
  }

  return violations;
}
