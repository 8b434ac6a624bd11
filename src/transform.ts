import { NonEmpty, Option, some } from "./data";

/**
 * A pair of mappings between `A` and `B` for `adapt`: `to` is total,
 * `from` may reject an `A` that has no `B`.
 */
export interface Transform<A, B> {
  to(value: B): A;
  from(value: A): Option<B>;
}

export const prism = <A, B>(
  to: (value: B) => A,
  from: (value: A) => Option<B>
): Transform<A, B> => ({ to, from });

// a transform that never rejects
export const iso = <A, B>(
  from: (value: A) => B,
  to: (value: B) => A
): Transform<A, B> => ({ to, from: (value) => some(from(value)) });

// runs `inner` first when reading, `outer` first when writing
export const compose = <A, B, C>(
  outer: Transform<B, C>,
  inner: Transform<A, B>
): Transform<A, C> => ({
  to: (value) => inner.to(outer.to(value)),
  from: (value) => {
    const b = inner.from(value);
    return b.type === "some" ? outer.from(b.value) : b;
  },
});

export function reversed<T>(): Transform<T[], T[]> {
  return iso(
    (xs) => [...xs].reverse(),
    (xs) => [...xs].reverse()
  );
}

// characters to string and back; splits by code point
export const joined: Transform<string[], string> = iso(
  (chars: string[]) => chars.join(""),
  (str: string) => Array.from(str)
);

// as `joined`, for at least one character. The empty string is written as
// a single empty element.
export const joined1: Transform<NonEmpty<string>, string> = iso(
  (chars: NonEmpty<string>) => chars.join(""),
  (str: string): NonEmpty<string> => {
    const [head = "", ...tail] = Array.from(str);
    return [head, ...tail];
  }
);
