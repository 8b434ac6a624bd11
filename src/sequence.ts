/**
 * The capability a container must offer to be used as parser input and
 * printer output. Grammars never look inside a sequence except through
 * these three operations.
 */
export interface Sequence<S, E> {
  /** prepend one element */
  cons(element: E, seq: S): S;
  /** split off the head element, or `undefined` when the sequence is empty */
  uncons(seq: S): [E, S] | undefined;
  /** the identity sequence; only needed for printing */
  empty(): S;
}

/**
 * Strings, one Unicode code point per element: a surrogate pair is
 * consumed and produced as a single element.
 */
export const text: Sequence<string, string> = {
  cons: (element, seq) => element + seq,
  uncons: (seq) => {
    const codePoint = seq.codePointAt(0);
    if (codePoint === undefined) return undefined;
    const head = String.fromCodePoint(codePoint);
    return [head, seq.slice(head.length)];
  },
  empty: () => "",
};

export const bytes: Sequence<Uint8Array, number> = {
  cons: (element, seq) => {
    const out = new Uint8Array(seq.length + 1);
    out[0] = element;
    out.set(seq, 1);
    return out;
  },
  uncons: (seq) => (seq.length ? [seq[0], seq.subarray(1)] : undefined),
  empty: () => new Uint8Array(0),
};

export function list<E>(): Sequence<readonly E[], E> {
  return {
    cons: (element, seq) => [element, ...seq],
    uncons: (seq) => (seq.length ? [seq[0], seq.slice(1)] : undefined),
    empty: () => [],
  };
}
