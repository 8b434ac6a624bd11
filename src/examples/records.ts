import { adapt, dependent, many, replicateN } from "../combinators";
import { Grammar, element } from "../grammar";
import { bytes } from "../sequence";
import { iso } from "../transform";

const byte = element(bytes);

/**
 * A length byte followed by that many payload bytes. Payloads longer than
 * 255 bytes are outside the format.
 */
export const record: Grammar<Uint8Array, Uint8Array> = adapt(
  iso(
    (payload: number[]) => Uint8Array.from(payload),
    (payload: Uint8Array) => Array.from(payload)
  ),
  dependent(
    byte,
    (length) => replicateN(length, byte),
    (payload) => payload.length
  )
);

export const records: Grammar<Uint8Array, Uint8Array[]> = many(record);
