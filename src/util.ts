// istanbul ignore next
export function assertUnreachable(value: never): never {
  console.error("shouldnt have gotten (", value, ")");
  throw new Error(`unreachable`);
}

// thrown for misuse of a combinator, never for a failed match
export class GrammarError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GrammarError";
  }
}

/**
 * structural equality over plain data: primitives, arrays, Uint8Arrays and
 * plain objects. Used as the default comparison when checking laws.
 */
export function deepEqual(left: unknown, right: unknown): boolean {
  if (Object.is(left, right)) return true;
  if (
    typeof left !== "object" ||
    typeof right !== "object" ||
    left === null ||
    right === null
  ) {
    return false;
  }
  if (left instanceof Uint8Array || right instanceof Uint8Array) {
    if (!(left instanceof Uint8Array && right instanceof Uint8Array)) {
      return false;
    }
    return (
      left.length === right.length && left.every((b, i) => b === right[i])
    );
  }
  if (Array.isArray(left) || Array.isArray(right)) {
    if (!(Array.isArray(left) && Array.isArray(right))) return false;
    return (
      left.length === right.length &&
      left.every((x, i) => deepEqual(x, right[i]))
    );
  }
  const leftEntries: [string, unknown][] = Object.entries(left);
  const rightEntries = new Map<string, unknown>(Object.entries(right));
  if (leftEntries.length !== rightEntries.size) return false;
  for (const [key, value] of leftEntries) {
    if (!rightEntries.has(key)) return false;
    if (!deepEqual(value, rightEntries.get(key))) return false;
  }
  return true;
}
