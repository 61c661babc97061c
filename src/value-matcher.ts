import { isArgumentMatcher } from "./anything.js";
import type { ExpectedArg } from "./types.js";

export function valueMatches(expected: ExpectedArg, actual: unknown): boolean {
  if (isArgumentMatcher(expected)) {
    return expected.match(actual);
  }

  // Timestamps compare by type only: any two Date values match.
  if (expected instanceof Date) {
    return actual instanceof Date;
  }

  if (expected === null) {
    return actual === null;
  }

  switch (typeof expected) {
    case "string":
    case "number":
    case "bigint":
    case "boolean":
      return typeof actual === typeof expected && actual === expected;
    default:
      return false;
  }
}

/** An absent expected list leaves the arguments unchecked. */
export function argsMatch(expected: readonly ExpectedArg[] | undefined, actual: readonly unknown[]): boolean {
  if (expected === undefined) return true;
  if (expected.length !== actual.length) return false;
  for (let i = 0; i < expected.length; i++) {
    if (!valueMatches(expected[i], actual[i])) return false;
  }
  return true;
}
