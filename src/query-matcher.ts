import { UsageError } from "./errors.js";
import { normalizeSql } from "./format.js";

export type QueryMatcherMode = "regexp" | "equal";

export interface QueryPattern {
  matches(sql: string): boolean;
  describe(): string;
}

const anyText: QueryPattern = {
  matches: () => true,
  describe: () => "matching any text",
};

// Drop g/y so that test() does not carry lastIndex between calls.
function stateless(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""));
}

function regexpPattern(regexp: RegExp): QueryPattern {
  return {
    matches: (sql) => regexp.test(sql),
    describe: () => `matching ${regexp}`,
  };
}

export function compileQueryPattern(
  pattern: string | RegExp | undefined,
  mode: QueryMatcherMode,
): QueryPattern {
  if (pattern === undefined) return anyText;

  if (pattern instanceof RegExp) {
    return regexpPattern(stateless(pattern));
  }

  if (mode === "equal") {
    const expected = normalizeSql(pattern);
    return {
      matches: (sql) => normalizeSql(sql) === expected,
      describe: () => `equal to ${JSON.stringify(expected)}`,
    };
  }

  let regexp: RegExp;
  try {
    regexp = new RegExp(pattern);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new UsageError(`invalid query pattern ${JSON.stringify(pattern)}: ${detail}`);
  }
  return regexpPattern(regexp);
}
