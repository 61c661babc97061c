// ABOUTME: Per-argument matchers for expectations declared with withArgs().
// ABOUTME: A slot holding an ArgumentMatcher decides the match itself instead of value equality.

export const ARGUMENT_MATCHER = Symbol.for("sql-expectations:argument-matcher");

export interface ArgumentMatcher {
  readonly [ARGUMENT_MATCHER]: true;
  readonly description: string;
  match(value: unknown): boolean;
}

export function argThat(description: string, match: (value: unknown) => boolean): ArgumentMatcher {
  return { [ARGUMENT_MATCHER]: true, description, match };
}

export function anyArg(): ArgumentMatcher {
  return argThat("<any>", () => true);
}

export function isArgumentMatcher(value: unknown): value is ArgumentMatcher {
  return typeof value === "object" && value !== null && ARGUMENT_MATCHER in value;
}
