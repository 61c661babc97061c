// ABOUTME: Error classes for the three failure categories of a mock session.
// ABOUTME: Declaration misuse, call-time mismatches and unmet expectations at close.

import type { ExpectationKind } from "./types.js";

/** Thrown while declaring expectations or building rows, never at call time. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type MismatchDimension = "kind" | "pattern" | "args" | "state" | "exhausted";

const dimensionLabels: Record<MismatchDimension, string> = {
  kind: "kind mismatch",
  pattern: "query text mismatch",
  args: "arguments mismatch",
  state: "invalid state",
  exhausted: "no expectations remain",
};

/**
 * An incoming call did not correspond to the head of the expectation queue.
 * The queue is left untouched when this is raised.
 */
export class MismatchError extends Error {
  constructor(
    readonly dimension: MismatchDimension,
    readonly kind: ExpectationKind,
    readonly call: string,
    readonly pending: string | undefined,
    readonly reason?: string,
  ) {
    const lines = [
      `unexpected ${kind} (${dimensionLabels[dimension]}${reason ? `: ${reason}` : ""})`,
      `  call: ${call}`,
    ];
    if (pending !== undefined) {
      lines.push(`  pending expectation: ${pending}`);
    }
    super(lines.join("\n"));
    this.name = "MismatchError";
  }
}

export class UnmetExpectationsError extends Error {
  constructor(readonly unmet: string[]) {
    const noun = unmet.length === 1 ? "expectation was" : "expectations were";
    super(
      `${unmet.length} ${noun} not met:\n${unmet.map((entry) => `  - ${entry}`).join("\n")}`
    );
    this.name = "UnmetExpectationsError";
  }
}
