import { MismatchError, UnmetExpectationsError, UsageError } from "./errors.js";
import type { Expectation } from "./expectation.js";
import { describeCall, formatArgs } from "./format.js";
import type { IncomingCall } from "./types.js";
import { argsMatch } from "./value-matcher.js";

/**
 * Ordered expectations of one session. Only the head, the first entry not yet
 * fulfilled, can ever be consumed; entries are never skipped or reordered.
 */
export class ExpectationQueue {
  private entries: Expectation[] = [];
  private headIndex = 0;
  private isSealed = false;

  get expectations(): readonly Expectation[] {
    return this.entries;
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  get head(): Expectation | undefined {
    return this.entries[this.headIndex];
  }

  push(expectation: Expectation): void {
    if (this.isSealed) {
      throw new UsageError(`cannot declare ${expectation.kind} expectation: the connection is closed`);
    }
    this.entries.push(expectation);
  }

  seal(): void {
    this.isSealed = true;
  }

  /**
   * Matches `call` against the head and consumes it. Runs synchronously from
   * inspection to consumption, so calls are serialized in the order issued.
   */
  consume(call: IncomingCall): Expectation {
    const head = this.head;
    if (!head) {
      throw new MismatchError("exhausted", call.kind, describeCall(call), undefined, "all expectations were already fulfilled");
    }
    if (head.kind !== call.kind) {
      throw new MismatchError("kind", call.kind, describeCall(call), head.describe(), `expected ${head.kind}`);
    }
    if (head.pattern && !head.pattern.matches(call.sql ?? "")) {
      throw new MismatchError("pattern", call.kind, describeCall(call), head.describe());
    }
    if (!argsMatch(head.expectedArgs, call.args)) {
      const expected = head.expectedArgs ? formatArgs(head.expectedArgs) : "any";
      throw new MismatchError(
        "args",
        call.kind,
        describeCall(call),
        head.describe(),
        `expected ${expected}, got ${formatArgs(call.args)}`,
      );
    }

    head.fulfill(call.sql, call.args);
    this.headIndex++;
    return head;
  }
}

export function verifyExpectations(expectations: readonly Expectation[]): void {
  const unmet = expectations.filter((entry) => !entry.fulfilled);
  if (unmet.length > 0) {
    throw new UnmetExpectationsError(unmet.map((entry) => entry.describe()));
  }
}
