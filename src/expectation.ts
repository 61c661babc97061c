import { formatArgs } from "./format.js";
import type { QueryPattern } from "./query-matcher.js";
import type { Rows } from "./rows.js";
import type { ExecResult, ExpectationKind, ExpectedArg, MockHandle } from "./types.js";

export type Outcome =
  | { type: "none" }
  | { type: "rows"; rows: Rows }
  | { type: "result"; result: ExecResult }
  | { type: "error"; error: Error };

// Shaped like a vitest mock function so toHaveBeenCalled*() accept it.
export function createMockHandle(): MockHandle {
  const calls: MockHandle["mock"]["calls"] = [];
  const handle = Object.assign(function () {}, {
    _isMockFunction: true as const,
    getMockName: () => "expectation",
    mock: { calls },
  });
  return handle;
}

export class Expectation {
  expectedArgs: readonly ExpectedArg[] | undefined;
  outcome: Outcome = { type: "none" };
  readonly handle = createMockHandle();
  private isFulfilled = false;

  constructor(
    readonly kind: ExpectationKind,
    readonly pattern: QueryPattern | undefined,
  ) {}

  get fulfilled(): boolean {
    return this.isFulfilled;
  }

  fulfill(sql: string | undefined, args: readonly unknown[]): void {
    if (this.isFulfilled) {
      throw new Error(`expectation already fulfilled: ${this.describe()}`);
    }
    this.isFulfilled = true;
    this.handle.mock.calls.push([sql, args]);
  }

  describe(): string {
    if (this.kind !== "query" && this.kind !== "exec") {
      return this.kind;
    }
    const text = this.pattern ? this.pattern.describe() : "matching any text";
    const args = this.expectedArgs ? `args ${formatArgs(this.expectedArgs)}` : "any args";
    return `${this.kind} ${text} with ${args}`;
  }
}
