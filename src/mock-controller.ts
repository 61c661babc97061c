// ABOUTME: Declaration API used by test setup to queue expected driver interactions.
// ABOUTME: Each expect*() call enqueues immediately and returns a builder for refining it.

import { UsageError } from "./errors.js";
import { Expectation } from "./expectation.js";
import { ExpectationQueue, verifyExpectations } from "./expectation-queue.js";
import { compileQueryPattern, type QueryMatcherMode } from "./query-matcher.js";
import { Rows } from "./rows.js";
import type { ExecResult, ExpectationKind, ExpectedArg, MockHandle, RecordedCall } from "./types.js";

const argumentKinds: ReadonlySet<ExpectationKind> = new Set(["query", "exec"]);

export class MockController {
  constructor(
    private queue: ExpectationQueue,
    private queryMatcher: QueryMatcherMode,
    private recordedCalls: RecordedCall[],
  ) {}

  get calls(): readonly RecordedCall[] {
    return this.recordedCalls;
  }

  expectBegin(): ExpectationBuilder {
    return this.declare("begin");
  }

  /** With no pattern, any query text matches. */
  expectQuery(pattern?: string | RegExp): ExpectationBuilder {
    return this.declare("query", pattern);
  }

  expectExec(pattern?: string | RegExp): ExpectationBuilder {
    return this.declare("exec", pattern);
  }

  expectCommit(): ExpectationBuilder {
    return this.declare("commit");
  }

  expectRollback(): ExpectationBuilder {
    return this.declare("rollback");
  }

  /** Throws UnmetExpectationsError listing every expectation not yet consumed. */
  expectationsWereMet(): void {
    verifyExpectations(this.queue.expectations);
  }

  resetCalls(): void {
    this.recordedCalls.length = 0;
  }

  private declare(kind: ExpectationKind, pattern?: string | RegExp): ExpectationBuilder {
    const compiled = argumentKinds.has(kind) ? compileQueryPattern(pattern, this.queryMatcher) : undefined;
    const expectation = new Expectation(kind, compiled);
    this.queue.push(expectation);
    return new ExpectationBuilder(expectation);
  }
}

export class ExpectationBuilder {
  constructor(private expectation: Expectation) {}

  get handle(): MockHandle {
    return this.expectation.handle;
  }

  withArgs(...args: ExpectedArg[]): this {
    this.assertOpen(".withArgs()");
    const { kind } = this.expectation;
    if (!argumentKinds.has(kind)) {
      throw new UsageError(`.withArgs() cannot be used with ${kind} expectations`);
    }
    if (this.expectation.expectedArgs !== undefined) {
      throw new UsageError(`.withArgs() was already called for ${this.expectation.describe()}`);
    }
    this.expectation.expectedArgs = args;
    return this;
  }

  willReturnRows(rows: Rows): this {
    if (!(rows instanceof Rows)) {
      throw new UsageError(".willReturnRows() expects rows built with newRows()");
    }
    this.setOutcome(".willReturnRows()", "query", { type: "rows", rows });
    return this;
  }

  willReturnResult(result: ExecResult): this {
    this.setOutcome(".willReturnResult()", "exec", { type: "result", result });
    return this;
  }

  willReturnError(error: Error): this {
    this.setOutcome(".willReturnError()", undefined, { type: "error", error });
    return this;
  }

  private setOutcome(
    method: string,
    requiredKind: ExpectationKind | undefined,
    outcome: Expectation["outcome"],
  ): void {
    this.assertOpen(method);
    const { kind } = this.expectation;
    if (requiredKind !== undefined && kind !== requiredKind) {
      throw new UsageError(`${method} can only be used with ${requiredKind} expectations, not ${kind}`);
    }
    if (this.expectation.outcome.type !== "none") {
      throw new UsageError(
        `${method} cannot be combined with a ${this.expectation.outcome.type} outcome already set for ${this.expectation.describe()}`
      );
    }
    this.expectation.outcome = outcome;
  }

  private assertOpen(method: string): void {
    if (this.expectation.fulfilled) {
      throw new UsageError(`${method} called on an expectation that was already fulfilled`);
    }
  }
}
