import type { Logger } from "pino";
import { resolveMockOptions, type MockOptions } from "./config.js";
import { MismatchError } from "./errors.js";
import type { Expectation } from "./expectation.js";
import { ExpectationQueue, verifyExpectations } from "./expectation-queue.js";
import { describeCall } from "./format.js";
import { createSessionLogger } from "./logger.js";
import { MockController } from "./mock-controller.js";
import { Rows } from "./rows.js";
import type {
  Connection,
  ExecResult,
  IncomingCall,
  RecordedCall,
  RowsLike,
  SessionState,
  Statement,
  Transaction,
} from "./types.js";

const emptyResult: ExecResult = Object.freeze({ lastInsertId: 0, rowsAffected: 0 });

/**
 * Connection handed to the code under test. Every call is checked against the
 * head of the expectation queue; closing the session verifies the queue.
 */
export class MockSession implements Connection {
  readonly mock: MockController;
  private queue = new ExpectationQueue();
  private recordedCalls: RecordedCall[] = [];
  private logger: Logger;
  private currentState: SessionState = "idle";
  private activeTransaction: MockTransaction | undefined;

  constructor(options: MockOptions = {}) {
    const resolved = resolveMockOptions(options);
    this.logger = createSessionLogger(resolved);
    this.mock = new MockController(this.queue, resolved.queryMatcher, this.recordedCalls);
  }

  get state(): SessionState {
    return this.currentState;
  }

  async begin(): Promise<Transaction> {
    const call: IncomingCall = { kind: "begin", args: [] };
    const expectation = this.consume(call, this.currentState === "in-transaction" ? "a transaction is already in progress" : undefined);
    this.throwProgrammedError(expectation);
    this.currentState = "in-transaction";
    this.activeTransaction = new MockTransaction(this);
    return this.activeTransaction;
  }

  async query(sql: string, args: readonly unknown[] = []): Promise<RowsLike> {
    const expectation = this.consume({ kind: "query", sql, args });
    this.throwProgrammedError(expectation);
    return expectation.outcome.type === "rows" ? expectation.outcome.rows : new Rows([]);
  }

  async exec(sql: string, args: readonly unknown[] = []): Promise<ExecResult> {
    const expectation = this.consume({ kind: "exec", sql, args });
    this.throwProgrammedError(expectation);
    return expectation.outcome.type === "result" ? expectation.outcome.result : emptyResult;
  }

  /** Consumes nothing: the statement's calls are matched as plain query/exec. */
  async prepare(sql: string): Promise<Statement> {
    return new MockStatement(this, sql);
  }

  /** Ends whichever transaction is in progress. */
  async commit(): Promise<void> {
    this.finishTransaction("commit", this.activeTransaction);
  }

  async rollback(): Promise<void> {
    this.finishTransaction("rollback", this.activeTransaction);
  }

  /** Closing twice is a no-op; the session is closed even when verification fails. */
  async close(): Promise<void> {
    if (this.currentState === "closed") return;
    this.currentState = "closed";
    this.queue.seal();
    try {
      verifyExpectations(this.queue.expectations);
    } catch (error) {
      this.logger.error({ err: error }, "connection closed with unmet expectations");
      throw error;
    }
    this.logger.debug("connection closed, all expectations met");
  }

  /** @internal Called by transaction handles; `owner` must be the transaction in progress. */
  finishTransaction(kind: "commit" | "rollback", owner: MockTransaction | undefined): void {
    let violation: string | undefined;
    if (owner !== undefined && owner !== this.activeTransaction) {
      violation = "the transaction has already finished";
    } else if (this.currentState !== "in-transaction") {
      violation = "no transaction in progress";
    }
    const expectation = this.consume({ kind, args: [] }, violation);
    // The transaction ends even when the driver reports a failure.
    this.currentState = "idle";
    this.activeTransaction = undefined;
    this.throwProgrammedError(expectation);
  }

  private consume(call: IncomingCall, stateViolation?: string): Expectation {
    this.recordedCalls.push({ kind: call.kind, sql: call.sql, args: call.args, timestamp: Date.now() });

    const pending = this.queue.head?.describe();
    if (this.currentState === "closed") {
      throw this.mismatch(new MismatchError("state", call.kind, describeCall(call), pending, "the connection is closed"));
    }
    if (stateViolation) {
      throw this.mismatch(new MismatchError("state", call.kind, describeCall(call), pending, stateViolation));
    }

    let expectation: Expectation;
    try {
      expectation = this.queue.consume(call);
    } catch (error) {
      if (error instanceof MismatchError) throw this.mismatch(error);
      throw error;
    }
    this.logger.debug({ kind: call.kind, sql: call.sql, args: call.args }, "matched %s", expectation.describe());
    return expectation;
  }

  private mismatch(error: MismatchError): MismatchError {
    this.logger.warn({ dimension: error.dimension, kind: error.kind }, error.message);
    return error;
  }

  private throwProgrammedError(expectation: Expectation): void {
    if (expectation.outcome.type === "error") {
      throw expectation.outcome.error;
    }
  }
}

class MockTransaction implements Transaction {
  constructor(private session: MockSession) {}

  async commit(): Promise<void> {
    this.session.finishTransaction("commit", this);
  }

  async rollback(): Promise<void> {
    this.session.finishTransaction("rollback", this);
  }
}

class MockStatement implements Statement {
  private closed = false;

  constructor(private session: MockSession, readonly sql: string) {}

  async query(args: readonly unknown[] = []): Promise<RowsLike> {
    this.assertOpen("query", args);
    return this.session.query(this.sql, args);
  }

  async exec(args: readonly unknown[] = []): Promise<ExecResult> {
    this.assertOpen("exec", args);
    return this.session.exec(this.sql, args);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(kind: "query" | "exec", args: readonly unknown[]): void {
    if (this.closed) {
      throw new MismatchError("state", kind, describeCall({ kind, sql: this.sql, args }), undefined, "the statement is closed");
    }
  }
}
