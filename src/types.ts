import type { ArgumentMatcher } from "./anything.js";

export type ExpectationKind = "begin" | "query" | "exec" | "commit" | "rollback";

export type Value = string | number | bigint | boolean | Date | Uint8Array | null;

export type ExpectedArg = Value | ArgumentMatcher;

export type Row = Record<string, Value>;

export interface ExecResult {
  readonly lastInsertId: number;
  readonly rowsAffected: number;
}

export interface RecordedCall {
  kind: ExpectationKind;
  sql: string | undefined;
  args: readonly unknown[];
  timestamp: number;
}

export interface IncomingCall {
  kind: ExpectationKind;
  sql?: string;
  args: readonly unknown[];
}

export interface MockHandle {
  mock: {
    calls: [sql: string | undefined, args: readonly unknown[]][];
  };
}

export type SessionState = "idle" | "in-transaction" | "closed";

export interface Transaction {
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

export interface Statement {
  readonly sql: string;
  query(args?: readonly unknown[]): Promise<RowsLike>;
  exec(args?: readonly unknown[]): Promise<ExecResult>;
  close(): Promise<void>;
}

export interface RowsLike extends Iterable<Row> {
  readonly columns: readonly string[];
  next(): Row | undefined;
  toArrays(): Value[][];
}

export interface Connection {
  begin(): Promise<Transaction>;
  query(sql: string, args?: readonly unknown[]): Promise<RowsLike>;
  exec(sql: string, args?: readonly unknown[]): Promise<ExecResult>;
  prepare(sql: string): Promise<Statement>;
  /** Ends the transaction in progress, the same as calling it on the Transaction. */
  commit(): Promise<void>;
  rollback(): Promise<void>;
  close(): Promise<void>;
}

export interface Driver {
  open(dsn: string): Promise<Connection>;
}
