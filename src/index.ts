export { createMock, mockOf, DRIVER_NAME } from "./mock-database.js";
export { MockSession } from "./mock-session.js";
export { MockController, ExpectationBuilder } from "./mock-controller.js";
export { registerDriver, open, drivers } from "./driver.js";
export { drizzleCallback } from "./drizzle.js";
export { Rows, newRows, newResult } from "./rows.js";
export { anyArg, argThat } from "./anything.js";
export { valueMatches, argsMatch } from "./value-matcher.js";
export { UsageError, MismatchError, UnmetExpectationsError } from "./errors.js";
export type { MismatchDimension } from "./errors.js";
export type { ArgumentMatcher } from "./anything.js";
export type { MockOptions } from "./config.js";
export type { QueryMatcherMode } from "./query-matcher.js";
export type {
  Connection,
  Driver,
  ExecResult,
  ExpectationKind,
  ExpectedArg,
  MockHandle,
  RecordedCall,
  Row,
  RowsLike,
  SessionState,
  Statement,
  Transaction,
  Value,
} from "./types.js";
