// ABOUTME: Canned result sets and exec summaries returned by matched expectations.
// ABOUTME: Rows are built from literal values or comma-separated text, then read through a cursor.

import { UsageError } from "./errors.js";
import type { ExecResult, Row, RowsLike, Value } from "./types.js";

const NUMERIC = /^-?\d+(\.\d+)?([eE][-+]?\d+)?$/;

function parseField(field: string): Value {
  if (!NUMERIC.test(field)) return field;
  const n = Number(field);
  if (/^-?\d+$/.test(field) && !Number.isSafeInteger(n)) {
    return BigInt(field);
  }
  return n;
}

export class Rows implements RowsLike {
  private records: Value[][] = [];
  private rowErrors = new Map<number, Error>();
  private cursor = 0;

  constructor(readonly columns: readonly string[]) {}

  get length(): number {
    return this.records.length;
  }

  addRow(...values: Value[]): this {
    if (values.length !== this.columns.length) {
      throw new UsageError(
        `row has ${values.length} values but there are ${this.columns.length} columns (${this.columns.join(", ")})`
      );
    }
    this.records.push(values);
    return this;
  }

  fromCSVString(text: string): this {
    for (const line of text.split(/\r?\n/)) {
      if (line.trim() === "") continue;
      this.addRow(...line.split(",").map((field) => parseField(field.trim())));
    }
    return this;
  }

  /** Makes next() throw `error` when the cursor reaches row `index`. */
  rowError(index: number, error: Error): this {
    if (!Number.isInteger(index) || index < 0) {
      throw new UsageError(`row error index must be a non-negative integer, got ${index}`);
    }
    this.rowErrors.set(index, error);
    return this;
  }

  next(): Row | undefined {
    const record = this.advance();
    return record === undefined ? undefined : this.toRow(record);
  }

  /** Reads the remaining rows as positional arrays, advancing the cursor like next(). */
  toArrays(): Value[][] {
    const arrays: Value[][] = [];
    for (let record = this.advance(); record !== undefined; record = this.advance()) {
      arrays.push([...record]);
    }
    return arrays;
  }

  // Iteration resumes from the cursor and shares it with next().
  *[Symbol.iterator](): Iterator<Row> {
    for (let row = this.next(); row !== undefined; row = this.next()) {
      yield row;
    }
  }

  private advance(): Value[] | undefined {
    const error = this.rowErrors.get(this.cursor);
    if (error) {
      this.cursor++;
      throw error;
    }
    const record = this.records[this.cursor];
    if (record === undefined) return undefined;
    this.cursor++;
    return record;
  }

  private toRow(record: Value[]): Row {
    const row: Row = {};
    this.columns.forEach((column, i) => {
      row[column] = record[i];
    });
    return row;
  }
}

export function newRows(columns: readonly string[]): Rows {
  return new Rows(columns);
}

export function newResult(lastInsertId: number, rowsAffected: number): ExecResult {
  for (const [name, value] of [["lastInsertId", lastInsertId], ["rowsAffected", rowsAffected]] as const) {
    if (!Number.isSafeInteger(value)) {
      throw new UsageError(`${name} must be an integer, got ${value}`);
    }
  }
  return Object.freeze({ lastInsertId, rowsAffected });
}
