import { isArgumentMatcher } from "./anything.js";
import type { IncomingCall } from "./types.js";

export function normalizeSql(sql: string): string {
  return sql.replace(/\s+/g, " ").trim();
}

export function formatValue(value: unknown): string {
  if (isArgumentMatcher(value)) return value.description;
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "bigint") return `${value}n`;
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Date(Invalid)" : `Date(${value.toISOString()})`;
  }
  if (value instanceof Uint8Array) {
    return `<${value.length} bytes>`;
  }
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return `<${typeof value}>`;
}

export function formatArgs(args: readonly unknown[]): string {
  return `[${args.map(formatValue).join(", ")}]`;
}

export function describeCall(call: IncomingCall): string {
  if (call.kind === "query" || call.kind === "exec") {
    return `${call.kind} ${JSON.stringify(normalizeSql(call.sql ?? ""))} with args ${formatArgs(call.args)}`;
  }
  return call.kind;
}
