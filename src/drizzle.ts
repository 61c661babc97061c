// ABOUTME: Routes a drizzle sqlite-proxy database through a mock connection.
// ABOUTME: Transaction statements drizzle issues as plain SQL become begin/commit/rollback calls.

import type { AsyncRemoteCallback } from "drizzle-orm/sqlite-proxy";
import { MismatchError } from "./errors.js";
import type { Connection, Transaction } from "./types.js";

const BEGIN = /^\s*begin\b/i;
const COMMIT = /^\s*commit\b/i;
const ROLLBACK = /^\s*rollback\s*$/i;

/**
 * Usage: `drizzle(drizzleCallback(connection), { schema })` from
 * "drizzle-orm/sqlite-proxy".
 */
export function drizzleCallback(connection: Connection): AsyncRemoteCallback {
  let transaction: Transaction | undefined;

  async function finish(kind: "commit" | "rollback"): Promise<void> {
    const current = transaction;
    if (!current) {
      // Let the connection report it as a state violation.
      await connection[kind]();
      return;
    }
    try {
      await current[kind]();
    } catch (error) {
      // A mismatch leaves the transaction open; a programmed failure ends it.
      if (!(error instanceof MismatchError)) transaction = undefined;
      throw error;
    }
    transaction = undefined;
  }

  return async (sql, params, method) => {
    if (method === "run") {
      if (BEGIN.test(sql)) {
        transaction = await connection.begin();
        return { rows: [] };
      }
      if (COMMIT.test(sql)) {
        await finish("commit");
        return { rows: [] };
      }
      if (ROLLBACK.test(sql)) {
        await finish("rollback");
        return { rows: [] };
      }
      const result = await connection.exec(sql, params);
      return { rows: [], ...result };
    }

    const rows = (await connection.query(sql, params)).toArrays();
    if (method === "get") {
      // An absent row makes drizzle resolve get() with undefined.
      return { rows: rows[0] };
    }
    return { rows };
  };
}
