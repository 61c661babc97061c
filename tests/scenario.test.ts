import { describe, it, expect } from "vitest";
import { newResult, newRows, open, mockOf, type Connection } from "../src/index.js";

const PENDING = 0;

// Cancels an order only while it is still pending; anything else is rolled back.
async function cancelOrder(conn: Connection, orderId: number): Promise<boolean> {
  const tx = await conn.begin();
  try {
    const rows = await conn.query("SELECT id, status FROM orders WHERE id = ? FOR UPDATE", [orderId]);
    const order = rows.next();
    if (!order || order.status !== PENDING) {
      await tx.rollback();
      return false;
    }
    await conn.exec("UPDATE orders SET status = ? WHERE id = ?", [9, orderId]);
    await conn.exec("INSERT INTO order_log (order_id, event, at) VALUES (?, ?, ?)", [orderId, "cancelled", new Date()]);
    await tx.commit();
    return true;
  } catch (error) {
    await tx.rollback();
    throw error;
  }
}

describe("cancelling an order", () => {
  it("should roll back when the order is no longer pending", async () => {
    const conn = await open("sqlmock", "");
    const mock = mockOf(conn);
    mock.expectBegin();
    mock.expectQuery("SELECT .* FROM orders").withArgs(1).willReturnRows(newRows(["status"]).addRow(1));
    mock.expectRollback();

    await expect(cancelOrder(conn, 1)).resolves.toBe(false);
    await expect(conn.close()).resolves.toBeUndefined();
  });

  it("should update and log inside one transaction when pending", async () => {
    const conn = await open("sqlmock", "");
    const mock = mockOf(conn);
    mock.expectBegin();
    mock.expectQuery("SELECT .* FROM orders").withArgs(2).willReturnRows(newRows(["id", "status"]).fromCSVString("2,0"));
    mock.expectExec("UPDATE orders SET status").withArgs(9, 2).willReturnResult(newResult(0, 1));
    mock.expectExec("INSERT INTO order_log").withArgs(2, "cancelled", new Date(0)).willReturnResult(newResult(31, 1));
    mock.expectCommit();

    await expect(cancelOrder(conn, 2)).resolves.toBe(true);
    await expect(conn.close()).resolves.toBeUndefined();
  });

  it("should exercise the rollback path when the update fails", async () => {
    const conn = await open("sqlmock", "");
    const mock = mockOf(conn);
    const failure = new Error("lock wait timeout exceeded");
    mock.expectBegin();
    mock.expectQuery("SELECT .* FROM orders").willReturnRows(newRows(["id", "status"]).addRow(3, PENDING));
    mock.expectExec("UPDATE orders").willReturnError(failure);
    mock.expectRollback();

    await expect(cancelOrder(conn, 3)).rejects.toBe(failure);
    await expect(conn.close()).resolves.toBeUndefined();
  });

  it("should fail verification when the code stops early", async () => {
    const conn = await open("sqlmock", "");
    const mock = mockOf(conn);
    mock.expectBegin();
    mock.expectQuery("SELECT .* FROM orders").willReturnRows(newRows(["status"]).addRow(1));
    mock.expectRollback();
    mock.expectExec("INSERT INTO order_log");

    await cancelOrder(conn, 4);

    await expect(conn.close()).rejects.toThrow("1 expectation was not met:\n  - exec matching /INSERT INTO order_log/ with any args");
  });
});
