// ABOUTME: Registers the mock under the "sqlmock" driver name and creates mock sessions.
// ABOUTME: Code under test opens it like any other driver; tests reach the controller via mockOf().

import type { MockOptions } from "./config.js";
import { registerDriver } from "./driver.js";
import { UsageError } from "./errors.js";
import type { MockController } from "./mock-controller.js";
import { MockSession } from "./mock-session.js";
import type { Connection, Driver } from "./types.js";

export const DRIVER_NAME = "sqlmock";

class MockDriver implements Driver {
  // The connection string is ignored: every open yields a fresh session.
  async open(_dsn: string): Promise<Connection> {
    return new MockSession();
  }
}

registerDriver(DRIVER_NAME, new MockDriver());

export function mockOf(connection: Connection): MockController {
  if (!(connection instanceof MockSession)) {
    throw new UsageError(`connection was not opened through the "${DRIVER_NAME}" driver`);
  }
  return connection.mock;
}

export function createMock(options?: MockOptions): { db: MockSession; mock: MockController } {
  const db = new MockSession(options);
  return { db, mock: db.mock };
}
