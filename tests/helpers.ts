import { createMock, type MockOptions } from "../src/index.js";

export function createTestDb(options?: MockOptions) {
  return createMock(options);
}
