import { describe, it, expect } from "vitest";
import pino from "pino";
import { createMock, UsageError } from "../src/index.js";
import { LOG_LEVEL_ENV, resolveMockOptions } from "../src/config.js";

describe("mock options", () => {
  it("should default to regexp matching and a silent logger", () => {
    expect(resolveMockOptions({}, {})).toEqual({ queryMatcher: "regexp", logLevel: "silent", logger: undefined });
  });

  it("should read the log level from the environment", () => {
    expect(resolveMockOptions({}, { [LOG_LEVEL_ENV]: "debug" }).logLevel).toBe("debug");
    expect(resolveMockOptions({}, { [LOG_LEVEL_ENV]: "loud" }).logLevel).toBe("silent");
  });

  it("should prefer an explicit level over the environment", () => {
    expect(resolveMockOptions({ logLevel: "warn" }, { [LOG_LEVEL_ENV]: "debug" }).logLevel).toBe("warn");
  });

  it("should keep the level of a supplied logger", () => {
    const logger = pino({ level: "error" });
    expect(resolveMockOptions({ logger }, {}).logLevel).toBe("error");
  });

  it("should reject unknown matchers and keys", () => {
    expect(() => createMock(JSON.parse('{"queryMatcher":"fuzzy"}'))).toThrow(UsageError);
    expect(() => resolveMockOptions(JSON.parse('{"strict":true}'), {})).toThrow(
      "invalid mock options: options: Unrecognized key(s) in object: 'strict'"
    );
  });

  it("should match whole statements in equal mode", async () => {
    const { db, mock } = createMock({ queryMatcher: "equal" });
    mock.expectQuery("SELECT id FROM orders WHERE status = ?").withArgs("pending");
    mock.expectQuery("SELECT id FROM orders");

    await db.query("SELECT id\n  FROM orders\n  WHERE status = ?", ["pending"]);
    await expect(db.query("SELECT id FROM orders LIMIT 10")).rejects.toMatchObject({ dimension: "pattern" });
  });

  it("should log through a child of the supplied logger", async () => {
    const lines: string[] = [];
    const logger = pino({ level: "debug" }, { write: (line: string) => void lines.push(line) });
    const { db, mock } = createMock({ logger });
    mock.expectExec("VACUUM");

    await db.exec("VACUUM");

    const entry = JSON.parse(lines[0]);
    expect(entry.msg).toBe("matched exec matching /VACUUM/ with any args");
    expect(entry.kind).toBe("exec");
    expect(typeof entry.session).toBe("number");
  });
});
