import type { Logger } from "pino";
import { z } from "zod";
import { UsageError } from "./errors.js";

export const LOG_LEVEL_ENV = "SQL_MOCK_LOG_LEVEL";

const logLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

export const mockOptionsSchema = z
  .object({
    queryMatcher: z.enum(["regexp", "equal"]).default("regexp"),
    logLevel: logLevelSchema.optional(),
  })
  .strict();

export type MockOptions = z.input<typeof mockOptionsSchema> & {
  /** Parent logger; the session logs through a child of it. */
  logger?: Logger;
};

export interface ResolvedMockOptions {
  queryMatcher: "regexp" | "equal";
  logLevel: string;
  logger: Logger | undefined;
}

export function resolveMockOptions(
  options: MockOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedMockOptions {
  const { logger, ...rest } = options;
  const parsed = mockOptionsSchema.safeParse(rest);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new UsageError(`invalid mock options: ${issues}`);
  }

  let logLevel: string | undefined = parsed.data.logLevel;
  if (logLevel === undefined) {
    const fromEnv = logLevelSchema.safeParse(env[LOG_LEVEL_ENV]);
    if (fromEnv.success) {
      logLevel = fromEnv.data;
    } else {
      logLevel = logger ? logger.level : "silent";
    }
  }

  return { queryMatcher: parsed.data.queryMatcher, logLevel, logger };
}
