import pino, { type Logger } from "pino";
import type { ResolvedMockOptions } from "./config.js";

let sessionCounter = 0;

export function createSessionLogger(options: ResolvedMockOptions): Logger {
  const session = ++sessionCounter;
  if (options.logger) {
    return options.logger.child({ session }, { level: options.logLevel });
  }
  return pino({ name: "sqlmock", level: options.logLevel }).child({ session });
}
