import type { Connection, Driver } from "./types.js";

const registry = new Map<string, Driver>();

export function registerDriver(name: string, driver: Driver): void {
  if (registry.has(name)) {
    throw new Error(`driver "${name}" is already registered`);
  }
  registry.set(name, driver);
}

export function drivers(): string[] {
  return [...registry.keys()].sort();
}

/** Opens a connection through the driver registered under `driverName`. */
export async function open(driverName: string, dsn: string): Promise<Connection> {
  const driver = registry.get(driverName);
  if (!driver) {
    throw new Error(`unknown driver "${driverName}" (registered: ${drivers().join(", ") || "none"})`);
  }
  return driver.open(dsn);
}
