import os from "node:os";
import path from "node:path";

/**
 * Expand a leading `~` to the user's home directory.
 */
export function expandHome(p: string): string {
  if (p === "~" || p.startsWith("~/") || p.startsWith("~\\")) {
    const home = process.env["HOME"] || process.env["USERPROFILE"] || os.homedir();
    return home ? path.join(home, p.slice(1)) : p;
  }
  return p;
}

/**
 * Default data directory
 * 1. CARILLON_HOME environment variable
 * 2. ~/.carillon
 */
export function getDefaultDataDirectory(): string {
  const override = process.env["CARILLON_HOME"];
  if (override && override.trim().length > 0) {
    return path.resolve(expandHome(override));
  }
  return path.join(os.homedir(), ".carillon");
}
