/**
 * version.ts — Package version lookup
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

const PKG_PATH = fileURLToPath(new URL("../package.json", import.meta.url));

/** Read current version from package.json */
export function getCurrentVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(PKG_PATH, "utf-8"));
    if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch (err: unknown) {
    if (!(err instanceof Error && "code" in err && err.code === "ENOENT")) throw err;
  }
  return "0.0.0";
}
