/**
 * CLI version, read from package.json at runtime.
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

function getPackageVersion(): string {
  try {
    const here = dirname(fileURLToPath(import.meta.url));
    // src/cli/ or dist/cli/ -> package root
    const packageJson: unknown = JSON.parse(readFileSync(join(here, "../../package.json"), "utf-8"));
    if (
      typeof packageJson === "object" &&
      packageJson !== null &&
      "version" in packageJson &&
      typeof packageJson.version === "string"
    ) {
      return packageJson.version;
    }
    return "0.0.0";
  } catch {
    return "0.0.0";
  }
}

export const VERSION = getPackageVersion();
