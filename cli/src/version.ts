/**
 * CLI version, read from the package manifest beside src/ and dist/
 */

import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";

const packageDir = path.join(path.dirname(fileURLToPath(import.meta.url)), "..");

export function readCliVersion(): string {
  const manifest: unknown = JSON.parse(
    fs.readFileSync(path.join(packageDir, "package.json"), "utf8")
  );
  if (
    typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }
  return "0.0.0";
}

export const VERSION = readCliVersion();
