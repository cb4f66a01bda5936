/**
 * Version module - reads the version string from package.json
 */

import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";

// src/version.ts and dist/version.js both sit one level below the root
const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: unknown = JSON.parse(
  readFileSync(join(__dirname, "../package.json"), "utf-8")
);

function readVersion(value: unknown): string {
  if (value && typeof value === "object" && "version" in value && typeof value.version === "string") {
    return value.version;
  }
  return "0.0.0";
}

export const VERSION = readVersion(pkg);
