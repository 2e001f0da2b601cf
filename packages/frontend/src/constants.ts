/**
 * Compiler constants
 */

import { createRequire } from "node:module";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../package.json");

const readVersion = (manifest: unknown): string =>
  typeof manifest === "object" &&
  manifest !== null &&
  "version" in manifest &&
  typeof manifest.version === "string"
    ? manifest.version
    : "0.0.0";

/**
 * Compiler version. Part of every cache key, so an upgrade never reuses
 * output produced by an older release.
 */
export const VERSION = readVersion(packageJson);
