/**
 * Content-addressed cache key for a lexicon directory
 */

import { createHash } from "node:crypto";
import * as fs from "node:fs";
import { createDiagnostic, type Diagnostic } from "./types/diagnostic.js";
import { ok, error, type Result } from "./types/result.js";
import { discoverLexiconFiles } from "./loader.js";
import { VERSION } from "./constants.js";

/** Hex characters kept from the SHA-256 digest. */
export const DIGEST_LENGTH = 16;

export type HashOptions = {
  /** Overrides the compiler version mixed into the digest. */
  readonly version?: string;
};

const NUL = Buffer.from([0]);

/**
 * Fingerprint the compiler version, the prefix filter and every `*.json` file
 * under `inputDir` (relative path and raw bytes, in sorted path order).
 *
 * Each part is NUL-terminated so moving bytes between a file name and its
 * content, or between two files, changes the digest.
 */
export const hashLexicons = (
  inputDir: string,
  prefix?: string,
  options: HashOptions = {}
): Result<string, Diagnostic> => {
  const files = discoverLexiconFiles(inputDir);
  if (!files.ok) return files;

  const hasher = createHash("sha256");
  hasher.update(options.version ?? VERSION).update(NUL);

  if (prefix !== undefined) {
    hasher.update("prefix:").update(prefix).update(NUL);
  }

  for (const file of files.value) {
    let content: Buffer;
    try {
      content = fs.readFileSync(file.absolutePath);
    } catch (err) {
      return error(
        createDiagnostic(
          "LEX1002",
          `Failed to read lexicon file: ${err instanceof Error ? err.message : String(err)}`,
          { file: file.relativePath }
        )
      );
    }
    hasher.update(file.relativePath).update(NUL);
    hasher.update(content).update(NUL);
  }

  return ok(hasher.digest("hex").slice(0, DIGEST_LENGTH));
};
