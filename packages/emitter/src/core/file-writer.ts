/**
 * Atomic file output
 */

import { randomBytes } from "node:crypto";
import { mkdirSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import {
  ok,
  error,
  createDiagnostic,
  type Diagnostic,
  type Result,
} from "@lexmodel/frontend";

const describe = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

/**
 * Remove a leftover temp file. The write error is the one reported, so a
 * failure here (no file, parent not a directory) is ignored.
 */
const removeTempFile = (tempPath: string): void => {
  try {
    rmSync(tempPath, { force: true });
  } catch {
    return;
  }
};

/**
 * Write `content` to a temporary file next to `filePath`, then rename it into
 * place. Readers see either the old file or the complete new one.
 */
export const writeFileAtomic = (
  filePath: string,
  content: string
): Result<string, Diagnostic> => {
  const dir = dirname(filePath);
  const tempPath = join(
    dir,
    `.${basename(filePath)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`
  );

  try {
    mkdirSync(dir, { recursive: true });
    writeFileSync(tempPath, content, "utf-8");
    renameSync(tempPath, filePath);
  } catch (err) {
    removeTempFile(tempPath);
    return error(
      createDiagnostic(
        "LEX4001",
        `Failed to write ${filePath}: ${describe(err)}`,
        { file: filePath }
      )
    );
  }

  return ok(filePath);
};
