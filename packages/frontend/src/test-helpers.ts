/**
 * Fixture helpers shared by the frontend tests
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

export const lexicon = (
  id: string,
  defs: Record<string, unknown>
): Record<string, unknown> => ({ lexicon: 1, id, defs });

/**
 * Write files into a fresh temporary directory. Object values are written as
 * JSON, strings verbatim.
 */
export const createFixtureDir = (
  files: Record<string, unknown>
): string => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "lexmodel-test-"));
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(dir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(
      filePath,
      typeof content === "string" ? content : JSON.stringify(content, null, 2)
    );
  }
  return dir;
};

export const removeFixtureDir = (dir: string): void => {
  fs.rmSync(dir, { recursive: true, force: true });
};
