/**
 * Lexicon loader - discovers, reads and parses lexicon files under a directory.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { createDiagnostic, type Diagnostic } from "./types/diagnostic.js";
import { ok, error, collect, type Result } from "./types/result.js";
import { parseLexiconDocument } from "./lexicon/parser.js";
import { parseJson } from "./lexicon/json.js";
import type {
  DocumentOrigin,
  LexiconDocument,
  LexiconSet,
} from "./lexicon/types.js";

/**
 * A lexicon file found under a root directory.
 * `relativePath` always uses `/` separators.
 */
export type LexiconFile = {
  readonly absolutePath: string;
  readonly relativePath: string;
};

const toPosix = (p: string): string => p.split(path.sep).join("/");

const compareCodeUnits = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

const isJsonFile = (rootDir: string, entry: fs.Dirent): boolean => {
  if (!entry.name.endsWith(".json")) return false;
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  const target = path.join(rootDir, entry.name);
  return fs.existsSync(target) && fs.statSync(target).isFile();
};

/**
 * Find every `*.json` file below `rootDir`, sorted by relative path.
 *
 * Sorting is by UTF-16 code unit so the order never depends on locale.
 * Symlinked directories are not followed.
 */
export const discoverLexiconFiles = (
  rootDir: string
): Result<readonly LexiconFile[], Diagnostic> => {
  const root = path.resolve(rootDir);
  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    return error(
      createDiagnostic("LEX1001", `Not a directory: ${rootDir}`, undefined, {
        hint: "Pass the directory that contains the lexicon JSON files",
      })
    );
  }

  const files: LexiconFile[] = [];
  const visit = (dir: string): void => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const absolutePath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        visit(absolutePath);
      } else if (isJsonFile(dir, entry)) {
        files.push({
          absolutePath,
          relativePath: toPosix(path.relative(root, absolutePath)),
        });
      }
    }
  };

  try {
    visit(root);
  } catch (err) {
    return error(
      createDiagnostic(
        "LEX1002",
        `Failed to read directory ${rootDir}: ${err instanceof Error ? err.message : String(err)}`
      )
    );
  }

  return ok(
    files.sort((a, b) => compareCodeUnits(a.relativePath, b.relativePath))
  );
};

/**
 * Read and parse a single lexicon file.
 */
export const loadLexiconFile = (
  filePath: string,
  origin: DocumentOrigin,
  displayPath: string = filePath
): Result<LexiconDocument, Diagnostic> => {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return error(
      createDiagnostic(
        "LEX1002",
        `Failed to read lexicon file: ${err instanceof Error ? err.message : String(err)}`,
        { file: displayPath }
      )
    );
  }

  const parsed = parseJson(content);
  if (!parsed.ok) {
    return error(
      createDiagnostic("LEX1002", `Invalid JSON: ${parsed.error}`, {
        file: displayPath,
      })
    );
  }

  return parseLexiconDocument(
    parsed.value.value,
    displayPath,
    origin,
    parsed.value.keyOrder
  );
};

/**
 * Sort documents by nsid and reject duplicates.
 */
export const createLexiconSet = (
  documents: readonly LexiconDocument[]
): Result<LexiconSet, Diagnostic> => {
  const sorted = [...documents].sort((a, b) => compareCodeUnits(a.nsid, b.nsid));

  for (let i = 1; i < sorted.length; i++) {
    const previous = sorted[i - 1];
    const current = sorted[i];
    if (previous && current && previous.nsid === current.nsid) {
      const [first, second] = [previous.filePath, current.filePath].sort(
        compareCodeUnits
      );
      return error(
        createDiagnostic(
          "LEX1004",
          `Lexicon '${current.nsid}' is defined in both ${first} and ${second}`,
          { file: second, nsid: current.nsid }
        )
      );
    }
  }

  return ok({ documents: sorted });
};

/**
 * Load every lexicon document under `rootDir`.
 */
export const loadLexicons = (
  rootDir: string
): Result<LexiconSet, Diagnostic> => {
  const files = discoverLexiconFiles(rootDir);
  if (!files.ok) return files;

  const documents = collect(files.value, (file) =>
    loadLexiconFile(file.absolutePath, "input", file.relativePath)
  );
  if (!documents.ok) return documents;

  return createLexiconSet(documents.value);
};
