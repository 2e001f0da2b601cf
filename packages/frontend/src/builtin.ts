/**
 * Bundled com.atproto lexicons
 *
 * Available as resolution targets for every run. An input document with the
 * same nsid replaces the bundled one.
 */

import { fileURLToPath } from "node:url";
import type { Diagnostic } from "./types/diagnostic.js";
import { collect, type Result } from "./types/result.js";
import { discoverLexiconFiles, loadLexiconFile } from "./loader.js";
import type { LexiconDocument } from "./lexicon/types.js";

export const BUILTIN_LEXICON_DIR = fileURLToPath(
  new URL("../lexicons/", import.meta.url)
);

export const loadBuiltinLexicons = (): Result<
  readonly LexiconDocument[],
  Diagnostic
> => {
  const files = discoverLexiconFiles(BUILTIN_LEXICON_DIR);
  if (!files.ok) return files;

  return collect(files.value, (file) =>
    loadLexiconFile(file.absolutePath, "builtin", `<builtin>/${file.relativePath}`)
  );
};
