/**
 * lexmodel frontend - lexicon loading and reference resolution
 */

export {
  type DiagnosticCode,
  type DiagnosticLocation,
  type Diagnostic,
  type ErrorKind,
  createDiagnostic,
  formatDiagnostic,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./lexicon/types.js";
export { isValidNsid, matchesNamespacePrefix } from "./lexicon/nsid.js";
export { parseLexiconDocument, parseDefinition } from "./lexicon/parser.js";
export { type KeyOrder, type ParsedJson, parseJson } from "./lexicon/json.js";
export {
  type LexiconFile,
  discoverLexiconFiles,
  loadLexiconFile,
  loadLexicons,
  createLexiconSet,
} from "./loader.js";
export { BUILTIN_LEXICON_DIR, loadBuiltinLexicons } from "./builtin.js";
export { VERSION } from "./constants.js";
export { DIGEST_LENGTH, type HashOptions, hashLexicons } from "./hash.js";
export * from "./symbol-table.js";
export * from "./resolver.js";
export * from "./graph/index.js";

import type { Diagnostic } from "./types/diagnostic.js";
import type { Result } from "./types/result.js";
import { loadLexicons } from "./loader.js";
import { loadBuiltinLexicons } from "./builtin.js";
import { resolveLexicons } from "./resolver.js";
import type { Resolution } from "./resolver.js";

export type FrontendOptions = {
  readonly prefix?: string;
  /** Skip the bundled com.atproto lexicons. */
  readonly withoutBuiltins?: boolean;
};

/**
 * Load a lexicon directory and resolve it against the bundled lexicons.
 */
export const analyzeLexicons = (
  inputDir: string,
  options: FrontendOptions = {}
): Result<Resolution, Diagnostic> => {
  const lexicons = loadLexicons(inputDir);
  if (!lexicons.ok) return lexicons;

  const builtins = options.withoutBuiltins ? undefined : loadBuiltinLexicons();
  if (builtins && !builtins.ok) return builtins;

  return resolveLexicons(lexicons.value, {
    prefix: options.prefix,
    builtins: builtins?.value,
  });
};
