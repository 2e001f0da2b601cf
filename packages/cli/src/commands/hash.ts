/**
 * lexmodel hash command - print the cache key of a lexicon directory
 */

import { hashLexicons, type Diagnostic, type Result } from "@lexmodel/frontend";
import type { ResolvedConfig } from "../types.js";

export const hashCommand = (
  config: ResolvedConfig
): Result<string, Diagnostic> => {
  const digest = hashLexicons(config.lexiconDirectory, config.prefix);
  if (digest.ok) {
    console.log(digest.value);
  }
  return digest;
};
