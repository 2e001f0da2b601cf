/**
 * lexmodel generate command - compile lexicons into models.py through the cache
 */

import { relative } from "node:path";
import type { Diagnostic, Result } from "@lexmodel/frontend";
import { runCachedGenerate, type CacheOutcome } from "../cache/gate.js";
import type { ResolvedConfig } from "../types.js";

const display = (path: string): string => relative(process.cwd(), path) || ".";

const summarize = (outcome: CacheOutcome): string =>
  outcome.status === "hit"
    ? `cache hit (${outcome.digest}) - copied ${outcome.files.length} file(s)`
    : `generated ${outcome.files.length} file(s) (cached as ${outcome.digest})`;

/**
 * Generate models for the resolved configuration
 */
export const generateCommand = (
  config: ResolvedConfig
): Result<CacheOutcome, Diagnostic> => {
  const { lexiconDirectory, outputDirectory, prefix, verbose, quiet } = config;

  if (verbose) {
    console.log(`Lexicons: ${display(lexiconDirectory)}`);
    if (prefix !== undefined) {
      console.log(`Prefix: ${prefix}`);
    }
  }

  const result = runCachedGenerate({
    inputDir: lexiconDirectory,
    outputDir: outputDirectory,
    prefix,
    cacheRoot: config.cacheDirectory,
    useCache: config.cache,
  });
  if (!result.ok) return result;

  if (!quiet) {
    console.log(summarize(result.value));
  }
  if (verbose) {
    for (const file of result.value.files) {
      console.log(`  ${display(file)}`);
    }
    console.log(`  cache: ${result.value.slot}`);
  }

  return result;
};
