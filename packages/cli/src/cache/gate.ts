/**
 * Cache gate
 *
 * Output for a lexicon set is stored under `<cacheRoot>/<digest>/`, keyed by
 * `hashLexicons`. A hit copies the stored files into the output directory and
 * skips the compiler entirely.
 */

import {
  copyFileSync,
  existsSync,
  mkdirSync,
  mkdtempSync,
  readFileSync,
  readdirSync,
  renameSync,
  rmSync,
  statSync,
} from "node:fs";
import { basename, join } from "node:path";
import {
  ok,
  error,
  collect,
  createDiagnostic,
  hashLexicons,
  type Diagnostic,
  type Result,
} from "@lexmodel/frontend";
import { generate, writeFileAtomic } from "@lexmodel/emitter";

export type CachedGenerateOptions = {
  readonly inputDir: string;
  readonly outputDir: string;
  readonly prefix?: string;
  readonly cacheRoot: string;
  /** When false the lookup is skipped; fresh output is still stored. */
  readonly useCache: boolean;
};

export type CacheOutcome = {
  readonly status: "hit" | "miss";
  readonly digest: string;
  /** Cache slot directory for this digest. */
  readonly slot: string;
  /** Files written to the output directory. */
  readonly files: readonly string[];
};

const describe = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

const cacheFailure = (
  action: string,
  path: string,
  err: unknown
): Diagnostic =>
  createDiagnostic("LEX4001", `Failed to ${action} ${path}: ${describe(err)}`, {
    file: path,
  });

const isDirectory = (path: string): boolean =>
  existsSync(path) && statSync(path).isDirectory();

/**
 * Copy every file of a slot into the output directory, in name order.
 */
const restoreSlot = (
  slot: string,
  outputDir: string
): Result<readonly string[], Diagnostic> => {
  let names: string[];
  try {
    names = readdirSync(slot, { withFileTypes: true })
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    return error(cacheFailure("read cache slot", slot, err));
  }

  return collect(names, (name): Result<string, Diagnostic> => {
    const cached = join(slot, name);
    let content: string;
    try {
      content = readFileSync(cached, "utf-8");
    } catch (err) {
      return error(cacheFailure("read cached file", cached, err));
    }
    return writeFileAtomic(join(outputDir, name), content);
  });
};

/**
 * Remove a staging directory after a failed store. The store error is the one
 * reported.
 */
const discardStaging = (staging: string): void => {
  try {
    rmSync(staging, { recursive: true, force: true });
  } catch {
    return;
  }
};

/**
 * Copy freshly generated files into a temporary directory, then rename it to
 * the slot. When another run published the slot first, its copy wins.
 */
const storeSlot = (
  cacheRoot: string,
  slot: string,
  files: readonly string[]
): Result<void, Diagnostic> => {
  let staging: string;
  try {
    mkdirSync(cacheRoot, { recursive: true });
    staging = mkdtempSync(join(cacheRoot, `.${basename(slot)}-`));
  } catch (err) {
    return error(cacheFailure("create cache directory", cacheRoot, err));
  }

  try {
    for (const file of files) {
      copyFileSync(file, join(staging, basename(file)));
    }
    if (isDirectory(slot)) {
      rmSync(staging, { recursive: true, force: true });
      return ok(undefined);
    }
    renameSync(staging, slot);
  } catch (err) {
    discardStaging(staging);
    if (isDirectory(slot)) return ok(undefined);
    return error(cacheFailure("store cache slot", slot, err));
  }

  return ok(undefined);
};

/**
 * Generate through the cache: copy a stored slot on a hit, otherwise run the
 * compiler and store its output.
 */
export const runCachedGenerate = (
  options: CachedGenerateOptions
): Result<CacheOutcome, Diagnostic> => {
  const digest = hashLexicons(options.inputDir, options.prefix);
  if (!digest.ok) return digest;

  const slot = join(options.cacheRoot, digest.value);

  if (options.useCache && isDirectory(slot)) {
    const files = restoreSlot(slot, options.outputDir);
    if (!files.ok) return files;
    return ok({ status: "hit", digest: digest.value, slot, files: files.value });
  }

  const files = generate(options.inputDir, options.outputDir, options.prefix);
  if (!files.ok) return files;

  const stored = storeSlot(options.cacheRoot, slot, files.value);
  if (!stored.ok) return stored;

  return ok({ status: "miss", digest: digest.value, slot, files: files.value });
};
