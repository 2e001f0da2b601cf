/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync, statSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { ok, error, type Result } from "@lexmodel/frontend";
import type { CliOptions, LexmodelConfig, ResolvedConfig } from "./types.js";
import {
  CONFIG_FILE,
  DEFAULT_LEXICON_DIR,
  DEFAULT_OUTPUT_DIR,
} from "./cli/constants.js";
import { currentEnvironment, getCacheDirectory } from "./cache/directory.js";
import type { CacheEnvironment } from "./cache/directory.js";

type JsonObject = { readonly [key: string]: unknown };

const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const STRING_OPTIONS = [
  "$schema",
  "lexiconDirectory",
  "outputDirectory",
  "prefix",
  "cacheDirectory",
] as const;

const BOOLEAN_OPTIONS = ["cache"] as const;

const KNOWN_OPTIONS: ReadonlySet<string> = new Set([
  ...STRING_OPTIONS,
  ...BOOLEAN_OPTIONS,
]);

/**
 * Validate the parsed contents of lexmodel.json
 */
export const parseConfig = (raw: unknown): Result<LexmodelConfig, string> => {
  if (!isJsonObject(raw)) {
    return error(`${CONFIG_FILE}: expected a JSON object`);
  }

  const unknown = Object.keys(raw).find((key) => !KNOWN_OPTIONS.has(key));
  if (unknown !== undefined) {
    return error(`${CONFIG_FILE}: unknown option '${unknown}'`);
  }

  const config: { -readonly [K in keyof LexmodelConfig]: LexmodelConfig[K] } = {};
  for (const key of STRING_OPTIONS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "string") {
      return error(`${CONFIG_FILE}: '${key}' must be a string`);
    }
    config[key] = value;
  }
  for (const key of BOOLEAN_OPTIONS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== "boolean") {
      return error(`${CONFIG_FILE}: '${key}' must be a boolean`);
    }
    config[key] = value;
  }

  return ok(config);
};

/**
 * Load lexmodel.json
 */
export const loadConfig = (
  configPath: string
): Result<LexmodelConfig, string> => {
  if (!existsSync(configPath)) {
    return error(`Config file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    return error(
      `Failed to parse ${CONFIG_FILE}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return parseConfig(raw);
};

/**
 * Find lexmodel.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find lexmodel.json or hit root
  while (true) {
    const configPath = join(currentDir, CONFIG_FILE);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

const defaultLexiconDirectory = (cwd: string): string => {
  const candidate = resolve(cwd, DEFAULT_LEXICON_DIR);
  return existsSync(candidate) && statSync(candidate).isDirectory()
    ? candidate
    : resolve(cwd);
};

/**
 * Resolve final configuration from file + CLI args
 *
 * CLI paths are relative to `cwd`, config paths to `projectRoot`.
 * @param lexiconDir - Positional lexicon directory argument
 */
export const resolveConfig = (
  config: LexmodelConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  cwd: string,
  lexiconDir?: string,
  environment: CacheEnvironment = currentEnvironment()
): ResolvedConfig => {
  const fromCli = (path: string | undefined): string | undefined =>
    path !== undefined ? resolve(cwd, path) : undefined;
  const fromConfig = (path: string | undefined): string | undefined =>
    path !== undefined ? resolve(projectRoot, path) : undefined;

  return {
    projectRoot,
    lexiconDirectory:
      fromCli(lexiconDir) ??
      fromConfig(config.lexiconDirectory) ??
      defaultLexiconDirectory(cwd),
    outputDirectory:
      fromCli(cliOptions.out) ??
      fromConfig(config.outputDirectory) ??
      resolve(cwd, DEFAULT_OUTPUT_DIR),
    prefix: cliOptions.prefix ?? config.prefix,
    cache: cliOptions.noCache ? false : (config.cache ?? true),
    cacheDirectory:
      fromCli(cliOptions.cacheDir) ??
      fromConfig(config.cacheDirectory) ??
      getCacheDirectory(environment),
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
