/**
 * Type definitions for CLI
 */

/**
 * Project configuration file (lexmodel.json). Paths are relative to the
 * file's directory.
 */
export type LexmodelConfig = {
  readonly $schema?: string;
  readonly lexiconDirectory?: string;
  readonly outputDirectory?: string;
  readonly prefix?: string;
  /** Look up the cache before generating. Output is stored either way. */
  readonly cache?: boolean;
  readonly cacheDirectory?: string;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  out?: string;
  prefix?: string;
  noCache?: boolean;
  cacheDir?: string;
};

/**
 * Combined configuration (from file + CLI args), every path absolute
 */
export type ResolvedConfig = {
  readonly projectRoot: string; // Directory containing lexmodel.json, or the working directory
  readonly lexiconDirectory: string;
  readonly outputDirectory: string;
  readonly prefix: string | undefined;
  readonly cache: boolean;
  readonly cacheDirectory: string;
  readonly verbose: boolean;
  readonly quiet: boolean;
};
