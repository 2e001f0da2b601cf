/**
 * CLI constants
 */

export { VERSION } from "@lexmodel/frontend";

export const CONFIG_FILE = "lexmodel.json";

/** Used when it exists; the working directory otherwise. */
export const DEFAULT_LEXICON_DIR = "lexicons";

export const DEFAULT_OUTPUT_DIR = "generated";

/** Diagnostic or configuration error. */
export const EXIT_FAILURE = 1;

/** Unknown command or bad arguments. */
export const EXIT_USAGE = 2;
