/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  lexiconDir?: string;
  options: CliOptions;
  /** Usage errors, in argument order. */
  errors: string[];
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  const errors: string[] = [];
  let command = "";
  let lexiconDir: string | undefined;

  const takeValue = (flag: string, index: number): string | undefined => {
    const value = args[index];
    if (value === undefined || value.startsWith("-")) {
      errors.push(`Option '${flag}' requires a value`);
      return undefined;
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // Positional lexicon directory
    if (!arg.startsWith("-")) {
      if (lexiconDir === undefined) {
        lexiconDir = arg;
      } else {
        errors.push(`Unexpected argument '${arg}'`);
      }
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {}, errors: [] };
      case "-v":
      case "--version":
        return { command: "version", options: {}, errors: [] };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config": {
        const value = takeValue(arg, i + 1);
        if (value !== undefined) {
          options.config = value;
          i++;
        }
        break;
      }
      case "-o":
      case "--out": {
        const value = takeValue(arg, i + 1);
        if (value !== undefined) {
          options.out = value;
          i++;
        }
        break;
      }
      case "-p":
      case "--prefix": {
        const value = takeValue(arg, i + 1);
        if (value !== undefined) {
          options.prefix = value;
          i++;
        }
        break;
      }
      case "--cache-dir": {
        const value = takeValue(arg, i + 1);
        if (value !== undefined) {
          options.cacheDir = value;
          i++;
        }
        break;
      }
      case "--no-cache":
        options.noCache = true;
        break;
      default:
        errors.push(`Unknown option '${arg}'`);
    }
  }

  return {
    command,
    ...(lexiconDir !== undefined ? { lexiconDir } : {}),
    options,
    errors,
  };
};
