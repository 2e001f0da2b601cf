/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { formatDiagnostic, type Diagnostic } from "@lexmodel/frontend";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { generateCommand } from "../commands/generate.js";
import { hashCommand } from "../commands/hash.js";
import type { LexmodelConfig } from "../types.js";
import { EXIT_FAILURE, EXIT_USAGE, VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const reportDiagnostic = (diagnostic: Diagnostic): number => {
  console.error(`Error: ${formatDiagnostic(diagnostic)}`);
  return EXIT_FAILURE;
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`lexmodel ${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  if (parsed.command !== "generate" && parsed.command !== "hash") {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'lexmodel --help' for usage information");
    return EXIT_USAGE;
  }

  const [usageError] = parsed.errors;
  if (usageError !== undefined) {
    console.error(`Error: ${usageError}`);
    console.error("Run 'lexmodel --help' for usage information");
    return EXIT_USAGE;
  }

  // Load config
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  let fileConfig: LexmodelConfig = {};
  if (configPath) {
    const configResult = loadConfig(configPath);
    if (!configResult.ok) {
      console.error(`Error: ${configResult.error}`);
      return EXIT_FAILURE;
    }
    fileConfig = configResult.value;
  }

  // Project root is the directory containing lexmodel.json
  const projectRoot = configPath ? dirname(configPath) : cwd;

  const config = resolveConfig(
    fileConfig,
    parsed.options,
    projectRoot,
    cwd,
    parsed.lexiconDir
  );

  if (config.verbose && configPath) {
    console.log(`Config: ${configPath}`);
  }

  // Dispatch to command handlers
  const result =
    parsed.command === "generate" ? generateCommand(config) : hashCommand(config);
  return result.ok ? 0 : reportDiagnostic(result.error);
};
