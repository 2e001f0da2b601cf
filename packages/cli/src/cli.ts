/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export { VERSION, showHelp, type ParsedArgs, parseArgs, runCli } from "./cli/index.js";
