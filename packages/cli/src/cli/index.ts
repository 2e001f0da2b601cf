/**
 * CLI - Public API
 */

export { VERSION } from "./constants.js";
export { showHelp } from "./help.js";
export { type ParsedArgs, parseArgs } from "./parser.js";
export { runCli } from "./dispatcher.js";
