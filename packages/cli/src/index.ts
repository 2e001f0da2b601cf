/**
 * lexmodel CLI - public API of the command-line package
 */

export { runCli } from "./cli.js";
export * from "./types.js";
export * from "./config.js";
export * from "./cache/index.js";
