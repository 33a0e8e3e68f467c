/**
 * CLI argument parsing and command dispatch
 * Main dispatcher - re-exports from cli/ subdirectory
 */

export { VERSION, showHelp, parseArgs, runCli } from "./cli/index.js";
export type { ParsedArgs } from "./cli/index.js";
export * from "./types.js";
export * from "./config.js";
export {
  convertCommand,
  type ConvertFailure,
  type ConvertSummary,
} from "./commands/convert.js";
