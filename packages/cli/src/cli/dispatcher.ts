/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { formatDiagnostic } from "@bridgeforge/frontend";
import {
  CONFIG_FILE_NAME,
  loadConfig,
  findConfig,
  resolveConfig,
} from "../config.js";
import { convertCommand } from "../commands/convert.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

/**
 * Main CLI entry point
 */
export const runCli = async (args: string[]): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`bridgeforge v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  if (parsed.command !== "convert") {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'bridgeforge --help' for usage information");
    return 1;
  }

  // Load config
  const configPath = parsed.options.config
    ? resolve(process.cwd(), parsed.options.config)
    : findConfig(process.cwd());

  if (!configPath) {
    console.error(`Error: No ${CONFIG_FILE_NAME} found`);
    console.error(`Create ${CONFIG_FILE_NAME} or pass one with --config`);
    return 3;
  }

  const configResult = loadConfig(configPath);
  if (!configResult.ok) {
    console.error(`Error: ${configResult.error}`);
    return 1;
  }

  // Paths given on the command line are relative to the working directory;
  // paths in the file are relative to the directory containing it
  const cwd = process.cwd();
  const { out } = parsed.options;
  const config = resolveConfig(
    configResult.value,
    out ? { ...parsed.options, out: resolve(cwd, out) } : parsed.options,
    dirname(configPath),
    parsed.inputFile === undefined ? undefined : resolve(cwd, parsed.inputFile)
  );

  const result = convertCommand(config);
  if (!result.ok) {
    for (const diagnostic of result.error.diagnostics) {
      console.error(formatDiagnostic(diagnostic));
    }
    return result.error.stage === "input" ? 4 : 5;
  }
  return 0;
};
