/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  inputFile?: string;
  options: CliOptions;
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  let inputFile: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue; // Skip if undefined

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // First positional arg after command (raw module file)
    if (command && !inputFile && !arg.startsWith("-")) {
      inputFile = arg;
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", options: {} };
      case "-v":
      case "--version":
        return { command: "version", options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config":
        options.config = args[++i] ?? "";
        break;
      case "-o":
      case "--out":
        options.out = args[++i] ?? "";
        break;
      case "-I":
      case "--include":
        {
          const header = args[++i] ?? "";
          if (header) {
            options.include = [...(options.include ?? []), header];
          }
        }
        break;
      case "--pod":
        {
          const typeName = args[++i] ?? "";
          if (typeName) {
            options.pod = [...(options.pod ?? []), typeName];
          }
        }
        break;
      case "--legacy":
        options.legacy = true;
        break;
    }
  }

  return inputFile === undefined
    ? { command, options }
    : { command, inputFile, options };
};
