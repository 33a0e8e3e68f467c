/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import { ok, error, type Result } from "@bridgeforge/frontend";
import type { BridgeforgeConfig, CliOptions, ResolvedConfig } from "./types.js";

export const CONFIG_FILE_NAME = "bridgeforge.json";

const DEFAULT_OUTPUT_DIRECTORY = "generated";

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((entry) => typeof entry === "string");

/**
 * Check the parsed document field by field
 */
export const validateConfig = (
  data: unknown
): Result<BridgeforgeConfig, string> => {
  if (!isRecord(data)) {
    return error(`${CONFIG_FILE_NAME}: must be an object`);
  }

  const {
    $schema,
    input,
    includes,
    extraInclude,
    podTypes,
    legacyMode,
    outputDirectory,
  } = data;

  if (typeof input !== "string" || input.length === 0) {
    return error(`${CONFIG_FILE_NAME}: 'input' is required`);
  }
  if (!isStringArray(includes)) {
    return error(`${CONFIG_FILE_NAME}: 'includes' must be an array of strings`);
  }
  if (extraInclude !== undefined && typeof extraInclude !== "string") {
    return error(`${CONFIG_FILE_NAME}: 'extraInclude' must be a string`);
  }
  if (podTypes !== undefined && !isStringArray(podTypes)) {
    return error(`${CONFIG_FILE_NAME}: 'podTypes' must be an array of strings`);
  }
  if (legacyMode !== undefined && typeof legacyMode !== "boolean") {
    return error(`${CONFIG_FILE_NAME}: 'legacyMode' must be a boolean`);
  }
  if (outputDirectory !== undefined && typeof outputDirectory !== "string") {
    return error(`${CONFIG_FILE_NAME}: 'outputDirectory' must be a string`);
  }

  return ok({
    ...(typeof $schema === "string" ? { $schema } : {}),
    input,
    includes,
    ...(extraInclude === undefined ? {} : { extraInclude }),
    ...(podTypes === undefined ? {} : { podTypes }),
    ...(legacyMode === undefined ? {} : { legacyMode }),
    ...(outputDirectory === undefined ? {} : { outputDirectory }),
  });
};

/**
 * Load bridgeforge.json from a path
 */
export const loadConfig = (
  configPath: string
): Result<BridgeforgeConfig, string> => {
  if (!existsSync(configPath)) {
    return error(`Config file not found: ${configPath}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (err) {
    return error(
      `Failed to parse ${CONFIG_FILE_NAME}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return validateConfig(data);
};

/**
 * Find bridgeforge.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      // Hit root
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI args.
 * Command-line includes and value types are appended to the file's.
 */
export const resolveConfig = (
  config: BridgeforgeConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  inputFile?: string
): ResolvedConfig => ({
  projectRoot,
  inputPath: resolve(projectRoot, inputFile ?? config.input),
  includes: [...config.includes, ...(cliOptions.include ?? [])],
  extraInclude: config.extraInclude,
  podTypes: [...(config.podTypes ?? []), ...(cliOptions.pod ?? [])],
  legacyMode: cliOptions.legacy ?? config.legacyMode ?? false,
  outputDirectory: resolve(
    projectRoot,
    cliOptions.out ?? config.outputDirectory ?? DEFAULT_OUTPUT_DIRECTORY
  ),
  verbose: cliOptions.verbose ?? false,
  quiet: cliOptions.quiet ?? false,
});
