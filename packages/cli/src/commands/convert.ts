/**
 * bridgeforge convert command - raw module in, bridge source and side
 * tables out
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { basename, join, relative } from "node:path";
import {
  error,
  loadRawModuleFile,
  ok,
  parseQualifiedName,
  qualifiedNameToString,
  type AdditionalNeed,
  type Diagnostic,
  type EncounteredType,
  type Result,
} from "@bridgeforge/frontend";
import {
  convertBindings,
  convertErrorToDiagnostic,
} from "@bridgeforge/converter";
import { emitBridgeFile } from "@bridgeforge/emitter";
import type { ResolvedConfig } from "../types.js";

export const BRIDGE_FILE_NAME = "bridge.rs";
export const ENCOUNTERED_TYPES_FILE_NAME = "encountered-types.json";
export const ADDITIONAL_NEEDS_FILE_NAME = "additional-needs.json";

export type ConvertFailure = {
  /** `input` when the raw module could not be loaded */
  readonly stage: "input" | "convert";
  readonly diagnostics: readonly Diagnostic[];
};

export type ConvertSummary = {
  readonly outputDir: string;
  readonly filesWritten: readonly string[];
};

const encounteredTypeToJson = (type: EncounteredType) => ({
  kind: type.kind,
  name: qualifiedNameToString(type.name),
});

const additionalNeedToJson = (need: AdditionalNeed) => ({
  kind: need.kind,
  typeName: qualifiedNameToString(need.typeName),
  constructorArgs: need.constructorArgs.map(qualifiedNameToString),
});

const toJson = (value: unknown): string =>
  `${JSON.stringify(value, null, 2)}\n`;

/**
 * Convert the configured raw module and write the results
 */
export const convertCommand = (
  config: ResolvedConfig
): Result<ConvertSummary, ConvertFailure> => {
  const { inputPath, outputDirectory } = config;

  if (!config.quiet) {
    console.log(`Converting ${inputPath}...`);
  }

  const moduleResult = loadRawModuleFile(inputPath);
  if (!moduleResult.ok) {
    return error({ stage: "input", diagnostics: moduleResult.error });
  }

  const conversionResult = convertBindings(
    moduleResult.value,
    {
      includes: config.includes,
      podRequests: config.podTypes.map(parseQualifiedName),
      legacyMode: config.legacyMode,
    },
    config.extraInclude
  );
  if (!conversionResult.ok) {
    return error({
      stage: "convert",
      diagnostics: [convertErrorToDiagnostic(conversionResult.error)],
    });
  }

  const conversion = conversionResult.value;

  if (config.verbose) {
    console.log(
      `  ${conversion.typesToDisable.length} types defined, ${conversion.additionalCppNeeds.length} native helpers needed`
    );
  }

  const outputs: readonly (readonly [string, string])[] = [
    [
      BRIDGE_FILE_NAME,
      emitBridgeFile(conversion.items, {
        header: `Generated by bridgeforge from ${basename(inputPath)}. Do not edit.`,
      }),
    ],
    [
      ENCOUNTERED_TYPES_FILE_NAME,
      toJson(conversion.typesToDisable.map(encounteredTypeToJson)),
    ],
    [
      ADDITIONAL_NEEDS_FILE_NAME,
      toJson(conversion.additionalCppNeeds.map(additionalNeedToJson)),
    ],
  ];

  mkdirSync(outputDirectory, { recursive: true });
  const filesWritten: string[] = [];
  for (const [fileName, content] of outputs) {
    const fullPath = join(outputDirectory, fileName);
    writeFileSync(fullPath, content, "utf-8");
    filesWritten.push(fullPath);

    if (config.verbose) {
      console.log(`  Generated: ${relative(process.cwd(), fullPath)}`);
    }
  }

  if (!config.quiet) {
    console.log(`✓ Wrote ${filesWritten.length} files to ${outputDirectory}`);
  }

  return ok({ outputDir: outputDirectory, filesWritten });
};
