/**
 * Bridgeforge Converter - classifies aggregates and rewrites generated
 * bindings into a bridge module
 */

export {
  convertBindings,
  stripClassPrefix,
  BRIDGE_MODULE_NAME,
  BRIDGE_ATTRIBUTE,
  type BridgeConverterConfig,
} from "./bridge-converter.js";
export { type ConvertError, convertErrorToDiagnostic } from "./errors.js";
export {
  type KnownType,
  KNOWN_TYPES,
  getKnownType,
  resolveKnownType,
  bridgeReplacementFor,
  isKnownByValueSafe,
} from "./known-types.js";
export {
  type TypeClassification,
  type Classification,
  type ValueSafetyViolation,
  type ValueClassChecker,
  createValueClassChecker,
  ingestAggregate,
  ingestEnum,
  classify,
  isValueSafe,
} from "./value-class-checker.js";
export {
  convertType,
  convertParameter,
  convertSignature,
  type ConvertedSignature,
} from "./type-conversion.js";
