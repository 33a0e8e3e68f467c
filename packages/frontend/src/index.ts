/**
 * Bridgeforge Frontend - raw interface model, loader and API analysis
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
} from "./types/diagnostic.js";

export * from "./types/result.js";
export * from "./types/qualified-name.js";

export type * from "./raw/types.js";
export * from "./raw/builders.js";
export {
  loadRawModuleFile,
  validateRawModule,
  parseItem,
  parseType,
} from "./raw/loader.js";

export type * from "./bridge/types.js";

export type * from "./api/types.js";
export * from "./api/dependencies.js";
