/**
 * Emitter types - Public API
 */

export type { EmitterOptions, EmitterContext } from "./core.js";
export { createContext, indent } from "./context.js";
export { getIndent, emitVisibility, quote } from "./formatting.js";
export { escapeIdentifier } from "./identifiers.js";
