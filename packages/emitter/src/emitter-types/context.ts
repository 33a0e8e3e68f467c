/**
 * Context creation and manipulation functions
 */

import type { EmitterOptions, EmitterContext } from "./core.js";

/**
 * Create a new emitter context with default values
 */
export const createContext = (options: EmitterOptions = {}): EmitterContext => ({
  indentLevel: 0,
  options,
});

/**
 * Increase indentation level
 */
export const indent = (context: EmitterContext): EmitterContext => ({
  ...context,
  indentLevel: context.indentLevel + 1,
});
