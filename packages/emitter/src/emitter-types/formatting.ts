/**
 * Formatting helper functions
 */

import type { RawVisibility } from "@bridgeforge/frontend";
import type { EmitterContext } from "./core.js";

/**
 * Get indentation string for current level
 */
export const getIndent = (context: EmitterContext): string => {
  const spaces = context.options.indent ?? 4;
  return " ".repeat(spaces * context.indentLevel);
};

/**
 * Visibility prefix, including its trailing space when not empty
 */
export const emitVisibility = (visibility: RawVisibility): string => {
  switch (visibility) {
    case "public":
      return "pub ";
    case "crate":
      return "pub(crate) ";
    case "private":
      return "";
  }
};

/**
 * Quote a string literal, escaping backslashes and quotes
 */
export const quote = (text: string): string =>
  `"${text.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
