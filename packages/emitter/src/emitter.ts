/**
 * Main emitter - generates bridge source from converted items
 */

import type { BridgeItem } from "@bridgeforge/frontend";
import { createContext, type EmitterOptions } from "./emitter-types/index.js";
import { emitItem } from "./item-emitter.js";

const emitHeader = (header: string): string =>
  header
    .split("\n")
    .map((line) => (line.length > 0 ? `// ${line}` : "//"))
    .join("\n");

/**
 * Emit a whole source file: items separated by blank lines, ending in a
 * newline.
 */
export const emitBridgeFile = (
  items: readonly BridgeItem[],
  options: EmitterOptions = {}
): string => {
  const context = createContext(options);
  const sections = items.map((item) => emitItem(item, context));
  if (options.header !== undefined) {
    sections.unshift(emitHeader(options.header));
  }
  return `${sections.join("\n\n")}\n`;
};
