/**
 * Attribute emission helpers
 *
 * Example:
 * ```typescript
 * { path: "repr", tokens: "(C)" }
 * { path: "link_name", tokens: ' = "resize"' }
 * ```
 *
 * Emits:
 * ```
 * #[repr(C)]
 * #[link_name = "resize"]
 * ```
 */

import type { RawAttribute } from "@bridgeforge/frontend";
import type { EmitterContext } from "../emitter-types/index.js";
import { getIndent } from "../emitter-types/index.js";

/**
 * Emit a single attribute, brackets included.
 */
export const emitAttribute = (attr: RawAttribute): string =>
  `#[${attr.path}${attr.tokens ?? ""}]`;

/**
 * Emit all attributes for a declaration, one per line at the current
 * indentation. Returns the lines, empty when there are none.
 */
export const emitAttributes = (
  attributes: readonly RawAttribute[] | undefined,
  context: EmitterContext
): readonly string[] => {
  if (!attributes || attributes.length === 0) {
    return [];
  }
  const ind = getIndent(context);
  return attributes.map((attr) => `${ind}${emitAttribute(attr)}`);
};

/**
 * Emit parameter-level attributes inline.
 *
 * Returns a prefix with a trailing space, or an empty string.
 */
export const emitAttributesInline = (
  attributes: readonly RawAttribute[] | undefined
): string =>
  !attributes || attributes.length === 0
    ? ""
    : `${attributes.map(emitAttribute).join(" ")} `;
