/**
 * Foreign block emission: `extern "ABI" { ... }`
 */

import type {
  BridgeForeignItem,
  RawAttribute,
  RawForeignItem,
} from "@bridgeforge/frontend";
import { emitAttributes } from "../core/attributes.js";
import {
  emitVisibility,
  getIndent,
  indent,
  quote,
  type EmitterContext,
} from "../emitter-types/index.js";
import { emitType } from "../types/emitter.js";
import { emitSignature } from "../types/parameters.js";

/**
 * Anything that may sit in a foreign block, before or after conversion
 */
export type ForeignItem = RawForeignItem | BridgeForeignItem;

export const emitForeignItem = (
  item: ForeignItem,
  context: EmitterContext
): string => {
  const ind = getIndent(context);
  switch (item.kind) {
    case "include":
      return `${ind}include!(${quote(item.path)});`;
    case "fn":
      return [
        ...emitAttributes(item.attributes, context),
        `${ind}${emitVisibility(item.visibility)}${emitSignature(item.signature)};`,
      ].join("\n");
    case "static":
      return [
        ...emitAttributes(item.attributes, context),
        `${ind}${emitVisibility(item.visibility)}static ${item.mutable ? "mut " : ""}${item.name}: ${emitType(item.type)};`,
      ].join("\n");
    case "type":
      return `${ind}type ${item.name};`;
    case "macro":
      return `${ind}${item.text}`;
  }
};

export type ForeignBlock = {
  readonly abi: string;
  readonly attributes: readonly RawAttribute[];
  readonly items: readonly ForeignItem[];
  readonly isUnsafe?: boolean;
};

export const emitForeignBlock = (
  block: ForeignBlock,
  context: EmitterContext
): string => {
  const ind = getIndent(context);
  const head = `${ind}${block.isUnsafe ? "unsafe " : ""}extern ${quote(block.abi)}`;
  const attrs = emitAttributes(block.attributes, context);

  if (block.items.length === 0) {
    return [...attrs, `${head} {}`].join("\n");
  }

  const itemContext = indent(context);
  return [
    ...attrs,
    `${head} {`,
    ...block.items.map((item) => emitForeignItem(item, itemContext)),
    `${ind}}`,
  ].join("\n");
};
