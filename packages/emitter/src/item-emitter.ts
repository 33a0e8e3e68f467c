/**
 * Item Emitter - bridge items to source text
 */

import type { BridgeItem } from "@bridgeforge/frontend";
import type { EmitterContext } from "./emitter-types/index.js";
import {
  emitBridgeMod,
  emitConst,
  emitEnum,
  emitForeignBlock,
  emitImpl,
  emitStruct,
  emitTypeAlias,
  emitUse,
  emitVerbatim,
} from "./items/index.js";

/**
 * Emit one top-level or nested item
 */
export const emitItem = (item: BridgeItem, context: EmitterContext): string => {
  switch (item.kind) {
    case "struct":
      return emitStruct(item, context);

    case "enum":
      return emitEnum(item, context);

    case "impl":
      return emitImpl(item, context);

    case "foreignMod":
      return emitForeignBlock(item, context);

    case "use":
      return emitUse(item, context);

    case "const":
      return emitConst(item, context);

    case "typeAlias":
      return emitTypeAlias(item, context);

    case "verbatim":
      return emitVerbatim(item, context);

    case "bridgeMod":
      return emitBridgeMod(item, context);
  }
};
