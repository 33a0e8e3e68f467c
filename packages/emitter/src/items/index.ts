/**
 * Item emitters - Public API
 */

export {
  emitStruct,
  emitEnum,
  emitUse,
  emitConst,
  emitTypeAlias,
  emitVerbatim,
} from "./declarations.js";
export { emitImpl } from "./impls.js";
export {
  emitForeignBlock,
  emitForeignItem,
  type ForeignBlock,
  type ForeignItem,
} from "./foreign.js";
export {
  emitBridgeMod,
  emitBridgeModuleMember,
  NATIVE_ABI,
  OPAQUE_ABI,
} from "./bridge-mod.js";
