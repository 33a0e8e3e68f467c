/**
 * Bridgeforge Emitter - bridge source generator
 */

export * from "./emitter-types/index.js";
export { emitType, emitPathType } from "./types/emitter.js";
export { emitParameter, emitSignature } from "./types/parameters.js";
export { emitAttribute, emitAttributes } from "./core/attributes.js";
export * from "./items/index.js";
export { emitItem } from "./item-emitter.js";
export { emitBridgeFile } from "./emitter.js";
