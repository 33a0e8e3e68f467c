/**
 * Output shapes of the binding rewriter.
 *
 * A converted module is the raw items that pass through untouched plus one
 * synthesized bridge module, which the bridge compiler expands into glue.
 */

import type { QualifiedName } from "../types/qualified-name.js";
import type {
  RawAttribute,
  RawEnumItem,
  RawForeignFn,
  RawItem,
  RawStructItem,
  RawVisibility,
} from "../raw/types.js";

/** `include!("header.h");` inside the merged foreign block */
export type IncludeDirective = {
  readonly kind: "include";
  readonly path: string;
};

export type BridgeForeignItem = IncludeDirective | RawForeignFn;

export type BridgeForeignMod = {
  readonly kind: "foreignMod";
  readonly abi: string;
  readonly attributes: readonly RawAttribute[];
  readonly items: readonly BridgeForeignItem[];
};

/**
 * `unsafe extern "C++" { type Name; }` - tells the bridge compiler the
 * type is defined on the native side.
 */
export type ExternCppTypeDeclaration = {
  readonly kind: "externCppType";
  readonly name: string;
};

/** `extern "C" { type Name; }` - a type known only by name */
export type OpaqueTypeDeclaration = {
  readonly kind: "opaqueType";
  readonly name: string;
};

export type BridgeModuleMember =
  | RawStructItem
  | RawEnumItem
  | ExternCppTypeDeclaration
  | OpaqueTypeDeclaration
  | BridgeForeignMod;

export type BridgeModItem = {
  readonly kind: "bridgeMod";
  readonly name: string;
  readonly visibility: RawVisibility;
  readonly attributes: readonly RawAttribute[];
  readonly members: readonly BridgeModuleMember[];
};

export type BridgeItem = RawItem | BridgeModItem;

export type EncounteredTypeKind = "struct" | "enum";

/**
 * A type the rewriter already defined; the downstream generator must not
 * emit its own definition for it.
 */
export type EncounteredType = {
  readonly kind: EncounteredTypeKind;
  readonly name: QualifiedName;
};

/**
 * Native helper code the final compiler must also emit.
 */
export type AdditionalNeed = {
  readonly kind: "makeUnique";
  readonly typeName: QualifiedName;
  readonly constructorArgs: readonly QualifiedName[];
};

export type BridgeConversion = {
  readonly items: readonly BridgeItem[];
  readonly typesToDisable: readonly EncounteredType[];
  readonly additionalCppNeeds: readonly AdditionalNeed[];
};
