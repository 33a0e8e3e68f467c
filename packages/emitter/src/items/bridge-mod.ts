/**
 * Bridge module emission
 *
 * Extern type declarations print as single-type foreign blocks:
 * value-safe types and enums as `unsafe extern "C++"` (defined natively,
 * layout shared), opaque types as `extern "C"`.
 */

import type {
  BridgeModItem,
  BridgeModuleMember,
} from "@bridgeforge/frontend";
import { emitAttributes } from "../core/attributes.js";
import {
  emitVisibility,
  getIndent,
  indent,
  type EmitterContext,
} from "../emitter-types/index.js";
import { emitEnum, emitStruct } from "./declarations.js";
import { emitForeignBlock } from "./foreign.js";

export const NATIVE_ABI = "C++";
export const OPAQUE_ABI = "C";

export const emitBridgeModuleMember = (
  member: BridgeModuleMember,
  context: EmitterContext
): string => {
  switch (member.kind) {
    case "struct":
      return emitStruct(member, context);
    case "enum":
      return emitEnum(member, context);
    case "externCppType":
      return emitForeignBlock(
        {
          abi: NATIVE_ABI,
          attributes: [],
          isUnsafe: true,
          items: [{ kind: "type", name: member.name }],
        },
        context
      );
    case "opaqueType":
      return emitForeignBlock(
        {
          abi: OPAQUE_ABI,
          attributes: [],
          items: [{ kind: "type", name: member.name }],
        },
        context
      );
    case "foreignMod":
      return emitForeignBlock(member, context);
  }
};

/**
 * Members are separated by a blank line
 */
export const emitBridgeMod = (
  item: BridgeModItem,
  context: EmitterContext
): string => {
  const ind = getIndent(context);
  const head = `${ind}${emitVisibility(item.visibility)}mod ${item.name}`;
  const attrs = emitAttributes(item.attributes, context);

  if (item.members.length === 0) {
    return [...attrs, `${head} {}`].join("\n");
  }

  const memberContext = indent(context);
  return [
    ...attrs,
    `${head} {`,
    item.members
      .map((member) => emitBridgeModuleMember(member, memberContext))
      .join("\n\n"),
    `${ind}}`,
  ].join("\n");
};
