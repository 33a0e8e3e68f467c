/**
 * Impl block emission
 */

import type {
  RawImplConst,
  RawImplItem,
  RawImplMember,
  RawImplMethod,
} from "@bridgeforge/frontend";
import { emitAttributes } from "../core/attributes.js";
import {
  emitVisibility,
  escapeIdentifier,
  getIndent,
  indent,
  type EmitterContext,
} from "../emitter-types/index.js";
import { emitType } from "../types/emitter.js";
import { emitSignature } from "../types/parameters.js";

const emitMethod = (method: RawImplMethod, context: EmitterContext): string => {
  const ind = getIndent(context);
  const head = `${ind}${emitVisibility(method.visibility)}${emitSignature(method.signature)}`;
  const attrs = emitAttributes(method.attributes, context);

  switch (method.body.kind) {
    case "verbatim":
      return [...attrs, `${head} ${method.body.text}`].join("\n");
    case "call": {
      const args = method.body.arguments.map(escapeIdentifier).join(", ");
      return [
        ...attrs,
        `${head} {`,
        `${getIndent(indent(context))}${method.body.callee}(${args})`,
        `${ind}}`,
      ].join("\n");
    }
  }
};

const emitImplConst = (member: RawImplConst, context: EmitterContext): string =>
  `${getIndent(context)}${emitVisibility(member.visibility)}const ${member.name}: ${emitType(member.type)} = ${member.value};`;

const emitImplMember = (
  member: RawImplMember,
  context: EmitterContext
): string =>
  member.kind === "method"
    ? emitMethod(member, context)
    : emitImplConst(member, context);

/**
 * Members are separated by a blank line
 */
export const emitImpl = (item: RawImplItem, context: EmitterContext): string => {
  const ind = getIndent(context);
  const unsafe = item.isUnsafe ? "unsafe " : "";
  const generics =
    item.generics && item.generics.length > 0
      ? `<${item.generics.join(", ")}>`
      : "";
  const target =
    item.trait === undefined
      ? emitType(item.selfType)
      : `${item.trait} for ${emitType(item.selfType)}`;
  const head = `${ind}${unsafe}impl${generics} ${target}`;
  const attrs = emitAttributes(item.attributes, context);

  if (item.members.length === 0) {
    return [...attrs, `${head} {}`].join("\n");
  }

  const memberContext = indent(context);
  return [
    ...attrs,
    `${head} {`,
    item.members
      .map((member) => emitImplMember(member, memberContext))
      .join("\n\n"),
    `${ind}}`,
  ].join("\n");
};
