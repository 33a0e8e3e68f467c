/**
 * Parameter and signature emission
 */

import type { RawParameter, RawSignature } from "@bridgeforge/frontend";
import { emitAttributesInline } from "../core/attributes.js";
import { escapeIdentifier } from "../emitter-types/index.js";
import { emitType } from "./emitter.js";

export const emitParameter = (param: RawParameter): string => {
  if (param.kind === "receiver") {
    if (!param.reference) {
      return param.mutable ? "mut self" : "self";
    }
    return param.mutable ? "&mut self" : "&self";
  }
  const attrs = emitAttributesInline(param.attributes);
  return `${attrs}${escapeIdentifier(param.name)}: ${emitType(param.type)}`;
};

/**
 * `unsafe fn name(a: A, ...) -> R` without a body or terminator
 */
export const emitSignature = (sig: RawSignature): string => {
  const params = sig.parameters.map(emitParameter);
  if (sig.isVariadic) {
    params.push("...");
  }
  const unsafe = sig.isUnsafe ? "unsafe " : "";
  const ret = sig.returnType ? ` -> ${emitType(sig.returnType)}` : "";
  return `${unsafe}fn ${escapeIdentifier(sig.name)}(${params.join(", ")})${ret}`;
};
