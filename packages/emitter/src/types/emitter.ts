/**
 * Type emission main dispatcher
 *
 * Types print the same at every indentation level, so no context is taken.
 */

import type {
  RawFunctionPointerType,
  RawGenericArgument,
  RawPathSegment,
  RawPathType,
  RawReferenceType,
  RawType,
} from "@bridgeforge/frontend";
import { quote } from "../emitter-types/index.js";

const emitGenericArgument = (arg: RawGenericArgument): string => {
  switch (arg.kind) {
    case "type":
      return emitType(arg.type);
    case "lifetime":
      return `'${arg.name}`;
    case "const":
      return arg.value;
  }
};

const emitPathSegment = (segment: RawPathSegment): string =>
  segment.genericArguments && segment.genericArguments.length > 0
    ? `${segment.name}<${segment.genericArguments.map(emitGenericArgument).join(", ")}>`
    : segment.name;

export const emitPathType = (type: RawPathType): string =>
  `${type.leadingColon ? "::" : ""}${type.segments.map(emitPathSegment).join("::")}`;

const emitReferenceType = (type: RawReferenceType): string => {
  const lifetime = type.lifetime === undefined ? "" : `'${type.lifetime} `;
  return `&${lifetime}${type.mutable ? "mut " : ""}${emitType(type.elementType)}`;
};

const emitFunctionPointerType = (type: RawFunctionPointerType): string => {
  const unsafe = type.isUnsafe ? "unsafe " : "";
  const abi = type.abi === undefined ? "" : `extern ${quote(type.abi)} `;
  const params = type.parameterTypes.map(emitType).join(", ");
  const ret = type.returnType ? ` -> ${emitType(type.returnType)}` : "";
  return `${unsafe}${abi}fn(${params})${ret}`;
};

/**
 * Emit a type in source form
 */
export const emitType = (type: RawType): string => {
  switch (type.kind) {
    case "pathType":
      return emitPathType(type);

    case "pointerType":
      return `*${type.mutable ? "mut" : "const"} ${emitType(type.elementType)}`;

    case "referenceType":
      return emitReferenceType(type);

    case "arrayType":
      return `[${emitType(type.elementType)}; ${type.length}]`;

    case "tupleType":
      // A one-element tuple needs its trailing comma
      return type.elementTypes.length === 1
        ? `(${type.elementTypes.map(emitType).join("")},)`
        : `(${type.elementTypes.map(emitType).join(", ")})`;

    case "functionPointerType":
      return emitFunctionPointerType(type);

    case "neverType":
      return "!";
  }
};
