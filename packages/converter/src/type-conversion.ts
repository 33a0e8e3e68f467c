/**
 * Type and signature conversion
 *
 * Rewrites types from the generator's spelling into the bridge's:
 * - known leaf names are replaced (`std_unique_ptr<T>` → `UniquePtr<T>`),
 *   recursing into generic arguments
 * - raw pointers become references of the same mutability, lifetime left
 *   implicit, since the bridge has no raw pointers at its safe boundary
 * - references recurse into their referent
 * - every other shape is returned as is
 *
 * Conversion never fails and applying it twice changes nothing further.
 */

import {
  referenceType,
  type RawGenericArgument,
  type RawParameter,
  type RawPathSegment,
  type RawPathType,
  type RawSignature,
  type RawType,
} from "@bridgeforge/frontend";
import { bridgeReplacementFor } from "./known-types.js";

/** Name of the receiver parameter in flattened generator output */
export const GENERATED_RECEIVER_NAME = "this";

/** Name the bridge expects for the receiver parameter */
export const BRIDGE_RECEIVER_NAME = "self";

const convertGenericArgument = (
  arg: RawGenericArgument
): RawGenericArgument =>
  arg.kind === "type" ? { kind: "type", type: convertType(arg.type) } : arg;

const convertPathType = (type: RawPathType): RawPathType => {
  const last = type.segments.length - 1;
  return {
    ...type,
    segments: type.segments.map((segment, i): RawPathSegment => {
      const name =
        i === last
          ? (bridgeReplacementFor(segment.name) ?? segment.name)
          : segment.name;
      return segment.genericArguments
        ? {
            name,
            genericArguments: segment.genericArguments.map(
              convertGenericArgument
            ),
          }
        : { name };
    }),
  };
};

export const convertType = (type: RawType): RawType => {
  switch (type.kind) {
    case "pathType":
      return convertPathType(type);
    case "pointerType":
      return referenceType(convertType(type.elementType), type.mutable);
    case "referenceType":
      return { ...type, elementType: convertType(type.elementType) };
    default:
      return type;
  }
};

/**
 * Convert one parameter. Reports whether it was the generated receiver,
 * which comes back renamed to the bridge's receiver name.
 */
export const convertParameter = (
  param: RawParameter
): { readonly parameter: RawParameter; readonly isReceiver: boolean } => {
  if (param.kind !== "typed") {
    return { parameter: param, isReceiver: false };
  }
  const isReceiver = param.name === GENERATED_RECEIVER_NAME;
  return {
    parameter: {
      ...param,
      name: isReceiver ? BRIDGE_RECEIVER_NAME : param.name,
      type: convertType(param.type),
    },
    isReceiver,
  };
};

export type ConvertedSignature = {
  readonly signature: RawSignature;
  readonly isMethod: boolean;
};

/**
 * Convert every parameter and the return type. The signature is a method
 * when any parameter was the generated receiver.
 */
export const convertSignature = (sig: RawSignature): ConvertedSignature => {
  const converted = sig.parameters.map(convertParameter);
  const parameters = converted.map((c) => c.parameter);
  const isMethod = converted.some((c) => c.isReceiver);
  return {
    signature: sig.returnType
      ? { ...sig, parameters, returnType: convertType(sig.returnType) }
      : { ...sig, parameters },
    isMethod,
  };
};
