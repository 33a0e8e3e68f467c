/**
 * Small constructors and queries over raw types.
 */

import type { QualifiedName } from "../types/qualified-name.js";
import type {
  RawAttribute,
  RawPathType,
  RawPointerType,
  RawReferenceType,
  RawType,
  RawTypedParameter,
} from "./types.js";

/**
 * Build a path type from `::`-separated text, with generic arguments on
 * the last segment: `pathType("UniquePtr", pathType("Widget"))`.
 */
export const pathType = (
  text: string,
  ...typeArguments: readonly RawType[]
): RawPathType => {
  const names = text.split("::").filter((name) => name.length > 0);
  const last = names.length - 1;
  return {
    kind: "pathType",
    ...(text.startsWith("::") ? { leadingColon: true } : {}),
    segments: names.map((name, i) =>
      i === last && typeArguments.length > 0
        ? {
            name,
            genericArguments: typeArguments.map((type) => ({
              kind: "type" as const,
              type,
            })),
          }
        : { name }
    ),
  };
};

export const pointerType = (
  elementType: RawType,
  mutable: boolean
): RawPointerType => ({ kind: "pointerType", mutable, elementType });

export const referenceType = (
  elementType: RawType,
  mutable: boolean,
  lifetime?: string
): RawReferenceType =>
  lifetime === undefined
    ? { kind: "referenceType", mutable, elementType }
    : { kind: "referenceType", mutable, lifetime, elementType };

export const attribute = (path: string, tokens?: string): RawAttribute =>
  tokens === undefined ? { path } : { path, tokens };

export const typedParameter = (
  name: string,
  type: RawType
): RawTypedParameter => ({ kind: "typed", name, type });

/**
 * `a::b::C` becomes namespace `[a, b]`, name `C`. Generic arguments are
 * not part of the name.
 */
export const pathTypeToQualifiedName = (type: RawPathType): QualifiedName => {
  const names = type.segments.map((segment) => segment.name);
  const name = names.pop() ?? "";
  return { namespace: names, name };
};

/**
 * Name of a type when it is a plain path, undefined for every other shape.
 */
export const typeToQualifiedName = (
  type: RawType
): QualifiedName | undefined =>
  type.kind === "pathType" ? pathTypeToQualifiedName(type) : undefined;

/**
 * Drop every attribute whose path is exactly `path`.
 */
export const stripAttributes = (
  attributes: readonly RawAttribute[],
  ...paths: readonly string[]
): readonly RawAttribute[] =>
  attributes.filter((attr) => !paths.includes(attr.path));
