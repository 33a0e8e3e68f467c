/**
 * Conversion errors
 *
 * Every variant ends the run; no partial output is returned alongside.
 */

import {
  createDiagnostic,
  qualifiedNameToString,
  type Diagnostic,
  type QualifiedName,
  type RawForeignItem,
} from "@bridgeforge/frontend";

export type ConvertError =
  | { readonly kind: "noContent" }
  | {
      readonly kind: "unsafePodType";
      readonly typeName: QualifiedName;
      readonly reason: string;
    }
  | {
      readonly kind: "unknownForeignItem";
      readonly itemKind: Exclude<RawForeignItem["kind"], "fn">;
      readonly name?: string;
    };

export const convertErrorToDiagnostic = (err: ConvertError): Diagnostic => {
  switch (err.kind) {
    case "noContent":
      return createDiagnostic(
        "BRG2001",
        "error",
        "Raw module has no content",
        undefined,
        "The generator emitted a module declaration without a body"
      );
    case "unsafePodType":
      return createDiagnostic(
        "BRG2002",
        "error",
        `Type ${qualifiedNameToString(err.typeName)} cannot be passed by value: ${err.reason}`,
        undefined,
        "Remove it from the requested value types to keep it opaque"
      );
    case "unknownForeignItem":
      return createDiagnostic(
        "BRG2003",
        "error",
        err.name
          ? `Unsupported ${err.itemKind} item '${err.name}' in foreign block`
          : `Unsupported ${err.itemKind} item in foreign block`,
        undefined,
        "Only functions are supported inside foreign blocks"
      );
  }
};
