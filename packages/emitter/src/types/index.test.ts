/**
 * Tests for type, parameter and signature emission
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  pathType,
  pointerType,
  referenceType,
  typedParameter,
  type RawType,
} from "@bridgeforge/frontend";
import { emitType } from "./emitter.js";
import { emitParameter, emitSignature } from "./parameters.js";

describe("Type emission", () => {
  it("should emit paths with a leading separator and nested generics", () => {
    expect(emitType(pathType("::geo::Point"))).to.equal("::geo::Point");
    expect(
      emitType(pathType("UniquePtr", pathType("CxxVector", pathType("u8"))))
    ).to.equal("UniquePtr<CxxVector<u8>>");
  });

  it("should emit lifetime and const arguments", () => {
    const type: RawType = {
      kind: "pathType",
      segments: [
        {
          name: "Buf",
          genericArguments: [
            { kind: "lifetime", name: "a" },
            { kind: "const", value: "4" },
          ],
        },
      ],
    };

    expect(emitType(type)).to.equal("Buf<'a, 4>");
  });

  it("should emit pointers and references", () => {
    expect(emitType(pointerType(pathType("Widget"), true))).to.equal(
      "*mut Widget"
    );
    expect(emitType(pointerType(pathType("Widget"), false))).to.equal(
      "*const Widget"
    );
    expect(emitType(referenceType(pathType("str"), false, "a"))).to.equal(
      "&'a str"
    );
    expect(emitType(referenceType(pathType("Widget"), true))).to.equal(
      "&mut Widget"
    );
  });

  it("should emit arrays and tuples", () => {
    expect(
      emitType({ kind: "arrayType", elementType: pathType("u8"), length: "16" })
    ).to.equal("[u8; 16]");
    expect(emitType({ kind: "tupleType", elementTypes: [] })).to.equal("()");
    expect(
      emitType({ kind: "tupleType", elementTypes: [pathType("i32")] })
    ).to.equal("(i32,)");
    expect(
      emitType({
        kind: "tupleType",
        elementTypes: [pathType("i32"), pathType("bool")],
      })
    ).to.equal("(i32, bool)");
  });

  it("should emit function pointers and never", () => {
    expect(
      emitType({
        kind: "functionPointerType",
        abi: "C",
        isUnsafe: true,
        parameterTypes: [pathType("i32")],
        returnType: pathType("bool"),
      })
    ).to.equal('unsafe extern "C" fn(i32) -> bool');
    expect(emitType({ kind: "neverType" })).to.equal("!");
  });
});

describe("Parameter emission", () => {
  it("should emit receivers", () => {
    expect(
      emitParameter({ kind: "receiver", reference: true, mutable: false })
    ).to.equal("&self");
    expect(
      emitParameter({ kind: "receiver", reference: true, mutable: true })
    ).to.equal("&mut self");
    expect(
      emitParameter({ kind: "receiver", reference: false, mutable: false })
    ).to.equal("self");
  });

  it("should escape keyword names but not self", () => {
    expect(emitParameter(typedParameter("type", pathType("i32")))).to.equal(
      "r#type: i32"
    );
    expect(
      emitParameter(
        typedParameter("self", referenceType(pathType("Widget"), true))
      )
    ).to.equal("self: &mut Widget");
  });

  it("should emit signatures", () => {
    expect(
      emitSignature({
        name: "resize",
        isUnsafe: false,
        parameters: [
          typedParameter("self", referenceType(pathType("Widget"), true)),
          typedParameter("w", pathType("i32")),
        ],
      })
    ).to.equal("fn resize(self: &mut Widget, w: i32)");
  });

  it("should emit unsafe variadic signatures with a return type", () => {
    expect(
      emitSignature({
        name: "printf",
        isUnsafe: true,
        parameters: [
          typedParameter("fmt", pointerType(pathType("c_char"), false)),
        ],
        isVariadic: true,
        returnType: pathType("c_int"),
      })
    ).to.equal("unsafe fn printf(fmt: *const c_char, ...) -> c_int");
  });
});
