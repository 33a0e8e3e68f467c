/**
 * Tests for item emission
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  attribute,
  pathType,
  referenceType,
  typedParameter,
  type RawStructItem,
} from "@bridgeforge/frontend";
import { createContext, indent } from "../emitter-types/index.js";
import {
  emitEnum,
  emitForeignBlock,
  emitImpl,
  emitStruct,
  emitTypeAlias,
  emitVerbatim,
} from "./index.js";

const context = createContext();

const point: RawStructItem = {
  kind: "struct",
  name: "Point",
  visibility: "public",
  attributes: [attribute("repr", "(C)")],
  fields: [
    { name: "x", visibility: "public", attributes: [], type: pathType("i32") },
    { name: "y", visibility: "public", attributes: [], type: pathType("i32") },
  ],
};

describe("Item emission", () => {
  describe("structs", () => {
    it("should emit named fields one per line", () => {
      expect(emitStruct(point, context)).to.equal(
        [
          "#[repr(C)]",
          "pub struct Point {",
          "    pub x: i32,",
          "    pub y: i32,",
          "}",
        ].join("\n")
      );
    });

    it("should emit tuple structs and empty structs", () => {
      expect(
        emitStruct(
          {
            kind: "struct",
            name: "Id",
            visibility: "private",
            attributes: [],
            fields: [
              { visibility: "public", attributes: [], type: pathType("u32") },
            ],
          },
          context
        )
      ).to.equal("struct Id(pub u32);");
      expect(
        emitStruct(
          {
            kind: "struct",
            name: "Empty",
            visibility: "crate",
            attributes: [],
            generics: ["T"],
            fields: [],
          },
          context
        )
      ).to.equal("pub(crate) struct Empty<T> {}");
    });

    it("should escape keyword field names", () => {
      const item: RawStructItem = {
        kind: "struct",
        name: "Token",
        visibility: "public",
        attributes: [],
        fields: [
          {
            name: "type",
            visibility: "private",
            attributes: [],
            type: pathType("u8"),
          },
        ],
      };

      expect(emitStruct(item, context)).to.equal(
        ["pub struct Token {", "    r#type: u8,", "}"].join("\n")
      );
    });
  });

  it("should emit enums with discriminants", () => {
    expect(
      emitEnum(
        {
          kind: "enum",
          name: "Color",
          visibility: "public",
          attributes: [],
          variants: [{ name: "Red", discriminant: "0" }, { name: "Green" }],
        },
        context
      )
    ).to.equal(["pub enum Color {", "    Red = 0,", "    Green,", "}"].join("\n"));
  });

  it("should emit a factory impl with the configured indentation", () => {
    const text = emitImpl(
      {
        kind: "impl",
        attributes: [],
        selfType: pathType("Point"),
        members: [
          {
            kind: "method",
            visibility: "public",
            attributes: [],
            signature: {
              name: "make_unique",
              isUnsafe: false,
              parameters: [typedParameter("x", pathType("i32"))],
              returnType: pathType("UniquePtr", pathType("Point")),
            },
            body: { kind: "call", callee: "Point_make_unique", arguments: ["x"] },
          },
        ],
      },
      createContext({ indent: 2 })
    );

    expect(text).to.equal(
      [
        "impl Point {",
        "  pub fn make_unique(x: i32) -> UniquePtr<Point> {",
        "    Point_make_unique(x)",
        "  }",
        "}",
      ].join("\n")
    );
  });

  it("should emit trait impls with verbatim bodies and constants", () => {
    const text = emitImpl(
      {
        kind: "impl",
        attributes: [],
        isUnsafe: true,
        trait: "Send",
        selfType: pathType("Widget"),
        members: [
          {
            kind: "const",
            name: "LIMIT",
            visibility: "private",
            type: pathType("u32"),
            value: "4",
          },
          {
            kind: "method",
            visibility: "private",
            attributes: [],
            signature: { name: "touch", isUnsafe: false, parameters: [] },
            body: { kind: "verbatim", text: "{}" },
          },
        ],
      },
      context
    );

    expect(text).to.equal(
      [
        "unsafe impl Send for Widget {",
        "    const LIMIT: u32 = 4;",
        "",
        "    fn touch() {}",
        "}",
      ].join("\n")
    );
  });

  it("should emit foreign blocks with includes and attributes", () => {
    const text = emitForeignBlock(
      {
        abi: "C",
        attributes: [],
        items: [
          { kind: "include", path: "point.h" },
          {
            kind: "fn",
            visibility: "public",
            attributes: [attribute("link_name", ' = "resize"')],
            signature: {
              name: "resize",
              isUnsafe: false,
              parameters: [
                typedParameter("self", referenceType(pathType("Widget"), true)),
              ],
            },
          },
          {
            kind: "static",
            name: "COUNTER",
            mutable: true,
            visibility: "public",
            attributes: [],
            type: pathType("u32"),
          },
        ],
      },
      context
    );

    expect(text).to.equal(
      [
        'extern "C" {',
        '    include!("point.h");',
        '    #[link_name = "resize"]',
        "    pub fn resize(self: &mut Widget);",
        "    pub static mut COUNTER: u32;",
        "}",
      ].join("\n")
    );
  });

  it("should emit type aliases", () => {
    expect(
      emitTypeAlias(
        {
          kind: "typeAlias",
          name: "Handle",
          visibility: "public",
          attributes: [],
          type: pathType("u64"),
        },
        context
      )
    ).to.equal("pub type Handle = u64;");
  });

  it("should indent every non-empty verbatim line", () => {
    expect(
      emitVerbatim({ kind: "verbatim", text: "a\n\nb" }, indent(context))
    ).to.equal("    a\n\n    b");
  });
});
