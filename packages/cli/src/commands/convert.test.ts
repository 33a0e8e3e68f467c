/**
 * Tests for the convert command
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, beforeEach, afterEach } from "mocha";
import { expect } from "chai";
import type { ResolvedConfig } from "../types.js";
import { convertCommand } from "./convert.js";

const i32 = { kind: "pathType", segments: [{ name: "i32" }] };
const widgetType = { kind: "pathType", segments: [{ name: "Widget" }] };

const rawModule = {
  name: "ffi",
  content: [
    {
      kind: "struct",
      name: "Point",
      visibility: "public",
      attributes: [{ path: "repr", tokens: "(C)" }],
      fields: [
        { name: "x", visibility: "public", type: i32 },
        { name: "y", visibility: "public", type: i32 },
      ],
    },
    {
      kind: "struct",
      name: "Widget",
      visibility: "public",
      fields: [
        {
          name: "parent",
          visibility: "private",
          type: { kind: "pointerType", mutable: true, elementType: widgetType },
        },
      ],
    },
    {
      kind: "impl",
      selfType: widgetType,
      members: [
        {
          kind: "method",
          visibility: "public",
          signature: {
            name: "new",
            isUnsafe: true,
            parameters: [],
            returnType: { kind: "pathType", segments: [{ name: "Self" }] },
          },
          body: { kind: "verbatim", text: "{ unimplemented!() }" },
        },
      ],
    },
    {
      kind: "foreignMod",
      abi: "C",
      items: [
        {
          kind: "fn",
          visibility: "public",
          attributes: [{ path: "link_name", tokens: ' = "resize"' }],
          signature: {
            name: "Widget_resize",
            isUnsafe: false,
            parameters: [
              {
                kind: "typed",
                name: "this",
                type: {
                  kind: "pointerType",
                  mutable: true,
                  elementType: widgetType,
                },
              },
              { kind: "typed", name: "w", type: i32 },
            ],
          },
        },
      ],
    },
  ],
};

describe("convertCommand", () => {
  let root = "";

  const configFor = (overrides: Partial<ResolvedConfig> = {}): ResolvedConfig => ({
    projectRoot: root,
    inputPath: join(root, "bindings.json"),
    includes: ["widget.h"],
    extraInclude: undefined,
    podTypes: ["Point"],
    legacyMode: false,
    outputDirectory: join(root, "generated"),
    verbose: false,
    quiet: true,
    ...overrides,
  });

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), "bridgeforge-convert-"));
    writeFileSync(join(root, "bindings.json"), JSON.stringify(rawModule));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("should write the bridge source and both side tables", () => {
    const result = convertCommand(configFor());

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    const outputDir = join(root, "generated");
    expect(result.value).to.deep.equal({
      outputDir,
      filesWritten: [
        join(outputDir, "bridge.rs"),
        join(outputDir, "encountered-types.json"),
        join(outputDir, "additional-needs.json"),
      ],
    });

    expect(readFileSync(join(outputDir, "bridge.rs"), "utf-8")).to.equal(
      [
        "// Generated by bridgeforge from bindings.json. Do not edit.",
        "",
        "impl Widget {",
        "    pub fn make_unique() -> UniquePtr<Widget> {",
        "        Widget_make_unique()",
        "    }",
        "}",
        "",
        "#[cxx::bridge]",
        "pub mod cxxbridge {",
        '    unsafe extern "C++" {',
        "        type Point;",
        "    }",
        "",
        "    pub struct Point {",
        "        pub x: i32,",
        "        pub y: i32,",
        "    }",
        "",
        '    extern "C" {',
        "        type Widget;",
        "    }",
        "",
        "    struct WidgetContainingStruct {",
        "        _0: UniquePtr<Widget>,",
        "    }",
        "",
        '    extern "C" {',
        '        include!("widget.h");',
        "        pub fn resize(self: &mut Widget, w: i32);",
        "    }",
        "}",
        "",
      ].join("\n")
    );

    const encountered: unknown = JSON.parse(
      readFileSync(join(outputDir, "encountered-types.json"), "utf-8")
    );
    expect(encountered).to.deep.equal([
      { kind: "struct", name: "Point" },
      { kind: "struct", name: "Widget" },
    ]);

    const needs: unknown = JSON.parse(
      readFileSync(join(outputDir, "additional-needs.json"), "utf-8")
    );
    expect(needs).to.deep.equal([
      { kind: "makeUnique", typeName: "Widget", constructorArgs: [] },
    ]);
  });

  it("should fail at the input stage when the raw module is missing", () => {
    const result = convertCommand(
      configFor({ inputPath: join(root, "missing.json") })
    );

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.stage).to.equal("input");
    expect(result.error.diagnostics.map((d) => d.code)).to.deep.equal([
      "BRG9001",
    ]);
  });

  it("should fail at the convert stage for an unsafe value type", () => {
    const result = convertCommand(configFor({ podTypes: ["Widget"] }));

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.stage).to.equal("convert");
    expect(result.error.diagnostics.map((d) => d.message)).to.deep.equal([
      "Type Widget cannot be passed by value: Widget: field 'parent' is a raw pointer",
    ]);
  });
});
