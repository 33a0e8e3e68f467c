/**
 * Tests for the raw module loader
 */

import { describe, it, afterEach } from "mocha";
import { expect } from "chai";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { loadRawModuleFile, validateRawModule } from "./loader.js";

const pointStruct = {
  kind: "struct",
  name: "Point",
  visibility: "public",
  attributes: [{ path: "repr", tokens: "(C)" }],
  fields: [
    {
      name: "x",
      visibility: "public",
      type: { kind: "pathType", segments: [{ name: "i32" }] },
    },
  ],
};

const resizeBlock = {
  kind: "foreignMod",
  abi: "C",
  items: [
    {
      kind: "fn",
      visibility: "public",
      attributes: [{ path: "link_name", tokens: ' = "Widget_resize"' }],
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
              elementType: {
                kind: "pathType",
                segments: [{ name: "Widget" }],
              },
            },
          },
        ],
      },
    },
  ],
};

describe("Raw module loader", () => {
  describe("validateRawModule", () => {
    it("should accept a module with structs and foreign blocks", () => {
      const result = validateRawModule(
        { name: "bindings", content: [pointStruct, resizeBlock] },
        "bindings.json"
      );

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      const [first, second] = result.value.content ?? [];
      expect(first).to.deep.equal({
        kind: "struct",
        name: "Point",
        visibility: "public",
        attributes: [{ path: "repr", tokens: "(C)" }],
        generics: [],
        fields: [
          {
            name: "x",
            visibility: "public",
            attributes: [],
            type: { kind: "pathType", segments: [{ name: "i32" }] },
          },
        ],
      });
      expect(second?.kind).to.equal("foreignMod");
      if (second?.kind !== "foreignMod") return;
      const fn = second.items[0];
      expect(fn?.kind).to.equal("fn");
      if (fn?.kind !== "fn") return;
      expect(fn.signature.parameters[0]).to.deep.equal({
        kind: "typed",
        name: "this",
        attributes: [],
        type: {
          kind: "pointerType",
          mutable: true,
          elementType: { kind: "pathType", segments: [{ name: "Widget" }] },
        },
      });
    });

    it("should keep a module without content as bodiless", () => {
      const result = validateRawModule({ name: "bindings" }, "b.json");
      expect(result).to.deep.equal({ ok: true, value: { name: "bindings" } });
    });

    it("should reject a non-object document", () => {
      const result = validateRawModule([], "b.json");
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("BRG9004");
      expect(result.error[0]?.message).to.equal(
        "Raw module must be an object, got array"
      );
    });

    it("should reject a missing name", () => {
      const result = validateRawModule({ content: [] }, "b.json");
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error.map((d) => d.code)).to.deep.equal(["BRG9005"]);
    });

    it("should reject non-array content", () => {
      const result = validateRawModule({ name: "m", content: {} }, "b.json");
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("BRG9006");
    });

    it("should report every bad item with its pointer", () => {
      const result = validateRawModule(
        {
          name: "m",
          content: [
            { kind: "macroRules" },
            pointStruct,
            {
              kind: "struct",
              name: "Bad",
              fields: [{ name: "f", type: { kind: "sliceType" } }],
            },
          ],
        },
        "b.json"
      );

      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(
        result.error.map((d) => [d.code, d.location?.pointer])
      ).to.deep.equal([
        ["BRG9007", "/content/0/kind"],
        ["BRG9008", "/content/2/fields/0/type/kind"],
      ]);
    });

    it("should reject an unknown visibility", () => {
      const result = validateRawModule(
        {
          name: "m",
          content: [{ kind: "use", visibility: "friend", path: "std::ffi" }],
        },
        "b.json"
      );
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.location?.pointer).to.equal(
        "/content/0/visibility"
      );
    });

    it("should parse generic arguments and references", () => {
      const result = validateRawModule(
        {
          name: "m",
          content: [
            {
              kind: "typeAlias",
              name: "Owned",
              type: {
                kind: "referenceType",
                mutable: false,
                lifetime: "a",
                elementType: {
                  kind: "pathType",
                  segments: [
                    {
                      name: "std_unique_ptr",
                      genericArguments: [
                        {
                          kind: "type",
                          type: {
                            kind: "pathType",
                            segments: [{ name: "Widget" }],
                          },
                        },
                      ],
                    },
                  ],
                },
              },
            },
          ],
        },
        "b.json"
      );

      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      const alias = result.value.content?.[0];
      expect(alias?.kind).to.equal("typeAlias");
      if (alias?.kind !== "typeAlias") return;
      expect(alias.visibility).to.equal("private");
      expect(alias.type).to.deep.equal({
        kind: "referenceType",
        mutable: false,
        lifetime: "a",
        elementType: {
          kind: "pathType",
          segments: [
            {
              name: "std_unique_ptr",
              genericArguments: [
                {
                  kind: "type",
                  type: { kind: "pathType", segments: [{ name: "Widget" }] },
                },
              ],
            },
          ],
        },
      });
    });
  });

  describe("loadRawModuleFile", () => {
    let tempDir: string | undefined;

    afterEach(() => {
      if (tempDir) {
        fs.rmSync(tempDir, { recursive: true, force: true });
        tempDir = undefined;
      }
    });

    it("should report a missing file", () => {
      const result = loadRawModuleFile("/nonexistent/bindings.json");
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("BRG9001");
    });

    it("should report invalid JSON", () => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "bridgeforge-loader-"));
      const file = path.join(tempDir, "bindings.json");
      fs.writeFileSync(file, "{ not json");

      const result = loadRawModuleFile(file);
      expect(result.ok).to.equal(false);
      if (result.ok) return;
      expect(result.error[0]?.code).to.equal("BRG9003");
    });

    it("should load a valid file", () => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "bridgeforge-loader-"));
      const file = path.join(tempDir, "bindings.json");
      fs.writeFileSync(
        file,
        JSON.stringify({ name: "bindings", content: [pointStruct] })
      );

      const result = loadRawModuleFile(file);
      expect(result.ok).to.equal(true);
      if (!result.ok) return;
      expect(result.value.content).to.have.length(1);
    });
  });
});
