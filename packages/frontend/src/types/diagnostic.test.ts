/**
 * Tests for diagnostic types
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createDiagnostic,
  formatDiagnostic,
} from "./diagnostic.js";

describe("Diagnostics", () => {
  describe("createDiagnostic", () => {
    it("should create a diagnostic with all fields", () => {
      const diagnostic = createDiagnostic(
        "BRG9007",
        "error",
        "Invalid item",
        { file: "bindings.json", pointer: "/content/2" },
        "Check the generator output"
      );

      expect(diagnostic.code).to.equal("BRG9007");
      expect(diagnostic.severity).to.equal("error");
      expect(diagnostic.location?.pointer).to.equal("/content/2");
      expect(diagnostic.hint).to.equal("Check the generator output");
    });

    it("should create a diagnostic without optional fields", () => {
      const diagnostic = createDiagnostic("BRG2001", "warning", "Empty");

      expect(diagnostic.location).to.be.undefined;
      expect(diagnostic.hint).to.be.undefined;
    });
  });

  describe("formatDiagnostic", () => {
    it("should include location, code and hint", () => {
      const text = formatDiagnostic(
        createDiagnostic(
          "BRG9008",
          "error",
          "Invalid type",
          { file: "bindings.json", pointer: "/content/0/fields/1/type" },
          "Expected a 'kind' field"
        )
      );

      expect(text).to.equal(
        "bindings.json#/content/0/fields/1/type error BRG9008: Invalid type Hint: Expected a 'kind' field"
      );
    });

    it("should format a bare diagnostic", () => {
      const text = formatDiagnostic(
        createDiagnostic("BRG2001", "error", "Raw module has no content")
      );
      expect(text).to.equal("error BRG2001: Raw module has no content");
    });
  });
});
