import { describe, it } from "mocha";
import { expect } from "chai";
import {
  makeQualifiedName,
  parseQualifiedName,
  qualifiedNameToString,
  qualifiedNameEquals,
  dedupeQualifiedNames,
} from "./qualified-name.js";

describe("QualifiedName", () => {
  it("should parse namespaced names", () => {
    expect(parseQualifiedName("geo::shapes::Point")).to.deep.equal({
      namespace: ["geo", "shapes"],
      name: "Point",
    });
  });

  it("should ignore a leading separator", () => {
    expect(parseQualifiedName("::Point")).to.deep.equal({
      namespace: [],
      name: "Point",
    });
  });

  it("should print the canonical form", () => {
    expect(qualifiedNameToString(makeQualifiedName("Widget", ["ui"]))).to.equal(
      "ui::Widget"
    );
    expect(qualifiedNameToString(makeQualifiedName("Widget"))).to.equal(
      "Widget"
    );
  });

  it("should compare structurally", () => {
    expect(
      qualifiedNameEquals(
        parseQualifiedName("ui::Widget"),
        makeQualifiedName("Widget", ["ui"])
      )
    ).to.equal(true);
    expect(
      qualifiedNameEquals(
        parseQualifiedName("ui::Widget"),
        parseQualifiedName("Widget")
      )
    ).to.equal(false);
  });

  it("should dedupe while keeping first occurrences", () => {
    const names = dedupeQualifiedNames([
      parseQualifiedName("A"),
      parseQualifiedName("ns::B"),
      parseQualifiedName("A"),
    ]);
    expect(names.map(qualifiedNameToString)).to.deep.equal(["A", "ns::B"]);
  });
});
