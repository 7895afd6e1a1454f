/**
 * Tests for behavior synthesis
 */

import { describe, it, expect } from "vitest";
import { buildDescriptor, displayValue, synthesize, type ErrorTypeDefinition } from "../src/index.js";

const definition: ErrorTypeDefinition = {
  name: "AppError",
  prefix: "App",
  variants: [
    { name: "Io", kind: "source-wrap", fields: [{ type: "Error" }] },
    {
      name: "NotFound",
      kind: "custom-kind",
      fields: [{ type: "number" }, { type: "string" }],
      template: "code:{0} message:{1}",
    },
    { name: "Braces", kind: "custom-kind", fields: [], template: "{{}}" },
  ],
};

describe("displayValue", () => {
  it("should render errors as their message", () => {
    expect(displayValue(new Error("disk full"))).toBe("disk full");
  });

  it("should render strings verbatim", () => {
    expect(displayValue("Not Found")).toBe("Not Found");
  });

  it("should stringify other values", () => {
    expect(displayValue(404)).toBe("404");
    expect(displayValue(10n)).toBe("10");
    expect(displayValue(false)).toBe("false");
    expect(displayValue(null)).toBe("null");
  });
});

describe("synthesize", () => {
  const behavior = synthesize(buildDescriptor(definition));

  it("should render custom-kind variants with the prefix", () => {
    expect(behavior.render("NotFound", [404, "Not Found"])).toBe("App: code:404 message:Not Found");
  });

  it("should render a source-wrap variant as its source behind the prefix", () => {
    expect(behavior.render("Io", [new Error("No such file or directory")])).toBe(
      "App: No such file or directory"
    );
  });

  it("should render escaped braces literally", () => {
    expect(behavior.render("Braces", [])).toBe("App: {}");
  });

  it("should expose field 0 as the cause of source-wrap variants only", () => {
    const source = new Error("boom");
    expect(behavior.causeOf("Io", [source])).toBe(source);
    expect(behavior.causeOf("NotFound", [404, "x"])).toBeUndefined();
  });

  it("should list one conversion per source-wrap variant", () => {
    expect(behavior.conversions).toEqual(new Map([["Error", "Io"]]));
  });

  it("should reject unknown variants", () => {
    expect(() => behavior.render("Missing", [])).toThrow(new TypeError("AppError has no variant `Missing`"));
  });

  it("should render without prefix when none is declared", () => {
    const plain = synthesize(buildDescriptor({ ...definition, prefix: undefined }));
    expect(plain.render("NotFound", [1, "x"])).toBe("code:1 message:x");
  });

  it("should apply an empty prefix as a bare separator", () => {
    const empty = synthesize(buildDescriptor({ ...definition, prefix: "" }));
    expect(empty.render("Braces", [])).toBe(": {}");
  });
});
