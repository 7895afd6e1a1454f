/**
 * Tests for the variant descriptor builder
 */

import { describe, it, expect } from "vitest";
import {
  GenerationError,
  buildDescriptor,
  conversionTable,
  getVariant,
  type ErrorTypeDefinition,
  type RichDiagnostic,
} from "../src/index.js";

function diagnosticsOf(definition: ErrorTypeDefinition): readonly RichDiagnostic[] {
  try {
    buildDescriptor(definition);
  } catch (error) {
    if (error instanceof GenerationError) return error.diagnostics;
    throw error;
  }
  throw new Error(`expected ${definition.name} to be rejected`);
}

const appError: ErrorTypeDefinition = {
  name: "AppError",
  variants: [
    { name: "Io", kind: "source-wrap", fields: [{ type: "IoFailure", name: "source" }] },
    { name: "Disconnected", kind: "custom-kind", fields: [], template: "error without arguments" },
    {
      name: "NotFound",
      kind: "custom-kind",
      fields: [{ type: "number", name: "code" }, { type: "string", name: "message" }],
      template: "code:{} message:{}",
      refs: [0, 1],
    },
  ],
};

describe("buildDescriptor", () => {
  describe("valid definitions", () => {
    it("should keep variants in declaration order with their arity", () => {
      const descriptor = buildDescriptor(appError);
      expect(descriptor.variants.map((v) => [v.name, v.kind, v.arity])).toEqual([
        ["Io", "source-wrap", 1],
        ["Disconnected", "custom-kind", 0],
        ["NotFound", "custom-kind", 2],
      ]);
    });

    it("should give a source-wrap variant without template the default display", () => {
      const io = getVariant(buildDescriptor(appError), "Io");
      expect(io?.display).toEqual([{ type: "field", index: 0 }]);
    });

    it("should parse custom-kind templates", () => {
      const notFound = getVariant(buildDescriptor(appError), "NotFound");
      expect(notFound?.display).toEqual([
        { type: "literal", text: "code:" },
        { type: "field", index: 0 },
        { type: "literal", text: " message:" },
        { type: "field", index: 1 },
      ]);
    });

    it("should accept a source-wrap variant with its own template", () => {
      const descriptor = buildDescriptor({
        name: "AppError",
        variants: [
          {
            name: "Io",
            kind: "source-wrap",
            fields: [{ type: "IoFailure" }],
            template: "IO: {}",
            refs: [0],
          },
        ],
      });
      expect(descriptor.variants[0].display).toEqual([
        { type: "literal", text: "IO: " },
        { type: "field", index: 0 },
      ]);
    });

    it("should record the prefix only when present", () => {
      expect("prefix" in buildDescriptor(appError)).toBe(false);
      expect(buildDescriptor({ ...appError, prefix: "App" }).prefix).toBe("App");
      expect(buildDescriptor({ ...appError, prefix: "" }).prefix).toBe("");
    });

    it("should accept a type with no variants", () => {
      expect(buildDescriptor({ name: "Never", variants: [] }).variants).toEqual([]);
    });

    it("should freeze the descriptor", () => {
      const descriptor = buildDescriptor(appError);
      expect(Object.isFrozen(descriptor)).toBe(true);
      expect(Object.isFrozen(descriptor.variants)).toBe(true);
      expect(Object.isFrozen(descriptor.variants[2])).toBe(true);
      expect(Object.isFrozen(descriptor.variants[2].fields[0])).toBe(true);
    });

    it("should return the same descriptor for the same definition", () => {
      expect(buildDescriptor(appError)).toEqual(buildDescriptor(appError));
    });
  });

  describe("validation", () => {
    it("should report a field index beyond the arity (FL1002)", () => {
      const [diag] = diagnosticsOf({
        name: "AppError",
        variants: [
          {
            name: "NotFound",
            kind: "custom-kind",
            fields: [{ type: "number" }, { type: "string" }],
            template: "code:{} message:{}",
            refs: [0, 2],
          },
        ],
      });
      expect(diag.code).toBe(1002);
      expect(diag.message).toBe("`AppError.NotFound` references field 2 but has arity 2");
      expect(diag.help).toBe("Reference a field between {0} and {1}");
    });

    it("should report any placeholder on a zero-arity variant (FL1002)", () => {
      const [diag] = diagnosticsOf({
        name: "AppError",
        variants: [{ name: "Empty", kind: "custom-kind", fields: [], template: "{0}" }],
      });
      expect(diag.code).toBe(1002);
      expect(diag.help).toBe("This variant declares no fields; remove the placeholder");
    });

    it("should report a duplicate variant name (FL1003)", () => {
      const [diag] = diagnosticsOf({
        name: "AppError",
        variants: [
          { name: "Timeout", kind: "custom-kind", fields: [], template: "a" },
          { name: "Timeout", kind: "custom-kind", fields: [], template: "b" },
        ],
      });
      expect(diag.code).toBe(1003);
      expect(diag.message).toBe("Duplicate variant `Timeout` in `AppError`");
    });

    it("should report two variants wrapping the same source (FL1004)", () => {
      const diagnostics = diagnosticsOf({
        name: "AppError",
        variants: [
          { name: "Io", kind: "source-wrap", fields: [{ type: "IoFailure" }] },
          { name: "Io2", kind: "source-wrap", fields: [{ type: "IoFailure" }] },
        ],
      });
      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0].code).toBe(1004);
      expect(diagnostics[0].message).toBe(
        "`AppError.Io2` wraps `IoFailure`, which `AppError.Io` already wraps"
      );
    });

    it("should allow a custom-kind variant to carry the same type as a source-wrap variant", () => {
      const descriptor = buildDescriptor({
        name: "AppError",
        variants: [
          { name: "Io", kind: "source-wrap", fields: [{ type: "IoFailure" }] },
          {
            name: "IoContext",
            kind: "custom-kind",
            fields: [{ type: "IoFailure" }],
            template: "while reading: {}",
            refs: [0],
          },
        ],
      });
      expect(conversionTable(descriptor)).toEqual(new Map([["IoFailure", "Io"]]));
    });

    it("should report a source-wrap variant without exactly one field (FL1005)", () => {
      const [diag] = diagnosticsOf({
        name: "AppError",
        variants: [
          { name: "Io", kind: "source-wrap", fields: [{ type: "IoFailure" }, { type: "string" }] },
        ],
      });
      expect(diag.code).toBe(1005);
      expect(diag.message).toBe(
        "Source-wrap variant `AppError.Io` must have exactly one field, found 2"
      );
    });

    it("should report a reserved variant name (FL1006)", () => {
      const [diag] = diagnosticsOf({
        name: "AppError",
        variants: [{ name: "from", kind: "custom-kind", fields: [], template: "x" }],
      });
      expect(diag.code).toBe(1006);
      expect(diag.help).toBe("Rename the variant, e.g. `fromError`");
    });

    it("should report a custom-kind variant without a template (FL1001)", () => {
      const [diag] = diagnosticsOf({
        name: "AppError",
        variants: [{ name: "Bare", kind: "custom-kind", fields: [] }],
      });
      expect(diag.code).toBe(1001);
      expect(diag.message).toBe(
        "Malformed display template (none) in `AppError.Bare`: custom-kind variants require a display template"
      );
    });

    it("should name the owning variant in a malformed template diagnostic (FL1001)", () => {
      const [diag] = diagnosticsOf({
        name: "AppError",
        variants: [
          { name: "NotFound", kind: "custom-kind", fields: [{ type: "number" }], template: "{", refs: [0] },
        ],
      });
      expect(diag.message).toBe(
        'Malformed display template "{" in `AppError.NotFound`: unclosed `{` at position 0'
      );
    });

    it("should report every problem in one pass", () => {
      const diagnostics = diagnosticsOf({
        name: "AppError",
        variants: [
          { name: "A", kind: "custom-kind", fields: [], template: "{0}" },
          { name: "A", kind: "custom-kind", fields: [], template: "x" },
          { name: "B", kind: "source-wrap", fields: [] },
        ],
      });
      expect(diagnostics.map((d) => d.code)).toEqual([1002, 1003, 1005]);
    });

    it("should attach the variant location to its diagnostic", () => {
      const location = { fileName: "app.errors.ts", line: 4, column: 3 };
      const [diag] = diagnosticsOf({
        name: "AppError",
        variants: [{ name: "A", kind: "custom-kind", fields: [], template: "{0}", location }],
      });
      expect(diag.location).toEqual(location);
    });

    it("should put the first diagnostic and the count in the error message", () => {
      let caught: unknown;
      try {
        buildDescriptor({
          name: "AppError",
          variants: [
            { name: "A", kind: "custom-kind", fields: [], template: "{0}" },
            { name: "A", kind: "custom-kind", fields: [], template: "x" },
          ],
        });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(GenerationError);
      if (!(caught instanceof GenerationError)) return;
      expect(caught.message).toBe(
        "[FL1002] `AppError.A` references field 0 but has arity 0 (and 1 more)"
      );
    });
  });
});

describe("conversionTable", () => {
  it("should map each source tag to its variant", () => {
    expect(conversionTable(buildDescriptor(appError))).toEqual(new Map([["IoFailure", "Io"]]));
  });
});
