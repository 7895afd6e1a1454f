/**
 * Tests for reading error definitions from annotated interfaces
 */

import { describe, it, expect } from "vitest";
import { GenerationError, type RichDiagnostic } from "@faultline/core";
import { parseTagArguments, readDefinitionsFromText } from "../src/index.js";

const APP_ERRORS = `import type { IoFailure } from "./io.js";

/** @errorPrefix App */
export interface AppError {
  /** @errorFrom */
  Io(source: IoFailure): void;
  /** @errorKind "code:{} message:{}" 0 1 */
  NotFound(code: number, message: string): void;
  /** @errorKind error without arguments */
  Disconnected(): void;
}

export interface Unrelated {
  value: string;
}
`;

function diagnosticsOf(source: string): readonly RichDiagnostic[] {
  try {
    readDefinitionsFromText("bad.errors.ts", source);
  } catch (error) {
    if (error instanceof GenerationError) return error.diagnostics;
    throw error;
  }
  throw new Error("expected the source to be rejected");
}

describe("parseTagArguments", () => {
  it("should read a quoted template followed by field references", () => {
    expect(parseTagArguments(' "code:{} message:{}" 0 1 ')).toEqual({
      ok: true,
      args: { template: "code:{} message:{}", refs: [0, 1] },
    });
  });

  it("should accept single quotes", () => {
    expect(parseTagArguments("'IO: {}' 0")).toEqual({ ok: true, args: { template: "IO: {}", refs: [0] } });
  });

  it("should decode backslash escapes", () => {
    expect(parseTagArguments('"say \\"hi\\"\\n"')).toEqual({
      ok: true,
      args: { template: 'say "hi"\n', refs: [] },
    });
  });

  it("should take unquoted text as the whole template", () => {
    expect(parseTagArguments("error without arguments")).toEqual({
      ok: true,
      args: { template: "error without arguments", refs: [] },
    });
  });

  it("should return no template for empty text", () => {
    expect(parseTagArguments("   ")).toEqual({ ok: true, args: { refs: [] } });
  });

  it("should keep an empty quoted template", () => {
    expect(parseTagArguments('""')).toEqual({ ok: true, args: { template: "", refs: [] } });
  });

  it("should reject an unterminated template", () => {
    expect(parseTagArguments('"code:{} 0')).toEqual({ ok: false, reason: 'unterminated " in template' });
  });

  it("should reject non-integer references", () => {
    expect(parseTagArguments('"{}" first')).toEqual({
      ok: false,
      reason: "expected field references after the template, found `first`",
    });
  });
});

describe("readDefinitions", () => {
  const [appError, ...others] = readDefinitionsFromText("app.errors.ts", APP_ERRORS);

  it("should read only annotated interfaces", () => {
    expect(appError.name).toBe("AppError");
    expect(others).toEqual([]);
  });

  it("should read the prefix", () => {
    expect(appError.prefix).toBe("App");
  });

  it("should read a source-wrap member from its parameter", () => {
    expect(appError.variants[0]).toMatchObject({
      name: "Io",
      kind: "source-wrap",
      fields: [{ type: "IoFailure", name: "source" }],
      refs: [],
    });
    expect(appError.variants[0].template).toBeUndefined();
  });

  it("should read a custom-kind member with quoted template and references", () => {
    expect(appError.variants[1]).toMatchObject({
      name: "NotFound",
      kind: "custom-kind",
      fields: [
        { type: "number", name: "code" },
        { type: "string", name: "message" },
      ],
      template: "code:{} message:{}",
      refs: [0, 1],
    });
  });

  it("should read an unquoted template", () => {
    expect(appError.variants[2]).toMatchObject({
      name: "Disconnected",
      fields: [],
      template: "error without arguments",
      refs: [],
    });
  });

  it("should record member locations", () => {
    expect(appError.variants[0].location).toEqual({
      fileName: "app.errors.ts",
      line: 6,
      column: 3,
      length: 2,
      lineText: "  Io(source: IoFailure): void;",
    });
    expect(appError.location).toMatchObject({ line: 4, column: 18, length: 8 });
  });

  it("should rename the type with @errorType", () => {
    const [definition] = readDefinitionsFromText(
      "x.ts",
      `/** @errorType ConfigError */
interface ConfigErrors {}
`
    );
    expect(definition).toMatchObject({ name: "ConfigError", variants: [] });
    expect("prefix" in definition).toBe(false);
  });

  it("should accept an empty quoted prefix", () => {
    const [definition] = readDefinitionsFromText(
      "x.ts",
      `/** @errorPrefix "" */
interface E {}
`
    );
    expect(definition.prefix).toBe("");
  });

  it("should keep type text for generic and qualified parameter types", () => {
    const [definition] = readDefinitionsFromText(
      "x.ts",
      `interface E {
  /** @errorFrom */
  Errno(source: NodeJS.ErrnoException): void;
  /** @errorKind "{} items" 0 */
  Many(items: Array<string>): void;
}
`
    );
    expect(definition.variants.map((v) => v.fields[0].type)).toEqual(["NodeJS.ErrnoException", "Array<string>"]);
  });

  describe("invalid annotations (FL1007)", () => {
    it("should reject property members", () => {
      const [diag] = diagnosticsOf(`/** @errorType */
interface AppError {
  Io: string;
}
`);
      expect(diag.code).toBe(1007);
      expect(diag.message).toBe(
        "Invalid annotation on `AppError.Io`: members of an error interface must be method signatures"
      );
      expect(diag.location).toMatchObject({ fileName: "bad.errors.ts", line: 3, column: 3 });
    });

    it("should reject members without a kind tag", () => {
      const [diag] = diagnosticsOf(`interface AppError {
  /** @errorFrom */
  Io(source: Error): void;
  Plain(): void;
}
`);
      expect(diag.message).toBe(
        "Invalid annotation on `AppError.Plain`: expected one of `@errorFrom` or `@errorKind`"
      );
    });

    it("should reject members with two kind tags", () => {
      const [diag] = diagnosticsOf(`interface AppError {
  /**
   * @errorFrom
   * @errorKind "x"
   */
  Io(source: Error): void;
}
`);
      expect(diag.message).toBe(
        "Invalid annotation on `AppError.Io`: only one of `@errorFrom` or `@errorKind` may be given"
      );
    });

    it("should reject malformed tag arguments", () => {
      const [diag] = diagnosticsOf(`interface AppError {
  /** @errorKind "code:{}" zero */
  NotFound(code: number): void;
}
`);
      expect(diag.message).toBe(
        "Invalid annotation on `AppError.NotFound`: expected field references after the template, found `zero`"
      );
    });

    it("should reject optional and rest parameters", () => {
      const diagnostics = diagnosticsOf(`interface AppError {
  /** @errorKind "{}" 0 */
  A(code?: number): void;
  /** @errorKind "{}" 0 */
  B(...codes: number[]): void;
}
`);
      expect(diagnostics.map((d) => d.message)).toEqual([
        "Invalid annotation on `AppError.A`: parameter `code` must be required and positional",
        "Invalid annotation on `AppError.B`: parameter `codes` must be required and positional",
      ]);
    });

    it("should reject a bare @errorPrefix", () => {
      const [diag] = diagnosticsOf(`/** @errorPrefix */
interface AppError {}
`);
      expect(diag.message).toBe(
        'Invalid annotation on `AppError`: `@errorPrefix` needs a value; write `@errorPrefix ""` for an empty prefix'
      );
    });

    it("should reject an error type declared twice", () => {
      const [diag] = diagnosticsOf(`/** @errorType */
interface AppError {}
/** @errorType */
interface AppError {}
`);
      expect(diag.message).toBe(
        "Invalid annotation on `AppError`: error type declared more than once in this file"
      );
    });
  });
});
