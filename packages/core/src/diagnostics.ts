/**
 * Diagnostics System for faultline
 *
 * Every generation failure is a structured diagnostic:
 * - Stable error codes (FL1001-FL1999) with long-form explanations
 * - Optional source location with a code frame
 * - Notes and help text
 * - Compiler-style CLI rendering
 *
 * Generation is all-or-nothing: the builder collects every diagnostic for a
 * type definition and throws them together as one GenerationError.
 *
 * @example
 * ```typescript
 * new DiagnosticBuilder(FL1002, (d) => diagnostics.push(d))
 *   .at(variant.location)
 *   .withArgs({ type: "AppError", variant: "NotFound", index: 2, arity: 2 })
 *   .help("Reference a field between {0} and {1}")
 *   .emit();
 * ```
 */

import type { SourceLocation } from "./types.js";
import { config } from "./config.js";

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  Template = "template",
  Descriptor = "descriptor",
  Annotation = "annotation",
  Emit = "emit",
  Internal = "internal",
}

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code in range 1001-1999 */
  readonly code: number;

  /** Short name of the failure, e.g. "MalformedTemplate" */
  readonly name: string;

  /** Every faultline diagnostic fails generation */
  readonly severity: "error";

  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation for docs and `faultline explain` */
  readonly explanation: string;
}

// ============================================================================
// Rich Diagnostic
// ============================================================================

export interface RichDiagnostic {
  code: number;
  name: string;
  severity: "error";
  category: DiagnosticCategory;
  /** Primary message (with placeholders interpolated) */
  message: string;
  location?: SourceLocation;
  notes: string[];
  help?: string;
  explanation?: string;
}

// ============================================================================
// Diagnostic Builder
// ============================================================================

/**
 * Fluent builder for constructing rich diagnostics.
 */
export class DiagnosticBuilder {
  private diagnostic: RichDiagnostic;
  private args: Record<string, string> = {};

  constructor(
    private readonly descriptor: DiagnosticDescriptor,
    private readonly emitter: (diagnostic: RichDiagnostic) => void
  ) {
    this.diagnostic = {
      code: descriptor.code,
      name: descriptor.name,
      severity: descriptor.severity,
      category: descriptor.category,
      message: descriptor.messageTemplate,
      notes: [],
      explanation: descriptor.explanation,
    };
  }

  /**
   * Set the primary location. A missing location leaves the diagnostic unanchored.
   */
  at(location: SourceLocation | undefined): this {
    if (location) {
      this.diagnostic.location = location;
    }
    return this;
  }

  /**
   * Provide arguments for message template interpolation.
   */
  withArgs(args: Record<string, string | number | undefined>): this {
    for (const [key, value] of Object.entries(args)) {
      if (value !== undefined) {
        this.args[key] = String(value);
      }
    }
    return this;
  }

  note(message: string): this {
    this.diagnostic.notes.push(message);
    return this;
  }

  help(message: string): this {
    this.diagnostic.help = message;
    return this;
  }

  /**
   * Single pass, so argument values that contain braces are never re-expanded.
   */
  private interpolateMessage(): string {
    return this.descriptor.messageTemplate.replace(/\{(\w+)\}/g, (match, key: string) =>
      key in this.args ? this.args[key] : match
    );
  }

  emit(): void {
    this.diagnostic.message = this.interpolateMessage();
    this.emitter(this.diagnostic);
  }
}

// ============================================================================
// Error Catalog: Templates (1001)
// ============================================================================

export const FL1001: DiagnosticDescriptor = {
  code: 1001,
  name: "MalformedTemplate",
  severity: "error",
  category: DiagnosticCategory.Template,
  messageTemplate: "Malformed display template {template} in `{owner}`: {reason}",
  explanation: `A display template is a literal string with positional placeholders.

Placeholders:
  {}     takes the next entry of the field reference list
  {0}    refers to field 0 directly
  {{ }}  render a literal brace

The number of {} placeholders must equal the number of field references,
and the two placeholder styles cannot be mixed in one template.

Correct:
  errorKind("code:{} message:{}", 0, 1)
  errorKind("code:{0} message:{1}")

Incorrect:
  errorKind("code:{} message:{}", 0)   // two placeholders, one reference
  errorKind("value: {:?}", 0)          // format specs are not supported`,
};

// ============================================================================
// Error Catalog: Descriptors (1002-1006)
// ============================================================================

export const FL1002: DiagnosticDescriptor = {
  code: 1002,
  name: "FieldIndexOutOfRange",
  severity: "error",
  category: DiagnosticCategory.Descriptor,
  messageTemplate: "`{type}.{variant}` references field {index} but has arity {arity}",
  explanation: `Every field reference in a display template must name a field the
variant declares. Fields are numbered from 0.

Incorrect:
  NotFound: errorKind("code:{} message:{}", 0, 2).with(field.number(), field.string())
                                               ^ only fields 0 and 1 exist`,
};

export const FL1003: DiagnosticDescriptor = {
  code: 1003,
  name: "DuplicateVariant",
  severity: "error",
  category: DiagnosticCategory.Descriptor,
  messageTemplate: "Duplicate variant `{variant}` in `{type}`",
  explanation: `Variant names are the discriminant of the generated error type and
must be unique within one type definition.`,
};

export const FL1004: DiagnosticDescriptor = {
  code: 1004,
  name: "AmbiguousConversion",
  severity: "error",
  category: DiagnosticCategory.Descriptor,
  messageTemplate: "`{type}.{variant}` wraps `{source}`, which `{type}.{other}` already wraps",
  explanation: `Each source-wrap variant generates a conversion from its wrapped type
into the owning error type. Two variants wrapping the same source type would
make that conversion ambiguous.

To fix, keep one source-wrap variant per source type and express the other
case as a custom-kind variant.`,
};

export const FL1005: DiagnosticDescriptor = {
  code: 1005,
  name: "InvalidKindArity",
  severity: "error",
  category: DiagnosticCategory.Descriptor,
  messageTemplate:
    "Source-wrap variant `{type}.{variant}` must have exactly one field, found {arity}",
  explanation: `A source-wrap variant holds the wrapped error as its only field.
That field is exposed as the error's cause and is the target of the generated
conversion. Use a custom-kind variant for anything with other fields.`,
};

export const FL1006: DiagnosticDescriptor = {
  code: 1006,
  name: "ReservedVariantName",
  severity: "error",
  category: DiagnosticCategory.Descriptor,
  messageTemplate: "Variant name `{variant}` in `{type}` collides with generated member `{member}`",
  explanation: `Variant constructors live next to the generated helpers (from, is,
capture, descriptor, and the conversion lifts) and next to the built-in
function properties (name, length, prototype). A variant cannot reuse one of
those names.`,
};

// ============================================================================
// Error Catalog: Annotations (1007)
// ============================================================================

export const FL1007: DiagnosticDescriptor = {
  code: 1007,
  name: "InvalidAnnotation",
  severity: "error",
  category: DiagnosticCategory.Annotation,
  messageTemplate: "Invalid annotation on `{target}`: {reason}",
  explanation: `Annotated error interfaces use JSDoc tags:

  /** @errorPrefix App */
  export interface AppError {
    /** @errorFrom */
    Io(source: IoFailure): void;
    /** @errorKind "code:{} message:{}" 0 1 */
    NotFound(code: number, message: string): void;
  }

Every member must be a method signature carrying exactly one of @errorFrom
or @errorKind. A quoted template may be followed by integer field references.`,
};

// ============================================================================
// Error Catalog: Internal (1999)
// ============================================================================

export const FL1999: DiagnosticDescriptor = {
  code: 1999,
  name: "InternalError",
  severity: "error",
  category: DiagnosticCategory.Internal,
  messageTemplate: "Internal error: {reason}",
  explanation: `faultline produced output it could not parse back. This is a bug in
faultline, not in the error definition.`,
};

export const DIAGNOSTIC_CATALOG: ReadonlyMap<number, DiagnosticDescriptor> = new Map(
  [FL1001, FL1002, FL1003, FL1004, FL1005, FL1006, FL1007, FL1999].map((d) => [d.code, d])
);

/**
 * Look up a catalog entry by number (1002) or label ("FL1002").
 */
export function getDiagnosticDescriptor(code: number | string): DiagnosticDescriptor | undefined {
  const numeric = typeof code === "number" ? code : Number(code.replace(/^FL/i, ""));
  return DIAGNOSTIC_CATALOG.get(numeric);
}

// ============================================================================
// Generation Failure
// ============================================================================

/**
 * Thrown when a definition cannot be turned into an error type.
 * Carries every diagnostic found, first one in the message.
 */
export class GenerationError extends Error {
  readonly diagnostics: readonly RichDiagnostic[];

  constructor(diagnostics: readonly RichDiagnostic[]) {
    const more = diagnostics.length > 1 ? ` (and ${diagnostics.length - 1} more)` : "";
    super(
      diagnostics.length > 0
        ? `[FL${diagnostics[0].code}] ${diagnostics[0].message}${more}`
        : "Generation failed"
    );
    this.name = "GenerationError";
    this.diagnostics = diagnostics;
  }

  /** Code of the first diagnostic */
  get code(): number | undefined {
    return this.diagnostics.length > 0 ? this.diagnostics[0].code : undefined;
  }
}

/**
 * Collects diagnostics and throws them as one GenerationError.
 */
export class DiagnosticCollector {
  readonly diagnostics: RichDiagnostic[] = [];

  report(descriptor: DiagnosticDescriptor): DiagnosticBuilder {
    return new DiagnosticBuilder(descriptor, (d) => this.diagnostics.push(d));
  }

  get hasErrors(): boolean {
    return this.diagnostics.length > 0;
  }

  throwIfErrors(): void {
    if (this.hasErrors) {
      throw new GenerationError(this.diagnostics);
    }
  }
}

// ============================================================================
// CLI Renderer: Compiler-Style Error Output
// ============================================================================

/**
 * ANSI color codes for terminal output.
 * Set NO_COLOR or FAULTLINE_NO_COLOR to disable.
 */
const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  blue: "\x1b[34m",
  green: "\x1b[32m",
} as const;

/** A configured `colors` wins over the environment. */
function colorsEnabled(): boolean {
  const configured = config.get<boolean>("colors");
  if (configured !== undefined) return configured;
  if (typeof process === "undefined") return false;
  const env = process.env;
  return !env.NO_COLOR && !env.FAULTLINE_NO_COLOR && env.FORCE_COLOR !== "0";
}

export interface CLIRenderOptions {
  /** Whether to use colors (default: auto-detect) */
  colors?: boolean;
  /** Whether to show the explanation (default: false) */
  showExplanation?: boolean;
  /** Custom writer function (default: console.error) */
  writer?: (line: string) => void;
}

/**
 * Render a RichDiagnostic to CLI output in compiler style.
 *
 * @example Output:
 * ```
 * error[FL1002]: `AppError.NotFound` references field 2 but has arity 2
 *   --> src/app.errors.ts:7:3
 *     |
 *   7 |   NotFound(code: number, message: string): void;
 *     |   ^^^^^^^^
 *     = help: Reference a field between {0} and {1}
 * ```
 */
export function renderDiagnosticCLI(
  diagnostic: RichDiagnostic,
  options: CLIRenderOptions = {}
): string {
  const useColors = options.colors ?? colorsEnabled();
  const color = (text: string, ...styles: (keyof typeof COLORS)[]): string => {
    if (!useColors) return text;
    return `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}`;
  };

  const lines: string[] = [];

  lines.push(
    `${color(`${diagnostic.severity}[FL${diagnostic.code}]`, "bold", "red")}: ${color(diagnostic.message, "bold")}`
  );

  const location = diagnostic.location;
  if (location) {
    lines.push(`  ${color("-->", "blue")} ${location.fileName}:${location.line}:${location.column}`);

    if (location.lineText !== undefined) {
      const numWidth = Math.max(3, String(location.line).length);
      const gutter = " ".repeat(numWidth);
      const underline =
        " ".repeat(location.column - 1) + "^".repeat(Math.max(1, location.length ?? 1));

      lines.push(` ${gutter} ${color("|", "blue")}`);
      lines.push(
        ` ${color(String(location.line).padStart(numWidth, " "), "blue")} ${color("|", "blue")} ${location.lineText}`
      );
      lines.push(` ${gutter} ${color("|", "blue")} ${color(underline, "red")}`);
    }
  }

  for (const note of diagnostic.notes) {
    lines.push(`   ${color("= note:", "bold")} ${note}`);
  }

  if (diagnostic.help) {
    lines.push(`   ${color("= help:", "bold", "green")} ${diagnostic.help}`);
  }

  if (options.showExplanation && diagnostic.explanation) {
    lines.push("");
    lines.push(color("Explanation:", "bold"));
    for (const expLine of diagnostic.explanation.split("\n")) {
      lines.push(`  ${expLine}`);
    }
  }

  return lines.join("\n");
}

/**
 * Render multiple diagnostics with a summary.
 */
export function renderDiagnosticsCLI(
  diagnostics: readonly RichDiagnostic[],
  options: CLIRenderOptions = {}
): string {
  if (diagnostics.length === 0) {
    return "";
  }

  const lines: string[] = [];

  for (const diag of diagnostics) {
    lines.push(renderDiagnosticCLI(diag, options));
    lines.push("");
  }

  const count = diagnostics.length;
  lines.push(`${count} error${count > 1 ? "s" : ""} generated`);

  return lines.join("\n");
}

/**
 * Print multiple diagnostics with a summary (stderr by default).
 */
export function printDiagnostics(
  diagnostics: readonly RichDiagnostic[],
  options: CLIRenderOptions = {}
): void {
  const writer = options.writer ?? ((line: string) => console.error(line));
  writer(renderDiagnosticsCLI(diagnostics, options));
}
