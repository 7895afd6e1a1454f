/**
 * Error module emitter
 *
 * Turns validated descriptors into one standalone TypeScript module: a class
 * per error type with a static constructor per variant, one `from<Source>`
 * lift per wrapped source type, and a result alias. Display text is inlined
 * as string concatenation; the module has no runtime dependency on faultline.
 *
 * Generated shape, for `AppError { Io(source: IoFailure); NotFound(code, message) }`:
 *
 * ```typescript
 * export interface AppErrorFields {
 *   Io: [source: IoFailure];
 *   NotFound: [code: number, message: string];
 * }
 *
 * export class AppError<K extends keyof AppErrorFields = keyof AppErrorFields> extends Error {
 *   static Io(source: IoFailure): AppError<"Io"> { ... }
 *   static NotFound(code: number, message: string): AppError<"NotFound"> { ... }
 *   static fromIoFailure(source: IoFailure): AppError<"Io"> { ... }
 *   static is(value: unknown): value is AppErrorVariant { ... }
 *   render(): string { ... }
 * }
 *
 * export type AppErrorVariant = { [K in keyof AppErrorFields]: AppError<K> }[keyof AppErrorFields];
 * export type AppErrorResult<T> = T | AppErrorVariant;
 * ```
 */

import * as ts from "typescript";
import {
  DiagnosticCollector,
  FL1006,
  FL1999,
  type ErrorTypeDescriptor,
  type VariantDescriptor,
} from "@faultline/core";

export interface EmitOptions {
  /** Import declarations placed at the top of the module, already rebased */
  imports?: readonly string[];
  /** Comment text for the first line; omitted when undefined */
  header?: string;
}

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/** Static members every generated class owns besides its variants. */
const CLASS_STATICS = new Set(["is", "name", "length", "prototype"]);

const DISPLAY_FIELD_HELPER = `function displayField(value: unknown): string {
  if (value instanceof Error) return value.message;
  return typeof value === "string" ? value : String(value);
}`;

/**
 * Name of the lift for a source type tag: `IoFailure` → `fromIoFailure`,
 * `NodeJS.ErrnoException` → `fromNodeJSErrnoException`.
 */
export function liftName(sourceTag: string): string {
  const words = sourceTag.split(/[^A-Za-z0-9_$]+/).filter(Boolean);
  return `from${words.map((w) => w[0].toUpperCase() + w.slice(1)).join("")}`;
}

function paramNames(variant: VariantDescriptor): string[] {
  const names = variant.fields.map((f, i) =>
    f.name !== undefined && IDENTIFIER.test(f.name) ? f.name : `field${i}`
  );
  // Positional names stand in when declared names repeat
  return new Set(names).size === names.length ? names : names.map((_n, i) => `field${i}`);
}

/**
 * Message expression for a variant: the prefix and literal segments become
 * string literals, field segments become `displayField(param)` calls.
 */
function messageExpression(
  descriptor: ErrorTypeDescriptor,
  variant: VariantDescriptor,
  params: readonly string[]
): string {
  const parts: string[] = [];
  let literal = descriptor.prefix === undefined ? "" : `${descriptor.prefix}: `;

  for (const segment of variant.display) {
    if (segment.type === "literal") {
      literal += segment.text;
      continue;
    }
    if (literal) {
      parts.push(JSON.stringify(literal));
      literal = "";
    }
    parts.push(`displayField(${params[segment.index]})`);
  }
  if (literal || parts.length === 0) {
    parts.push(JSON.stringify(literal));
  }
  return parts.join(" + ");
}

function emitType(descriptor: ErrorTypeDescriptor, collector: DiagnosticCollector): string {
  const name = descriptor.name;
  const fieldsName = `${name}Fields`;
  const variantName = `${name}Variant`;
  const variants = descriptor.variants;

  const variantNames = new Set(variants.map((v) => v.name));
  const lifts = new Map<string, VariantDescriptor>();
  for (const variant of variants) {
    if (variant.kind !== "source-wrap") continue;
    const lift = liftName(variant.fields[0].type);
    const taken = variantNames.has(lift) || CLASS_STATICS.has(lift) || lifts.has(lift);
    if (taken) {
      collector
        .report(FL1006)
        .withArgs({ type: name, variant: variant.name, member: lift })
        .note(`\`${lift}\` is the conversion from \`${variant.fields[0].type}\``)
        .emit();
      continue;
    }
    lifts.set(lift, variant);
  }

  const lines: string[] = [];

  lines.push(`export interface ${fieldsName} {`);
  for (const variant of variants) {
    const params = paramNames(variant);
    const tuple = variant.fields.map((f, i) => `${params[i]}: ${f.type}`).join(", ");
    lines.push(`  ${variant.name}: [${tuple}];`);
  }
  lines.push("}");
  lines.push("");

  lines.push(`export class ${name}<K extends keyof ${fieldsName} = keyof ${fieldsName}> extends Error {`);

  for (const variant of variants) {
    const params = paramNames(variant);
    const signature = variant.fields.map((f, i) => `${params[i]}: ${f.type}`).join(", ");
    const cause = variant.kind === "source-wrap" ? `, ${params[0]}` : "";
    lines.push(`  static ${variant.name}(${signature}): ${name}<${JSON.stringify(variant.name)}> {`);
    lines.push(
      `    return new ${name}(${JSON.stringify(variant.name)}, [${params.join(", ")}], ${messageExpression(descriptor, variant, params)}${cause});`
    );
    lines.push("  }");
    lines.push("");
  }

  for (const [lift, variant] of lifts) {
    const source = variant.fields[0].type;
    lines.push(`  static ${lift}(source: ${source}): ${name}<${JSON.stringify(variant.name)}> {`);
    lines.push(`    return ${name}.${variant.name}(source);`);
    lines.push("  }");
    lines.push("");
  }

  lines.push(`  static is(value: unknown): value is ${variantName} {`);
  lines.push(`    return value instanceof ${name};`);
  lines.push("  }");
  lines.push("");
  lines.push(`  readonly fields: Readonly<${fieldsName}[K]>;`);
  lines.push("");
  lines.push("  private constructor(");
  lines.push("    readonly kind: K,");
  lines.push(`    fields: ${fieldsName}[K],`);
  lines.push("    message: string,");
  lines.push("    cause?: unknown");
  lines.push("  ) {");
  lines.push("    super(message, cause === undefined ? undefined : { cause });");
  lines.push(`    this.name = ${JSON.stringify(name)};`);
  lines.push("    this.fields = Object.freeze(fields);");
  lines.push("  }");
  lines.push("");
  lines.push("  render(): string {");
  lines.push("    return this.message;");
  lines.push("  }");
  lines.push("}");
  lines.push("");

  lines.push(
    `export type ${variantName} = { [K in keyof ${fieldsName}]: ${name}<K> }[keyof ${fieldsName}];`
  );
  lines.push(`export type ${name}Result<T> = T | ${variantName};`);

  return lines.join("\n");
}

/**
 * Check that emitted text is well-formed TypeScript.
 */
function validateModule(code: string, collector: DiagnosticCollector): void {
  const { diagnostics } = ts.transpileModule(code, {
    compilerOptions: {
      target: ts.ScriptTarget.ES2022,
      module: ts.ModuleKind.ESNext,
    },
    reportDiagnostics: true,
  });

  for (const diagnostic of diagnostics ?? []) {
    collector
      .report(FL1999)
      .withArgs({ reason: ts.flattenDiagnosticMessageText(diagnostic.messageText, "\n") })
      .emit();
  }
}

/**
 * Emit one module for a set of descriptors.
 *
 * @throws GenerationError on a lift name collision (FL1006) or unparseable output (FL1999)
 */
export function emitErrorModule(
  descriptors: readonly ErrorTypeDescriptor[],
  options: EmitOptions = {}
): string {
  const collector = new DiagnosticCollector();
  const sections: string[] = [];

  if (options.header !== undefined) {
    sections.push(`// ${options.header}`);
  }
  if (options.imports && options.imports.length > 0) {
    sections.push(options.imports.join("\n"));
  }
  if (descriptors.length > 0) {
    sections.push(DISPLAY_FIELD_HELPER);
  }
  for (const descriptor of descriptors) {
    sections.push(emitType(descriptor, collector));
  }

  collector.throwIfErrors();

  const code = sections.join("\n\n") + "\n";
  validateModule(code, collector);
  collector.throwIfErrors();

  return code;
}
