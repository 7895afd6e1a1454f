/**
 * File pipeline: annotated source → definitions → descriptors → module text.
 *
 * Output lands beside the source (or under `outDir`) with the configured
 * suffix replacing `.ts`: `app.errors.ts` → `app.errors.generated.ts`.
 */

import * as ts from "typescript";
import * as fs from "fs";
import * as path from "path";
import {
  GenerationError,
  buildDescriptor,
  config,
  logger,
  type ErrorTypeDefinition,
  type ErrorTypeDescriptor,
  type RichDiagnostic,
} from "@faultline/core";
import { parseSource, readDefinitions } from "./annotations.js";
import { emitErrorModule } from "./emit.js";

export interface GenerateOptions {
  /** Directory for generated modules; defaults to the source's directory */
  outDir?: string;
}

export interface GenerateResult {
  sourceFile: string;
  outFile: string;
  definitions: ErrorTypeDefinition[];
  descriptors: ErrorTypeDescriptor[];
  /** Module text; empty when the source declares no error types */
  code: string;
}

export interface CheckResult {
  outFile: string;
  /** True when the file on disk matches what would be generated */
  upToDate: boolean;
  result: GenerateResult;
}

const DEFAULT_SUFFIX = ".generated.ts";

/** Where the module generated from `fileName` is written. */
export function outputPathFor(fileName: string, outDir?: string): string {
  const suffix = config.get<string>("codegen.outSuffix") ?? DEFAULT_SUFFIX;
  const base = path.basename(fileName).replace(/(\.d)?\.[cm]?tsx?$/, "");
  return path.join(outDir ?? path.dirname(fileName), `${base}${suffix}`);
}

/**
 * Relative module specifier from `outFile` to what `specifier` named from
 * `fileName`. Bare specifiers pass through.
 */
export function rebaseSpecifier(specifier: string, fileName: string, outFile: string): string {
  if (!specifier.startsWith("./") && !specifier.startsWith("../")) {
    return specifier;
  }
  const target = path.resolve(path.dirname(fileName), specifier);
  const relative = path.relative(path.dirname(outFile), target).split(path.sep).join("/");
  return relative.startsWith(".") ? relative : `./${relative}`;
}

function rebasedImports(sourceFile: ts.SourceFile, outFile: string): string[] {
  const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
  const imports: string[] = [];

  for (const statement of sourceFile.statements) {
    if (!ts.isImportDeclaration(statement) || !ts.isStringLiteral(statement.moduleSpecifier)) continue;

    const specifier = rebaseSpecifier(statement.moduleSpecifier.text, sourceFile.fileName, outFile);
    const updated = ts.factory.updateImportDeclaration(
      statement,
      statement.modifiers,
      statement.importClause,
      ts.factory.createStringLiteral(specifier),
      statement.attributes
    );
    imports.push(printer.printNode(ts.EmitHint.Unspecified, updated, sourceFile));
  }

  return imports;
}

function headerFor(fileName: string): string | undefined {
  return config.get<boolean>("codegen.header") === false
    ? undefined
    : `Generated by faultline from ${path.basename(fileName)}. Do not edit by hand.`;
}

/**
 * Build every definition of a file together so all diagnostics surface at once.
 */
function buildAll(definitions: readonly ErrorTypeDefinition[]): ErrorTypeDescriptor[] {
  const descriptors: ErrorTypeDescriptor[] = [];
  const diagnostics: RichDiagnostic[] = [];

  for (const definition of definitions) {
    try {
      descriptors.push(buildDescriptor(definition));
    } catch (error) {
      if (!(error instanceof GenerationError)) throw error;
      diagnostics.push(...error.diagnostics);
    }
  }

  if (diagnostics.length > 0) {
    throw new GenerationError(diagnostics);
  }
  return descriptors;
}

/**
 * Generate the module text for annotated source text. Nothing is written.
 *
 * @throws GenerationError with every diagnostic of the file
 */
export function generateFromSource(
  fileName: string,
  sourceText: string,
  options: GenerateOptions = {}
): GenerateResult {
  const outFile = outputPathFor(fileName, options.outDir);
  const sourceFile = parseSource(fileName, sourceText);

  const definitions = readDefinitions(sourceFile);
  const descriptors = buildAll(definitions);

  logger.debug(
    `${path.basename(fileName)}: ${descriptors.map((d) => d.name).join(", ") || "no error types"}`
  );

  const code =
    descriptors.length === 0
      ? ""
      : emitErrorModule(descriptors, {
          imports: rebasedImports(sourceFile, outFile),
          header: headerFor(fileName),
        });

  return { sourceFile: fileName, outFile, definitions, descriptors, code };
}

/**
 * Generate and write the module for one file. Files without error types
 * produce no output.
 */
export function generateFile(fileName: string, options: GenerateOptions = {}): GenerateResult {
  const result = generateFromSource(fileName, fs.readFileSync(fileName, "utf8"), options);

  if (result.code !== "") {
    fs.mkdirSync(path.dirname(result.outFile), { recursive: true });
    fs.writeFileSync(result.outFile, result.code);
    logger.debug(`wrote ${result.outFile}`);
  }

  return result;
}

/**
 * Compare the generated module for one file with what is on disk.
 */
export function checkFile(fileName: string, options: GenerateOptions = {}): CheckResult {
  const result = generateFromSource(fileName, fs.readFileSync(fileName, "utf8"), options);
  const existing = fs.existsSync(result.outFile) ? fs.readFileSync(result.outFile, "utf8") : "";
  return { outFile: result.outFile, upToDate: existing === result.code, result };
}
