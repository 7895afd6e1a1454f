/**
 * Annotated-interface front-end
 *
 * Reads error type definitions from interfaces whose members carry
 * `@errorFrom` / `@errorKind` JSDoc tags:
 *
 * ```typescript
 * /** @errorPrefix App *\/
 * export interface AppError {
 *   /** @errorFrom *\/
 *   Io(source: IoFailure): void;
 *   /** @errorKind "code:{} message:{}" 0 1 *\/
 *   NotFound(code: number, message: string): void;
 * }
 * ```
 *
 * The result is the same ErrorTypeDefinition that defineError builds, so
 * both surfaces share one validation path.
 */

import * as ts from "typescript";
import {
  DiagnosticCollector,
  FL1007,
  type ErrorTypeDefinition,
  type FieldDescriptor,
  type SourceLocation,
  type VariantDefinition,
  type VariantKind,
} from "@faultline/core";

const TYPE_TAG = "errorType";
const PREFIX_TAG = "errorPrefix";
const KIND_TAGS: Readonly<Record<string, VariantKind>> = {
  errorFrom: "source-wrap",
  errorKind: "custom-kind",
};

/** Template and field references read from a tag comment. */
export interface TagArguments {
  template?: string;
  refs: number[];
}

export type TagArgumentsResult = { ok: true; args: TagArguments } | { ok: false; reason: string };

const ESCAPES: Readonly<Record<string, string>> = { n: "\n", t: "\t", r: "\r" };

/**
 * Parse the text after a kind tag.
 *
 *   `"code:{} message:{}" 0 1` → template + refs [0, 1]
 *   `error without arguments`  → the whole text is the template
 *   ``                         → no template
 */
export function parseTagArguments(text: string): TagArgumentsResult {
  const trimmed = text.trim();
  if (trimmed === "") {
    return { ok: true, args: { refs: [] } };
  }

  const quote = trimmed[0];
  if (quote !== '"' && quote !== "'") {
    return { ok: true, args: { template: trimmed, refs: [] } };
  }

  let template = "";
  let end = -1;
  for (let i = 1; i < trimmed.length; i++) {
    const ch = trimmed[i];
    if (ch === "\\" && i + 1 < trimmed.length) {
      const next = trimmed[++i];
      template += ESCAPES[next] ?? next;
    } else if (ch === quote) {
      end = i;
      break;
    } else {
      template += ch;
    }
  }
  if (end === -1) {
    return { ok: false, reason: `unterminated ${quote} in template` };
  }

  const refs: number[] = [];
  for (const word of trimmed.slice(end + 1).split(/\s+/).filter(Boolean)) {
    if (!/^\d+$/.test(word)) {
      return { ok: false, reason: `expected field references after the template, found \`${word}\`` };
    }
    refs.push(Number(word));
  }
  return { ok: true, args: { template, refs } };
}

function tagText(tag: ts.JSDocTag): string {
  return ts.getTextOfJSDocComment(tag.comment) ?? "";
}

function tagsNamed(node: ts.Node, names: readonly string[]): ts.JSDocTag[] {
  return ts.getJSDocTags(node).filter((tag) => names.includes(tag.tagName.text));
}

/** 1-based location of a node, with its line for code frames. */
export function locationOf(node: ts.Node, sourceFile: ts.SourceFile): SourceLocation {
  const start = node.getStart(sourceFile);
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(start);
  const lineStarts = sourceFile.getLineStarts();
  const lineEnd = line + 1 < lineStarts.length ? lineStarts[line + 1] : sourceFile.text.length;
  const lineText = sourceFile.text.slice(lineStarts[line], lineEnd).replace(/\r?\n$/, "");
  return {
    fileName: sourceFile.fileName,
    line: line + 1,
    column: character + 1,
    length: Math.max(1, Math.min(node.getEnd(), lineStarts[line] + lineText.length) - start),
    lineText,
  };
}

function isAnnotated(iface: ts.InterfaceDeclaration): boolean {
  if (tagsNamed(iface, [TYPE_TAG, PREFIX_TAG]).length > 0) return true;
  return iface.members.some((m) => tagsNamed(m, Object.keys(KIND_TAGS)).length > 0);
}

function unquote(text: string): string {
  const parsed = parseTagArguments(text);
  return parsed.ok && parsed.args.template !== undefined && parsed.args.refs.length === 0
    ? parsed.args.template
    : text.trim();
}

class DefinitionReader {
  constructor(
    private readonly sourceFile: ts.SourceFile,
    private readonly collector: DiagnosticCollector
  ) {}

  private invalid(node: ts.Node, target: string, reason: string): void {
    this.collector
      .report(FL1007)
      .at(locationOf(node, this.sourceFile))
      .withArgs({ target, reason })
      .emit();
  }

  readInterface(iface: ts.InterfaceDeclaration): ErrorTypeDefinition {
    const typeName = iface.name.text;
    const location = locationOf(iface.name, this.sourceFile);

    let name = typeName;
    const [typeTag] = tagsNamed(iface, [TYPE_TAG]);
    const typeText = typeTag ? tagText(typeTag).trim() : "";
    if (typeText !== "") {
      if (/^[A-Za-z_$][\w$]*$/.test(typeText)) {
        name = typeText;
      } else {
        this.invalid(iface.name, typeName, `\`@${TYPE_TAG} ${typeText}\` is not an identifier`);
      }
    }

    let prefix: string | undefined;
    const prefixTags = tagsNamed(iface, [PREFIX_TAG]);
    if (prefixTags.length > 1) {
      this.invalid(iface.name, typeName, `\`@${PREFIX_TAG}\` given more than once`);
    } else if (prefixTags.length === 1) {
      const text = tagText(prefixTags[0]);
      if (text.trim() === "") {
        this.invalid(
          iface.name,
          typeName,
          `\`@${PREFIX_TAG}\` needs a value; write \`@${PREFIX_TAG} ""\` for an empty prefix`
        );
      } else {
        prefix = unquote(text);
      }
    }

    const variants: VariantDefinition[] = [];
    for (const member of iface.members) {
      const variant = this.readMember(typeName, member);
      if (variant) variants.push(variant);
    }

    return prefix === undefined
      ? { name, variants, location }
      : { name, prefix, variants, location };
  }

  private readMember(typeName: string, member: ts.TypeElement): VariantDefinition | undefined {
    const memberName =
      member.name && ts.isIdentifier(member.name) ? member.name.text : member.name?.getText(this.sourceFile);
    const target = `${typeName}.${memberName ?? "(anonymous)"}`;

    if (!ts.isMethodSignature(member) || !ts.isIdentifier(member.name)) {
      this.invalid(member, target, "members of an error interface must be method signatures");
      return undefined;
    }

    const kindTags = tagsNamed(member, Object.keys(KIND_TAGS));
    if (kindTags.length !== 1) {
      this.invalid(
        member.name,
        target,
        kindTags.length === 0
          ? "expected one of `@errorFrom` or `@errorKind`"
          : "only one of `@errorFrom` or `@errorKind` may be given"
      );
      return undefined;
    }

    const kind = KIND_TAGS[kindTags[0].tagName.text];
    const parsed = parseTagArguments(tagText(kindTags[0]));
    if (!parsed.ok) {
      this.invalid(member.name, target, parsed.reason);
      return undefined;
    }

    const fields: FieldDescriptor[] = [];
    for (const param of member.parameters) {
      if (!ts.isIdentifier(param.name)) {
        this.invalid(param, target, "parameters must be plain identifiers");
        return undefined;
      }
      if (param.questionToken || param.dotDotDotToken || param.initializer) {
        this.invalid(param, target, `parameter \`${param.name.text}\` must be required and positional`);
        return undefined;
      }
      fields.push({
        type: param.type ? param.type.getText(this.sourceFile) : "unknown",
        name: param.name.text,
      });
    }

    const { template, refs } = parsed.args;
    const location = locationOf(member.name, this.sourceFile);
    return template === undefined
      ? { name: member.name.text, kind, fields, refs, location }
      : { name: member.name.text, kind, fields, template, refs, location };
  }
}

/**
 * Read every annotated interface declared at the top level of a file.
 *
 * @throws GenerationError (FL1007) for malformed annotations
 */
export function readDefinitions(sourceFile: ts.SourceFile): ErrorTypeDefinition[] {
  const collector = new DiagnosticCollector();
  const reader = new DefinitionReader(sourceFile, collector);
  const definitions: ErrorTypeDefinition[] = [];
  const seen = new Set<string>();

  for (const statement of sourceFile.statements) {
    if (!ts.isInterfaceDeclaration(statement) || !isAnnotated(statement)) continue;

    const definition = reader.readInterface(statement);
    if (seen.has(definition.name)) {
      collector
        .report(FL1007)
        .at(definition.location)
        .withArgs({ target: definition.name, reason: "error type declared more than once in this file" })
        .emit();
      continue;
    }
    seen.add(definition.name);
    definitions.push(definition);
  }

  collector.throwIfErrors();
  return definitions;
}

/** Parse source text with JSDoc attached and read its definitions. */
export function readDefinitionsFromText(fileName: string, text: string): ErrorTypeDefinition[] {
  return readDefinitions(parseSource(fileName, text));
}

export function parseSource(fileName: string, text: string): ts.SourceFile {
  return ts.createSourceFile(fileName, text, ts.ScriptTarget.ES2022, true, ts.ScriptKind.TS);
}
