/**
 * Variant descriptor builder
 *
 * Validates an ErrorTypeDefinition exhaustively and produces the canonical,
 * frozen ErrorTypeDescriptor. Every problem in the definition is reported;
 * nothing is returned unless the whole definition is valid.
 */

import type {
  DisplayTemplate,
  ErrorTypeDefinition,
  ErrorTypeDescriptor,
  VariantDefinition,
  VariantDescriptor,
} from "./types.js";
import { DEFAULT_SOURCE_TEMPLATE, tryParseTemplate } from "./template.js";
import {
  DiagnosticCollector,
  FL1001,
  FL1002,
  FL1003,
  FL1004,
  FL1005,
  FL1006,
} from "./diagnostics.js";

/**
 * Names a variant cannot take: they belong to the generated factory or class,
 * or to Function itself.
 */
export const RESERVED_VARIANT_NAMES: ReadonlySet<string> = new Set([
  "name",
  "length",
  "prototype",
  "caller",
  "arguments",
  "from",
  "is",
  "capture",
  "captureAsync",
  "descriptor",
]);

function resolveDisplay(
  typeName: string,
  variant: VariantDefinition,
  collector: DiagnosticCollector
): DisplayTemplate | undefined {
  if (variant.template === undefined) {
    if (variant.kind === "source-wrap") {
      return DEFAULT_SOURCE_TEMPLATE;
    }
    collector
      .report(FL1001)
      .at(variant.location)
      .withArgs({
        template: "(none)",
        owner: `${typeName}.${variant.name}`,
        reason: "custom-kind variants require a display template",
      })
      .emit();
    return undefined;
  }

  const parsed = tryParseTemplate(variant.template, variant.refs);
  if (!parsed.ok) {
    collector
      .report(FL1001)
      .at(variant.location)
      .withArgs({
        template: JSON.stringify(variant.template),
        owner: `${typeName}.${variant.name}`,
        reason: parsed.reason,
      })
      .emit();
    return undefined;
  }
  return parsed.template;
}

/**
 * Build the descriptor for one error type definition.
 *
 * @throws GenerationError carrying every diagnostic found (FL1001-FL1006)
 */
export function buildDescriptor(definition: ErrorTypeDefinition): ErrorTypeDescriptor {
  const collector = new DiagnosticCollector();
  const typeName = definition.name;

  const seen = new Set<string>();
  /** source type tag → variant that wraps it */
  const wrapped = new Map<string, string>();
  const variants: VariantDescriptor[] = [];

  for (const variant of definition.variants) {
    if (seen.has(variant.name)) {
      collector
        .report(FL1003)
        .at(variant.location)
        .withArgs({ type: typeName, variant: variant.name })
        .emit();
      continue;
    }
    seen.add(variant.name);

    if (RESERVED_VARIANT_NAMES.has(variant.name)) {
      collector
        .report(FL1006)
        .at(variant.location)
        .withArgs({ type: typeName, variant: variant.name, member: variant.name })
        .help(`Rename the variant, e.g. \`${variant.name}Error\``)
        .emit();
    }

    const arity = variant.fields.length;

    if (variant.kind === "source-wrap") {
      if (arity !== 1) {
        collector
          .report(FL1005)
          .at(variant.location)
          .withArgs({ type: typeName, variant: variant.name, arity })
          .emit();
        continue;
      }

      const source = variant.fields[0].type;
      const other = wrapped.get(source);
      if (other !== undefined) {
        collector
          .report(FL1004)
          .at(variant.location)
          .withArgs({ type: typeName, variant: variant.name, source, other })
          .emit();
      } else {
        wrapped.set(source, variant.name);
      }
    }

    const display = resolveDisplay(typeName, variant, collector);
    if (!display) continue;

    for (const segment of display) {
      if (segment.type === "field" && segment.index >= arity) {
        collector
          .report(FL1002)
          .at(variant.location)
          .withArgs({ type: typeName, variant: variant.name, index: segment.index, arity })
          .help(
            arity === 0
              ? "This variant declares no fields; remove the placeholder"
              : `Reference a field between {0} and {${arity - 1}}`
          )
          .emit();
      }
    }

    variants.push(
      Object.freeze({
        name: variant.name,
        arity,
        fields: Object.freeze(variant.fields.map((f) => Object.freeze({ ...f }))),
        kind: variant.kind,
        display,
      })
    );
  }

  collector.throwIfErrors();

  const descriptor: ErrorTypeDescriptor =
    definition.prefix === undefined
      ? { name: typeName, variants: Object.freeze(variants) }
      : { name: typeName, prefix: definition.prefix, variants: Object.freeze(variants) };
  return Object.freeze(descriptor);
}

/** Look up a variant by name. */
export function getVariant(
  descriptor: ErrorTypeDescriptor,
  name: string
): VariantDescriptor | undefined {
  return descriptor.variants.find((v) => v.name === name);
}

/** Source type tag → owning variant name, one entry per source-wrap variant. */
export function conversionTable(descriptor: ErrorTypeDescriptor): ReadonlyMap<string, string> {
  return new Map(
    descriptor.variants
      .filter((v) => v.kind === "source-wrap")
      .map((v) => [v.fields[0].type, v.name] as const)
  );
}
