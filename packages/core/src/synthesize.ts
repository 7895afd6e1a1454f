/**
 * Behavior synthesizer
 *
 * Compiles a descriptor into the three runtime behaviors of the generated
 * type: display rendering, cause exposure and source conversion. Templates
 * are bound to closures here, once; rendering never looks at template text.
 */

import type { DisplayTemplate, ErrorTypeDescriptor, VariantDescriptor } from "./types.js";
import { conversionTable } from "./descriptor.js";

type Renderer = (fields: readonly unknown[]) => string;

export interface SynthesizedBehavior {
  readonly descriptor: ErrorTypeDescriptor;
  /** Full display text of a variant value, prefix included. */
  render(kind: string, fields: readonly unknown[]): string;
  /** Underlying cause: field 0 of a source-wrap variant, otherwise undefined. */
  causeOf(kind: string, fields: readonly unknown[]): unknown;
  /** Source type tag → variant name */
  readonly conversions: ReadonlyMap<string, string>;
}

/**
 * Display text of one field value. Errors contribute their message, which for
 * a generated error is its fully rendered chain.
 */
export function displayValue(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  if (typeof value === "string") {
    return value;
  }
  return String(value);
}

function compileTemplate(display: DisplayTemplate, prefix: string | undefined): Renderer {
  const parts: Array<string | number> = display.map((s) => (s.type === "literal" ? s.text : s.index));
  if (prefix !== undefined) {
    parts.unshift(`${prefix}: `);
  }

  // Fold adjacent literals so the prefix joins the first literal run
  const folded: Array<string | number> = [];
  for (const part of parts) {
    const last = folded[folded.length - 1];
    if (typeof part === "string" && typeof last === "string") {
      folded[folded.length - 1] = last + part;
    } else {
      folded.push(part);
    }
  }

  return (fields) => {
    let out = "";
    for (const part of folded) {
      out += typeof part === "string" ? part : displayValue(fields[part]);
    }
    return out;
  };
}

function lookup<T>(table: ReadonlyMap<string, T>, typeName: string, kind: string): T {
  const entry = table.get(kind);
  if (entry === undefined) {
    throw new TypeError(`${typeName} has no variant \`${kind}\``);
  }
  return entry;
}

/**
 * Synthesize the runtime behaviors for a validated descriptor.
 */
export function synthesize(descriptor: ErrorTypeDescriptor): SynthesizedBehavior {
  const renderers = new Map<string, Renderer>();
  const variants = new Map<string, VariantDescriptor>();

  for (const variant of descriptor.variants) {
    renderers.set(variant.name, compileTemplate(variant.display, descriptor.prefix));
    variants.set(variant.name, variant);
  }

  return {
    descriptor,
    render(kind, fields) {
      return lookup(renderers, descriptor.name, kind)(fields);
    },
    causeOf(kind, fields) {
      return lookup(variants, descriptor.name, kind).kind === "source-wrap" ? fields[0] : undefined;
    },
    conversions: conversionTable(descriptor),
  };
}
