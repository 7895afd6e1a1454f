/**
 * Display template parser
 *
 * Turns a template literal plus positional field references into a linear
 * list of literal and field segments. Knows nothing about variants: the arity
 * check happens in the descriptor builder.
 *
 *   parseTemplate("code:{} message:{}", [0, 1])
 *   → [literal "code:", field 0, literal " message:", field 1]
 *
 *   parseTemplate("{1} {0}", [0, 1])
 *   → [field 1, literal " ", field 0]
 */

import type { DisplayTemplate, Segment } from "./types.js";
import { DiagnosticCollector, FL1001, GenerationError } from "./diagnostics.js";

/** Result of a template parse: the template, or the reason it is malformed. */
export type TemplateParseResult =
  | { ok: true; template: DisplayTemplate }
  | { ok: false; reason: string };

/** Template of a source-wrap variant without one: the wrapped error's own text. */
export const DEFAULT_SOURCE_TEMPLATE: DisplayTemplate = Object.freeze([
  Object.freeze({ type: "field", index: 0 } as const),
]);

interface Placeholder {
  /** Inline index for `{N}`; undefined for `{}` */
  index: number | undefined;
}

function isFieldIndex(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

/**
 * Parse without throwing.
 */
export function tryParseTemplate(
  literal: string,
  refs: readonly number[] = []
): TemplateParseResult {
  for (const ref of refs) {
    if (!isFieldIndex(ref)) {
      return { ok: false, reason: `field reference \`${ref}\` is not a natural number` };
    }
  }

  // First pass: split into literal runs and placeholders
  const pieces: Array<string | Placeholder> = [];
  let text = "";

  for (let i = 0; i < literal.length; i++) {
    const ch = literal[i];

    if (ch === "{") {
      if (literal[i + 1] === "{") {
        text += "{";
        i++;
        continue;
      }
      const close = literal.indexOf("}", i + 1);
      if (close === -1) {
        return { ok: false, reason: `unclosed \`{\` at position ${i}` };
      }
      const inner = literal.slice(i + 1, close);
      let index: number | undefined;
      if (inner === "") {
        index = undefined;
      } else if (/^\d+$/.test(inner) && isFieldIndex(Number(inner))) {
        index = Number(inner);
      } else {
        return { ok: false, reason: `unsupported placeholder \`{${inner}}\`` };
      }
      if (text) {
        pieces.push(text);
        text = "";
      }
      pieces.push({ index });
      i = close;
    } else if (ch === "}") {
      if (literal[i + 1] === "}") {
        text += "}";
        i++;
        continue;
      }
      return { ok: false, reason: `unmatched \`}\` at position ${i}` };
    } else {
      text += ch;
    }
  }
  if (text) {
    pieces.push(text);
  }

  const placeholders = pieces.filter((p): p is Placeholder => typeof p !== "string");
  const indexed = placeholders.filter((p) => p.index !== undefined).length;

  if (indexed > 0 && indexed < placeholders.length) {
    return { ok: false, reason: "cannot mix `{}` and `{N}` placeholders" };
  }

  // Second pass: bind each placeholder to a field index
  let bound: number[];
  if (indexed > 0) {
    const inline = placeholders.map((p) => p.index ?? 0);
    if (refs.length === 0) {
      bound = inline;
    } else {
      // With references, `{N}` names the N-th reference
      const missing = inline.find((n) => n >= refs.length);
      if (missing !== undefined) {
        return {
          ok: false,
          reason: `placeholder \`{${missing}}\` has no field reference (${refs.length} given)`,
        };
      }
      const unused = refs.findIndex((_r, k) => !inline.includes(k));
      if (unused !== -1) {
        return { ok: false, reason: `field reference ${unused} (\`${refs[unused]}\`) is never used` };
      }
      bound = inline.map((n) => refs[n]);
    }
  } else {
    if (placeholders.length !== refs.length) {
      return {
        ok: false,
        reason: `template has ${placeholders.length} placeholder${placeholders.length === 1 ? "" : "s"} but ${refs.length} field reference${refs.length === 1 ? " was" : "s were"} given`,
      };
    }
    bound = [...refs];
  }

  const segments: Segment[] = [];
  let next = 0;
  for (const piece of pieces) {
    segments.push(
      typeof piece === "string"
        ? Object.freeze({ type: "literal", text: piece } as const)
        : Object.freeze({ type: "field", index: bound[next++] } as const)
    );
  }

  return { ok: true, template: Object.freeze(segments) };
}

/**
 * Parse a display template, throwing a GenerationError (FL1001) when the
 * literal and its field references disagree.
 */
export function parseTemplate(literal: string, refs: readonly number[] = []): DisplayTemplate {
  const result = tryParseTemplate(literal, refs);
  if (result.ok) {
    return result.template;
  }
  const collector = new DiagnosticCollector();
  collector
    .report(FL1001)
    .withArgs({ template: JSON.stringify(literal), owner: "<anonymous>", reason: result.reason })
    .emit();
  throw new GenerationError(collector.diagnostics);
}

/** Field indices referenced by a template, in rendering order. */
export function fieldRefs(template: DisplayTemplate): number[] {
  return template.flatMap((s) => (s.type === "field" ? [s.index] : []));
}
