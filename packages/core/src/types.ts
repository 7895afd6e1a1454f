/**
 * Core types for @faultline/core
 *
 * Three layers of data:
 * - the annotation schema every front-end produces (ErrorTypeDefinition)
 * - the validated, canonical descriptors (ErrorTypeDescriptor)
 * - the runtime source-type abstraction used for conversion dispatch
 */

// ============================================================================
// Display Templates
// ============================================================================

/** One piece of a display template: verbatim text or a positional field reference. */
export type Segment =
  | { readonly type: "literal"; readonly text: string }
  | { readonly type: "field"; readonly index: number };

/** Linear literal/field alternation, bound once at definition time. */
export type DisplayTemplate = readonly Segment[];

// ============================================================================
// Annotation Schema (front-end output)
// ============================================================================

/**
 * - "source-wrap": single field holding a foreign error, auto-convertible
 * - "custom-kind": hand-authored template over any number of fields
 */
export type VariantKind = "source-wrap" | "custom-kind";

export interface FieldDescriptor {
  /** Type tag. For source-wrap variants this identifies the wrapped source type. */
  readonly type: string;
  readonly name?: string;
}

/** Where a definition came from, when it was read from source text. */
export interface SourceLocation {
  readonly fileName: string;
  /** 1-based */
  readonly line: number;
  /** 1-based */
  readonly column: number;
  /** Length of the annotated span on its first line */
  readonly length?: number;
  readonly lineText?: string;
}

export interface VariantDefinition {
  readonly name: string;
  readonly kind: VariantKind;
  readonly fields: readonly FieldDescriptor[];
  /** Display template literal; optional for source-wrap variants */
  readonly template?: string;
  /** Positional field references consumed by `{}` placeholders */
  readonly refs?: readonly number[];
  readonly location?: SourceLocation;
}

export interface ErrorTypeDefinition {
  readonly name: string;
  /** Type-wide prefix rendered as `"<prefix>: "` ahead of every variant */
  readonly prefix?: string;
  readonly variants: readonly VariantDefinition[];
  readonly location?: SourceLocation;
}

// ============================================================================
// Canonical Descriptors (builder output)
// ============================================================================

export interface VariantDescriptor {
  readonly name: string;
  readonly arity: number;
  readonly fields: readonly FieldDescriptor[];
  readonly kind: VariantKind;
  readonly display: DisplayTemplate;
}

export interface ErrorTypeDescriptor {
  readonly name: string;
  readonly prefix?: string;
  /** Declaration order; names are unique */
  readonly variants: readonly VariantDescriptor[];
}

// ============================================================================
// Runtime Source Types
// ============================================================================

/**
 * Runtime identity of a wrappable error type.
 * `name` is the type tag used for ambiguity checks and conversion keys.
 */
export interface SourceType<T = unknown> {
  readonly name: string;
  is(value: unknown): value is T;
}

/** `result<T> = T | E` convention for functions that return their failure. */
export type Result<T, E> = T | E;
