/**
 * defineError - the runtime front-end
 *
 * Declares an error type as a map of variant specs and returns a typed
 * factory: one constructor per variant, a conversion dispatcher for wrapped
 * source errors, and a type guard.
 *
 * @example
 * ```typescript
 * const AppError = defineError("AppError", {
 *   prefix: "App",
 *   variants: {
 *     Io: errorFrom(IoFailure),
 *     Disconnected: errorKind("error without arguments"),
 *     Http: errorKind("code:{} message:{}", 0, 1).with(field.number("code"), field.string("message")),
 *   },
 * });
 * type AppError = ErrorOf<typeof AppError>;
 *
 * AppError.Http(404, "Not Found").render();   // "App: code:404 message:Not Found"
 * AppError.from(new IoFailure("disk full"));  // AppError.Io
 * ```
 */

import type {
  ErrorTypeDefinition,
  ErrorTypeDescriptor,
  SourceType,
  VariantDefinition,
} from "./types.js";
import { buildDescriptor } from "./descriptor.js";
import { synthesize } from "./synthesize.js";
import { ChainedError } from "./chained-error.js";
import { logger } from "./logger.js";

// ============================================================================
// Field Specs
// ============================================================================

export interface FieldSpec<T = unknown> {
  /** Type tag recorded in the descriptor */
  readonly type: string;
  readonly name?: string;
  /** Phantom: the field's value type */
  readonly __value?: T;
}

function fieldSpec<T>(type: string, name: string | undefined): FieldSpec<T> {
  return name === undefined ? { type } : { type, name };
}

/** Field declarations for custom-kind variants. */
export const field = {
  string: (name?: string): FieldSpec<string> => fieldSpec("string", name),
  number: (name?: string): FieldSpec<number> => fieldSpec("number", name),
  boolean: (name?: string): FieldSpec<boolean> => fieldSpec("boolean", name),
  bigint: (name?: string): FieldSpec<bigint> => fieldSpec("bigint", name),
  /** Any other value type, tagged by name */
  of: <T>(type: string, name?: string): FieldSpec<T> => fieldSpec(type, name),
} as const;

type FieldValues<S extends readonly FieldSpec[]> = {
  -readonly [K in keyof S]: S[K] extends FieldSpec<infer T> ? T : never;
};

// ============================================================================
// Variant Specs
// ============================================================================

export interface SourceWrapSpec<T> {
  readonly kind: "source-wrap";
  readonly source: SourceType<T>;
  readonly template?: string;
  readonly refs: readonly number[];
  /** Phantom: the wrapped type */
  readonly __source?: T;
}

export interface CustomKindSpec<F extends readonly unknown[]> {
  readonly kind: "custom-kind";
  readonly template: string;
  readonly refs: readonly number[];
  readonly fields: readonly FieldSpec[];
  /** Phantom: constructor argument types */
  readonly __fields?: F;
  /** Declare the variant's fields, in positional order. */
  with<S extends readonly FieldSpec[]>(...fields: S): CustomKindSpec<FieldValues<S>>;
}

export type VariantSpec = SourceWrapSpec<unknown> | CustomKindSpec<readonly unknown[]>;

export type VariantSpecs = Record<string, VariantSpec>;

/** Anything that can stand for a wrapped type: a SourceType or an error class. */
export type SourceLike<T> = SourceType<T> | (abstract new (...args: never[]) => T);

type AnyClass = abstract new (...args: never[]) => unknown;

/** Classes behind the source types built by sourceOf. */
const sourceClasses = new WeakMap<SourceType<unknown>, AnyClass>();

/**
 * Source type backed by `instanceof`. Its tag is the class name.
 */
export function sourceOf<T>(ctor: abstract new (...args: never[]) => T): SourceType<T> {
  const source: SourceType<T> = {
    name: ctor.name,
    is: (value: unknown): value is T => value instanceof ctor,
  };
  sourceClasses.set(source, ctor);
  return source;
}

/**
 * Source type backed by a custom guard, for errors that are not class instances.
 */
export function sourceType<T>(name: string, is: (value: unknown) => value is T): SourceType<T> {
  return { name, is };
}

/**
 * Source-wrap variant: holds one wrapped error, exposes it as the cause and
 * converts from it. Without a template it renders as the wrapped error.
 */
export function errorFrom<T>(
  source: SourceLike<T>,
  template?: string,
  ...refs: number[]
): SourceWrapSpec<T> {
  const resolved = typeof source === "function" ? sourceOf(source) : source;
  return template === undefined
    ? { kind: "source-wrap", source: resolved, refs }
    : { kind: "source-wrap", source: resolved, template, refs };
}

function customKind<F extends readonly unknown[]>(
  template: string,
  refs: readonly number[],
  fields: readonly FieldSpec[]
): CustomKindSpec<F> {
  return {
    kind: "custom-kind",
    template,
    refs,
    fields,
    with: <S extends readonly FieldSpec[]>(...next: S) =>
      customKind<FieldValues<S>>(template, refs, next),
  };
}

/**
 * Custom-kind variant with a hand-authored template. Fields are added with
 * `.with(...)`; without them the variant takes no arguments.
 */
export function errorKind(template: string, ...refs: number[]): CustomKindSpec<[]> {
  return customKind<[]>(template, refs, []);
}

// ============================================================================
// Factory Types
// ============================================================================

export type VariantFields<S> = S extends SourceWrapSpec<infer T>
  ? [source: T]
  : S extends CustomKindSpec<infer F extends readonly unknown[]>
    ? F
    : never;

/** Union of the variant values a factory produces. */
export type ErrorValue<Name extends string, V extends VariantSpecs> = {
  [K in keyof V & string]: ChainedError<Name, K, VariantFields<V[K]>>;
}[keyof V & string];

/** Union of the wrapped source types. */
export type SourceOf<V extends VariantSpecs> = {
  [K in keyof V]: V[K] extends SourceWrapSpec<infer T> ? T : never;
}[keyof V];

export type VariantConstructors<Name extends string, V extends VariantSpecs> = {
  readonly [K in keyof V & string]: (
    ...fields: VariantFields<V[K]>
  ) => ChainedError<Name, K, VariantFields<V[K]>>;
};

export interface ErrorFactoryMembers<Name extends string, V extends VariantSpecs>
  extends SourceType<ErrorValue<Name, V>> {
  readonly name: Name;
  readonly descriptor: ErrorTypeDescriptor;
  /** True only for values produced by this factory. */
  is(value: unknown): value is ErrorValue<Name, V>;
  /** Lift a wrapped source error into its owning variant. */
  from(source: SourceOf<V>): ErrorValue<Name, V>;
  /**
   * Run `fn`; a thrown source error is converted and returned, anything else
   * is rethrown.
   */
  capture<T>(fn: () => T): T | ErrorValue<Name, V>;
  captureAsync<T>(fn: () => Promise<T>): Promise<T | ErrorValue<Name, V>>;
}

export type ErrorFactory<Name extends string, V extends VariantSpecs> = VariantConstructors<
  Name,
  V
> &
  ErrorFactoryMembers<Name, V>;

/** The error union produced by a factory: `type AppError = ErrorOf<typeof AppError>`. */
export type ErrorOf<F> = F extends SourceType<infer E> ? E : never;

export interface DefineErrorOptions<V extends VariantSpecs> {
  /** Rendered as `"<prefix>: "` ahead of every variant */
  readonly prefix?: string;
  readonly variants: V;
}

// ============================================================================
// defineError
// ============================================================================

interface SourceEntry {
  variant: string;
  source: SourceType<unknown>;
  ctor?: AnyClass;
  tag: string;
}

/**
 * Tags for wrapped sources, one per identity: the class for class-backed
 * sources, the guard otherwise. Distinct identities sharing a name get
 * `#2`, `#3`, ... appended.
 */
function sourceEntries(entries: ReadonlyArray<[string, VariantSpec]>): SourceEntry[] {
  const tags = new Map<unknown, string>();
  const taken = new Map<string, number>();

  return entries.flatMap(([variant, spec]) => {
    if (spec.kind !== "source-wrap") return [];
    const ctor = sourceClasses.get(spec.source);
    const identity = ctor ?? spec.source.is;

    let tag = tags.get(identity);
    if (tag === undefined) {
      const base = spec.source.name || "(anonymous)";
      const count = (taken.get(base) ?? 0) + 1;
      taken.set(base, count);
      tag = count === 1 ? base : `${base}#${count}`;
      tags.set(identity, tag);
    }
    const entry: SourceEntry = { variant, source: spec.source, tag };
    if (ctor) entry.ctor = ctor;
    return [entry];
  });
}

/**
 * Pick the variant for a value several sources accept. A custom guard wins,
 * first declared first; among classes the one nearest the value's prototype.
 */
function mostSpecific(value: unknown, matches: readonly SourceEntry[]): SourceEntry {
  const guarded = matches.find((m) => m.ctor === undefined);
  if (guarded) return guarded;

  let proto: unknown = Object.getPrototypeOf(value);
  while (proto !== null) {
    const match = matches.find((m) => m.ctor?.prototype === proto);
    if (match) return match;
    proto = Object.getPrototypeOf(proto);
  }
  return matches[0];
}

function toVariantDefinition(
  name: string,
  spec: VariantSpec,
  tags: ReadonlyMap<string, string>
): VariantDefinition {
  if (spec.kind === "source-wrap") {
    return {
      name,
      kind: "source-wrap",
      fields: [{ type: tags.get(name) ?? spec.source.name, name: "source" }],
      template: spec.template,
      refs: spec.refs,
    };
  }
  return {
    name,
    kind: "custom-kind",
    fields: spec.fields.map((f) => (f.name === undefined ? { type: f.type } : { type: f.type, name: f.name })),
    template: spec.template,
    refs: spec.refs,
  };
}

function describeValue(value: unknown): string {
  if (value instanceof Error) {
    return `${value.name} "${value.message}"`;
  }
  return value === null ? "null" : typeof value;
}

/**
 * Define an error type.
 *
 * @throws GenerationError when the definition is invalid (FL1001-FL1006)
 */
export function defineError<Name extends string, V extends VariantSpecs>(
  name: Name,
  options: DefineErrorOptions<V>
): ErrorFactory<Name, V> {
  const entries = Object.entries(options.variants);
  const sources = sourceEntries(entries);
  const tags = new Map(sources.map((s) => [s.variant, s.tag]));
  const definition: ErrorTypeDefinition = {
    name,
    prefix: options.prefix,
    variants: entries.map(([variantName, spec]) => toVariantDefinition(variantName, spec, tags)),
  };

  const descriptor = buildDescriptor(definition);
  const behavior = synthesize(descriptor);

  const make = (kind: string, fields: readonly unknown[]): ChainedError<Name> =>
    new ChainedError({
      type: name,
      kind,
      fields: Object.freeze([...fields]),
      descriptor,
      message: behavior.render(kind, fields),
      cause: behavior.causeOf(kind, fields),
    });

  const isValue = (value: unknown): value is ChainedError<Name> =>
    value instanceof ChainedError && value.descriptor === descriptor;

  const convert = (value: unknown): ChainedError<Name> | undefined => {
    const matches = sources.filter((s) => s.source.is(value));
    return matches.length === 0 ? undefined : make(mostSpecific(value, matches).variant, [value]);
  };

  const constructors = Object.fromEntries(
    descriptor.variants.map((v) => [v.name, (...fields: unknown[]) => make(v.name, fields)])
  );

  const factory: object = Object.freeze({
    ...constructors,
    name,
    descriptor,
    is: isValue,
    from(source: unknown): ChainedError<Name> {
      const converted = convert(source);
      if (!converted) {
        throw new TypeError(`${name}.from: no source-wrap variant accepts ${describeValue(source)}`);
      }
      return converted;
    },
    capture<T>(fn: () => T): T | ChainedError<Name> {
      try {
        return fn();
      } catch (error) {
        if (isValue(error)) return error;
        const converted = convert(error);
        if (converted) return converted;
        throw error;
      }
    },
    async captureAsync<T>(fn: () => Promise<T>): Promise<T | ChainedError<Name>> {
      try {
        return await fn();
      } catch (error) {
        if (isValue(error)) return error;
        const converted = convert(error);
        if (converted) return converted;
        throw error;
      }
    },
  });

  logger.debug(
    `Synthesized ${name}: ${descriptor.variants.map((v) => `${v.name}/${v.arity}`).join(", ") || "(no variants)"}`
  );

  // Constructors are keyed by the variant names in V; the mapped type cannot be built statically
  return factory as ErrorFactory<Name, V>;
}
