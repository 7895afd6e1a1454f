import type { ErrorTypeDescriptor } from "./types.js";

export interface ChainedErrorInit<Type extends string, Kind extends string, Fields extends readonly unknown[]> {
  type: Type;
  kind: Kind;
  fields: Fields;
  descriptor: ErrorTypeDescriptor;
  /** Fully rendered display text */
  message: string;
  /** Wrapped source error; undefined for custom-kind variants */
  cause: unknown;
}

/**
 * Runtime value of a generated error type: one variant, its field values, and
 * the text rendered for them at construction. Never mutated afterwards.
 *
 * `kind` is the discriminant; narrowing on it types `fields`.
 */
export class ChainedError<
  Type extends string = string,
  Kind extends string = string,
  Fields extends readonly unknown[] = readonly unknown[]
> extends Error {
  /** Name of the generated error type */
  readonly type: Type;
  /** Variant name */
  readonly kind: Kind;
  readonly fields: Readonly<Fields>;
  readonly descriptor: ErrorTypeDescriptor;

  constructor(init: ChainedErrorInit<Type, Kind, Fields>) {
    super(init.message, init.cause === undefined ? undefined : { cause: init.cause });
    this.name = init.type;
    this.type = init.type;
    this.kind = init.kind;
    this.fields = init.fields;
    this.descriptor = init.descriptor;
  }

  /** Human-readable chain, e.g. "App: Mod: No such file or directory". */
  render(): string {
    return this.message;
  }
}
