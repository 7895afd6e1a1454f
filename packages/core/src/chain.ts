/**
 * Helpers for error chains: cause walking, early exit and assertions.
 *
 * These work on any Error with a standard `cause`, not only generated ones.
 */

/**
 * The error followed by its causes, outermost first. Stops at a `null` or
 * `undefined` cause and at the first value seen twice.
 */
export function errorChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current)) {
    chain.push(current);
    seen.add(current);
    current = current instanceof Error ? current.cause : undefined;
  }

  return chain;
}

/** Innermost cause of an error; the error itself when it has none. */
export function rootCause(error: unknown): unknown {
  const chain = errorChain(error);
  return chain.length > 0 ? chain[chain.length - 1] : error;
}

/**
 * Exit the current function with `error`.
 *
 * @example
 * ```typescript
 * if (!user) bail(AppError.NotFound(404, "user"));
 * ```
 */
export function bail(error: Error): never {
  throw error;
}

/**
 * Assert `condition`, throwing `error` when it is falsy. A function is only
 * called on failure.
 */
export function ensure(condition: unknown, error: Error | (() => Error)): asserts condition {
  if (!condition) {
    throw typeof error === "function" ? error() : error;
  }
}
