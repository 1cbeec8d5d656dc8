/**
 * Branded types for the identifiers that flow through the engine.
 * Prevents a raw string from being used where a grounded fluent key is expected.
 */

declare const __brand: unique symbol;

type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** A grounded fluent application, rendered as `name` or `name(arg1, arg2)`. */
export type FluentKey = Brand<string, 'FluentKey'>;
