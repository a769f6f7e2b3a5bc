declare const brand: unique symbol

/**
 * Nominal typing for primitives: a `Brand<string, "ObjectKey">` is a string,
 * but a plain string is not an ObjectKey until it has been validated.
 */
export type Brand<T, B extends string> = T & { readonly [brand]: B }
