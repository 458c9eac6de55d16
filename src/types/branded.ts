/**
 * Branded types used across apiref.
 */

declare const AbsolutePathBrand: unique symbol
declare const SourceUrlBrand: unique symbol

type Brand<T, B extends symbol> = T & { readonly [K in B]: true }

export type AbsolutePath = Brand<string, typeof AbsolutePathBrand>
/** Absolute http(s) URL of a remote API description document. */
export type SourceUrl = Brand<string, typeof SourceUrlBrand>
