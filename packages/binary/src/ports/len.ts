/**
 * How a container records how many bytes or elements follow.
 *
 * - `varint` and the fixed-width integer kinds write the count before the content.
 * - `fixed` writes nothing: the count is known out of band on both sides.
 * - `unboxed` writes nothing: the content runs to the end of the buffer, so
 *   the value must be the last thing in it.
 */
export type Len =
  | { readonly kind: "varint" }
  | { readonly kind: "int8" }
  | { readonly kind: "int16" }
  | { readonly kind: "int32" }
  | { readonly kind: "int64" }
  | { readonly kind: "fixed"; readonly size: number }
  | { readonly kind: "unboxed" }

export type LenKind = Len["kind"]
