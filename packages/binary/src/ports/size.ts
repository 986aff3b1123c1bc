/**
 * Returns the offset just past an encoded value that starts at `offset`.
 */
export type EncodingEnd = (buffer: Uint8Array, offset: number) => number

export type StaticSize = {
  readonly kind: "static"
  readonly size: number
}

export type DynamicSize<F> = {
  readonly kind: "dynamic"
  readonly of: F
}

/**
 * The encoded length cannot be recovered from the bytes alone, e.g. an
 * unboxed string that simply runs to the end of its buffer.
 */
export type UnknownSize = {
  readonly kind: "unknown"
}

export type ValueSize<T> = StaticSize | DynamicSize<(value: T) => number>

export type EncodingSize = StaticSize | DynamicSize<EncodingEnd> | UnknownSize

/**
 * Two independent ways of measuring an encoded value.
 *
 * @remarks
 * - `ofValue` measures a value without encoding it. It is always available.
 * - `ofEncoding` finds where an encoded value ends without decoding it. It is
 *   `unknown` when a dynamically sized part carries no header of its own;
 *   skipping or cropping such a codec raises `size_unavailable`.
 */
export interface Sizer<T> {
  readonly ofValue: ValueSize<T>
  readonly ofEncoding: EncodingSize
}
