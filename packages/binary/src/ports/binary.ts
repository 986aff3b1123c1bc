import type { BinaryCodec } from "./codec"

/**
 * Whole-buffer operations over any {@link BinaryCodec}.
 */
export interface Binary {
  /** Encode `value` into a new buffer holding exactly its bytes. */
  encode<T>(codec: BinaryCodec<T>, value: T): Uint8Array

  /**
   * Decode the value starting at `offset`.
   *
   * With strict decoding enabled the value must end at the end of `bytes`.
   */
  decode<T>(codec: BinaryCodec<T>, bytes: Uint8Array, offset?: number): T

  /** Decode the value at `offset`, returning the offset after it as well. */
  decodeAt<T>(codec: BinaryCodec<T>, bytes: Uint8Array, offset: number): readonly [number, T]

  /** Encoded length of `value`, computed without encoding it. */
  sizeOf<T>(codec: BinaryCodec<T>, value: T): number

  /**
   * Offset just past the encoded value at `offset`, found without decoding it.
   *
   * @throws CodecError `size_unavailable` when the codec cannot tell.
   */
  skip<T>(codec: BinaryCodec<T>, bytes: Uint8Array, offset: number): number

  /** View (no copy) of the encoded value at `offset`. */
  crop<T>(codec: BinaryCodec<T>, bytes: Uint8Array, offset: number): Uint8Array
}
