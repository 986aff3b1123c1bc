import type { Sizer } from "./size"

/**
 * Receives encoded bytes chunk by chunk, in order.
 *
 * Chunks are only valid for the duration of the call: a sink that keeps one
 * must copy it.
 */
export type ByteSink = (chunk: Uint8Array) => void

export type Encoder<T> = (value: T, sink: ByteSink) => void

/**
 * Reads a value starting at `offset` and returns the offset just past it
 * together with the value.
 */
export type Decoder<T> = (buffer: Uint8Array, offset: number) => readonly [number, T]

/**
 * A self-contained binary codec.
 *
 * Composite codecs are built from the `encode`, `decode` and `sizer` of their
 * parts when they are constructed; nothing is dispatched per call.
 */
export interface BinaryCodec<T> {
  /** Structural name used in logs and error context, e.g. `list(varint,int8)`. */
  readonly name: string
  readonly encode: Encoder<T>
  readonly decode: Decoder<T>
  readonly sizer: Sizer<T>
}
