import type { ByteSink } from "./codec"

/**
 * An in-memory destination for encoded bytes.
 */
export interface ByteBuffer {
  /** Appends a chunk; pass it directly as an encoder's sink. */
  readonly sink: ByteSink

  /** Bytes written so far. */
  readonly length: number

  /** The bytes written so far, exactly `length` long. */
  finish(): Uint8Array
}
