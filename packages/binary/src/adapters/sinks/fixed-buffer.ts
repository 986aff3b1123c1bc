import { CodecError } from "../../core/errors/codec-error"
import type { ByteSink } from "../../ports/codec"
import type { ByteBuffer } from "../../ports/byte-buffer"

/**
 * Buffer of a fixed capacity, typically the exact size reported by a sizer.
 * Writing past the end throws `out_of_range`.
 */
export class FixedBuffer implements ByteBuffer {
  private readonly bytes: Uint8Array
  private written = 0

  constructor(capacity: number) {
    this.bytes = new Uint8Array(capacity)
  }

  get length(): number {
    return this.written
  }

  readonly sink: ByteSink = (chunk) => {
    if (this.written + chunk.length > this.bytes.length) {
      throw CodecError.outOfRange({
        offset: this.written,
        length: chunk.length,
        available: this.bytes.length,
      })
    }

    this.bytes.set(chunk, this.written)
    this.written += chunk.length
  }

  /** The underlying buffer when it is full, otherwise a view of the written part. */
  finish(): Uint8Array {
    return this.written === this.bytes.length
      ? this.bytes
      : this.bytes.subarray(0, this.written)
  }
}
