import type { ByteSink } from "../../ports/codec"
import type { ByteBuffer } from "../../ports/byte-buffer"

export const DEFAULT_INITIAL_CAPACITY = 256

/**
 * Buffer that doubles its capacity whenever a chunk does not fit.
 */
export class GrowableBuffer implements ByteBuffer {
  private bytes: Uint8Array
  private written = 0

  constructor(initialCapacity: number = DEFAULT_INITIAL_CAPACITY) {
    this.bytes = new Uint8Array(Math.max(1, initialCapacity))
  }

  get length(): number {
    return this.written
  }

  get capacity(): number {
    return this.bytes.length
  }

  readonly sink: ByteSink = (chunk) => {
    const needed = this.written + chunk.length

    if (needed > this.bytes.length) this.grow(needed)

    this.bytes.set(chunk, this.written)
    this.written = needed
  }

  finish(): Uint8Array {
    return this.bytes.slice(0, this.written)
  }

  private grow(needed: number): void {
    let capacity = this.bytes.length * 2

    while (capacity < needed) capacity *= 2

    const next = new Uint8Array(capacity)
    next.set(this.bytes.subarray(0, this.written))
    this.bytes = next
  }
}
