import { CodecError } from "./errors/codec-error"

const views = new WeakMap<Uint8Array, DataView>()

/** One shared single-byte chunk per byte value. */
const byteChunks: readonly Uint8Array[] = Array.from(
  { length: 256 },
  (_, i) => new Uint8Array([i]),
)

export function byteChunk(byte: number): Uint8Array {
  return byteChunks[byte & 0xff]
}

export function checkRange(buffer: Uint8Array, offset: number, length: number): void {
  if (offset < 0 || length < 0 || offset + length > buffer.length) {
    throw CodecError.outOfRange({ offset, length, available: buffer.length })
  }
}

export function viewOf(buffer: Uint8Array): DataView {
  let view = views.get(buffer)

  if (view === undefined) {
    view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength)
    views.set(buffer, view)
  }

  return view
}

export function readByte(buffer: Uint8Array, offset: number): number {
  checkRange(buffer, offset, 1)

  return viewOf(buffer).getUint8(offset)
}

/** Bounds-checked view into `buffer`; does not copy. */
export function readBytes(buffer: Uint8Array, offset: number, length: number): Uint8Array {
  checkRange(buffer, offset, length)

  return buffer.subarray(offset, offset + length)
}
