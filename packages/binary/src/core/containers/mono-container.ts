import type { BinaryCodec } from "../../ports/codec"
import type { Len } from "../../ports/len"
import type { Sizer } from "../../ports/size"
import { readBytes } from "../buffer"
import { decodeLen, encodeLen, lenName, lenSizer } from "../len"
import { dynamicSize, dynamicSizer, staticSizer, unknownSize } from "../size/sizer"
import { unstage } from "../staging"

/**
 * How a byte-shaped value (a string, a byte array) maps to its raw bytes.
 */
export type MonoContent<C> = {
  readonly name: string

  /** Byte length of the encoded content, computed without encoding it. */
  length(value: C): number

  toBytes(value: C): Uint8Array

  /**
   * Builds a value from `view`, a window into the input buffer.
   * `wholeBuffer` is true when the window covers the entire input.
   */
  fromBytes(view: Uint8Array, wholeBuffer: boolean): C
}

/**
 * Sizer for byte-shaped content behind a `Len` header.
 *
 * Unboxed content has no header to read back, so its encoding size is unknown.
 */
export function monoSizer<C>(content: MonoContent<C>, header: Len): Sizer<C> {
  if (header.kind === "fixed") return staticSizer(header.size)

  if (header.kind === "unboxed") {
    return { ofValue: dynamicSize((value: C) => content.length(value)), ofEncoding: unknownSize }
  }

  const decodeLength = unstage(decodeLen(header))
  const ofEncoding = (buffer: Uint8Array, offset: number): number => {
    const [start, length] = decodeLength(buffer, offset)

    return start + length
  }

  const headerSize = lenSizer(header).ofValue

  if (headerSize.kind === "static") {
    const n = headerSize.size

    return dynamicSizer((value: C) => n + content.length(value), ofEncoding)
  }

  const sizeOfHeader = headerSize.of

  return dynamicSizer((value: C) => {
    const length = content.length(value)

    return sizeOfHeader(length) + length
  }, ofEncoding)
}

export function monoContainer<C>(content: MonoContent<C>, header: Len): BinaryCodec<C> {
  const encodeLength = unstage(encodeLen(header))
  const decodeLength = unstage(decodeLen(header))

  return {
    name: `${content.name}(${lenName(header)})`,
    encode: (value, sink) => {
      const bytes = content.toBytes(value)

      encodeLength(bytes.length, sink)
      sink(bytes)
    },
    decode: (buffer, offset) => {
      const [start, length] = decodeLength(buffer, offset)
      const view = readBytes(buffer, start, length)

      return [start + length, content.fromBytes(view, view.length === buffer.length)]
    },
    sizer: monoSizer(content, header),
  }
}
