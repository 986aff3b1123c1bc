import type { BinaryCodec } from "../../ports/codec"
import { byteChunk, checkRange, readByte, viewOf } from "../buffer"
import { CodecError } from "../errors/codec-error"
import { staticSizer } from "../size/sizer"

const INT32_MIN = -0x8000_0000
const INT32_MAX = 0x7fff_ffff
const INT64_MIN = -(1n << 63n)
const INT64_MAX = (1n << 63n) - 1n

type FixedWidthLayout<T> = {
  name: string
  width: number
  expected: string
  accepts: (value: T) => boolean
  write: (view: DataView, value: T) => void
  read: (view: DataView, offset: number) => T
}

function fixedWidth<T>(layout: FixedWidthLayout<T>): BinaryCodec<T> {
  const { name, width } = layout

  return {
    name,
    encode: (value, sink) => {
      if (!layout.accepts(value)) throw CodecError.invalidValue(name, layout.expected, value)

      const chunk = new Uint8Array(width)
      layout.write(new DataView(chunk.buffer), value)
      sink(chunk)
    },
    decode: (buffer, offset) => {
      checkRange(buffer, offset, width)

      return [offset + width, layout.read(viewOf(buffer), offset)]
    },
    sizer: staticSizer(width),
  }
}

const isIntegerIn = (min: number, max: number) => (value: number) =>
  Number.isInteger(value) && value >= min && value <= max

/** One raw byte, 0 to 255. */
export const int8: BinaryCodec<number> = {
  name: "int8",
  encode: (value, sink) => {
    if (!isIntegerIn(0, 0xff)(value)) {
      throw CodecError.invalidValue("int8", "an integer from 0 to 255", value)
    }

    sink(byteChunk(value))
  },
  decode: (buffer, offset) => [offset + 1, readByte(buffer, offset)],
  sizer: staticSizer(1),
}

/** Big-endian, 0 to 65535. */
export const int16: BinaryCodec<number> = fixedWidth({
  name: "int16",
  width: 2,
  expected: "an integer from 0 to 65535",
  accepts: isIntegerIn(0, 0xffff),
  write: (view, value) => view.setUint16(0, value),
  read: (view, offset) => view.getUint16(offset),
})

/** Big-endian two's complement. */
export const int32: BinaryCodec<number> = fixedWidth({
  name: "int32",
  width: 4,
  expected: "a 32-bit signed integer",
  accepts: isIntegerIn(INT32_MIN, INT32_MAX),
  write: (view, value) => view.setInt32(0, value),
  read: (view, offset) => view.getInt32(offset),
})

/** Big-endian two's complement. */
export const int64: BinaryCodec<bigint> = fixedWidth({
  name: "int64",
  width: 8,
  expected: "a 64-bit signed integer",
  accepts: (value) => value >= INT64_MIN && value <= INT64_MAX,
  write: (view, value) => view.setBigInt64(0, value),
  read: (view, offset) => view.getBigInt64(offset),
})

/** IEEE-754 double, big-endian. */
export const float: BinaryCodec<number> = fixedWidth({
  name: "float",
  width: 8,
  expected: "a number",
  accepts: (value) => typeof value === "number",
  write: (view, value) => view.setFloat64(0, value),
  read: (view, offset) => view.getFloat64(offset),
})
