import type { BinaryCodec } from "../../ports/codec"
import { byteChunk, readByte } from "../buffer"
import { CodecError } from "../errors/codec-error"
import { dynamicSizer } from "../size/sizer"

/** Groups needed for `Number.MAX_SAFE_INTEGER` (53 bits). */
export const MAX_VARINT_BYTES = 8

const GROUP = 0x80

export function varintLength(value: number): number {
  let length = 1

  for (let n = value; n >= GROUP; n = Math.floor(n / GROUP)) length++

  return length
}

export function decodeVarint(buffer: Uint8Array, offset: number): readonly [number, number] {
  let value = 0
  let scale = 1
  let pos = offset

  for (let group = 0; group < MAX_VARINT_BYTES; group++) {
    const byte = readByte(buffer, pos)
    pos++
    value += (byte & 0x7f) * scale

    if (byte < GROUP) {
      if (!Number.isSafeInteger(value)) {
        throw CodecError.invalidEncoding(
          `varint at offset ${offset} exceeds the safe integer range`,
          { offset },
        )
      }

      return [pos, value]
    }

    scale *= GROUP
  }

  throw CodecError.invalidEncoding(
    `varint at offset ${offset} does not terminate within ${MAX_VARINT_BYTES} bytes`,
    { offset },
  )
}

/**
 * Non-negative integer in 7-bit groups, least significant first; the high
 * bit of each byte is set when another byte follows.
 */
export const varint: BinaryCodec<number> = {
  name: "varint",
  encode: (value, sink) => {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw CodecError.invalidValue("varint", "a non-negative safe integer", value)
    }

    let n = value

    while (n >= GROUP) {
      sink(byteChunk((n % GROUP) | GROUP))
      n = Math.floor(n / GROUP)
    }

    sink(byteChunk(n))
  },
  decode: decodeVarint,
  sizer: dynamicSizer(varintLength, (buffer, offset) => decodeVarint(buffer, offset)[0]),
}
