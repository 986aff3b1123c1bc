import type { BinaryCodec } from "../../ports/codec"
import { byteChunk, readByte } from "../buffer"
import { CodecError } from "../errors/codec-error"
import { staticSizer } from "../size/sizer"

/** A single character with a code below 256, stored as that byte. */
export const char: BinaryCodec<string> = {
  name: "char",
  encode: (value, sink) => {
    const code = value.charCodeAt(0)

    if (value.length !== 1 || code > 0xff) {
      throw CodecError.invalidValue("char", "a single character with a code below 256", value)
    }

    sink(byteChunk(code))
  },
  decode: (buffer, offset) => [offset + 1, String.fromCharCode(readByte(buffer, offset))],
  sizer: staticSizer(1),
}
