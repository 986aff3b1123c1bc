import type { BinaryCodec } from "../../ports/codec"
import { byteChunk, readByte } from "../buffer"
import { staticSizer } from "../size/sizer"

/**
 * `0xff` for true, `0x00` for false. Decoding is permissive: any byte other
 * than `0x00` reads as true.
 */
export const bool: BinaryCodec<boolean> = {
  name: "bool",
  encode: (value, sink) => sink(byteChunk(value ? 0xff : 0x00)),
  decode: (buffer, offset) => [offset + 1, readByte(buffer, offset) !== 0x00],
  sizer: staticSizer(1),
}
