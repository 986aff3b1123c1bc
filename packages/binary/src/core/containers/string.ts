import type { BinaryCodec } from "../../ports/codec"
import type { Len } from "../../ports/len"
import { CodecError } from "../errors/codec-error"
import { len } from "../len"
import { type MonoContent, monoContainer } from "./mono-container"

const encoder = new TextEncoder()
const decoder = new TextDecoder("utf-8", { fatal: true })

const utf8: MonoContent<string> = {
  name: "string",
  length: (value) => Buffer.byteLength(value, "utf8"),
  toBytes: (value) => encoder.encode(value),
  fromBytes: (view) => {
    try {
      return decoder.decode(view)
    } catch (err) {
      throw CodecError.invalidEncoding(
        "string content is not valid UTF-8",
        { length: view.length },
        err,
      )
    }
  },
}

const bytesContent: MonoContent<Uint8Array> = {
  name: "bytes",
  length: (value) => value.length,
  toBytes: (value) => value,
  // A window over the whole input is handed back as is; anything else is copied.
  fromBytes: (view, wholeBuffer) => (wholeBuffer ? view : view.slice()),
}

/** UTF-8 string behind a `Len` header counting bytes. */
export function string(header: Len = len.varint): BinaryCodec<string> {
  return monoContainer(utf8, header)
}

/** Raw bytes behind a `Len` header counting bytes. */
export function bytes(header: Len = len.varint): BinaryCodec<Uint8Array> {
  return monoContainer(bytesContent, header)
}

/** UTF-8 string with no header; it must be the last value in its buffer. */
export const stringUnboxed: BinaryCodec<string> = string(len.unboxed)

/**
 * Raw bytes with no header; they must be the last value in their buffer.
 * Decoding a buffer that holds nothing else returns that buffer without copying.
 */
export const bytesUnboxed: BinaryCodec<Uint8Array> = bytes(len.unboxed)
