import type { BinaryCodec } from "../../ports/codec"
import type { None, Option, Some } from "../../ports/option"
import type { EncodingEnd, Sizer } from "../../ports/size"
import { byteChunk, readByte } from "../buffer"
import {
  dynamicSize,
  dynamicSizer,
  encodingEnd,
  staticSizer,
  unknownSize,
} from "../size/sizer"

export const none: None = { kind: "none" }

export const some = <T>(value: T): Some<T> => ({ kind: "some", value })

const NONE_TAG = 0x00
const SOME_TAG = 0xff
const TAG_SIZE = 1

export function optionSizer<T>(elt: Sizer<T>): Sizer<Option<T>> {
  const { ofValue } = elt

  if (ofValue.kind === "static") {
    const n = ofValue.size

    if (n === 0) return staticSizer(TAG_SIZE)

    return dynamicSizer(
      (value: Option<T>) => (value.kind === "none" ? TAG_SIZE : TAG_SIZE + n),
      (buffer, offset) =>
        readByte(buffer, offset) === NONE_TAG ? offset + TAG_SIZE : offset + TAG_SIZE + n,
    )
  }

  const sizeOfElt = ofValue.of
  const endOfElt = encodingEnd(elt.ofEncoding)

  return {
    ofValue: dynamicSize((value: Option<T>) =>
      value.kind === "none" ? TAG_SIZE : TAG_SIZE + sizeOfElt(value.value),
    ),
    ofEncoding:
      endOfElt === undefined
        ? unknownSize
        : dynamicSize<EncodingEnd>((buffer, offset) =>
            readByte(buffer, offset) === NONE_TAG
              ? offset + TAG_SIZE
              : endOfElt(buffer, offset + TAG_SIZE),
          ),
  }
}

/**
 * One tag byte (`0x00` for none, anything else for some; `0xff` when
 * encoding) followed by the element when present.
 */
export function option<T>(elt: BinaryCodec<T>): BinaryCodec<Option<T>> {
  return {
    name: `option(${elt.name})`,
    encode: (value, sink) => {
      if (value.kind === "none") {
        sink(byteChunk(NONE_TAG))
        return
      }

      sink(byteChunk(SOME_TAG))
      elt.encode(value.value, sink)
    },
    decode: (buffer, offset) => {
      if (readByte(buffer, offset) === NONE_TAG) return [offset + TAG_SIZE, none]

      const [next, value] = elt.decode(buffer, offset + TAG_SIZE)

      return [next, some(value)]
    },
    sizer: optionSizer(elt.sizer),
  }
}
