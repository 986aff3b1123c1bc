import type { BinaryCodec } from "../../ports/codec"
import type { Len } from "../../ports/len"
import type { EncodingEnd, Sizer } from "../../ports/size"
import { CodecError } from "../errors/codec-error"
import { decodeLen, encodeLen, lenName, lenSizer } from "../len"
import {
  dynamicSize,
  encodingEnd,
  staticSizer,
  unknownSize,
  valueSizeFn,
} from "../size/sizer"
import { unstage } from "../staging"

/**
 * Sizer for a header followed by a run of elements.
 *
 * - fixed count and static elements: static
 * - static elements: the count alone gives the size, and the encoding end is
 *   found by reading the header and jumping over `count * size` bytes
 * - dynamic elements: every element is measured, and the encoding end is
 *   found by walking each element boundary
 *
 * The count in the header is trusted as is: with elements that take no bytes,
 * a few header bytes can describe millions of elements, and both decoding and
 * the boundary walk visit each one.
 */
export function sequenceSizer<T>(header: Len, elt: Sizer<T>): Sizer<readonly T[]> {
  const eltSize = elt.ofValue

  if (header.kind === "fixed" && eltSize.kind === "static") {
    return staticSizer(header.size * eltSize.size)
  }

  const sizeOfHeader = valueSizeFn(lenSizer(header).ofValue)
  const decodeCount = unstage(decodeLen(header))

  if (eltSize.kind === "static") {
    const n = eltSize.size

    return {
      ofValue: dynamicSize(
        (values: readonly T[]) => sizeOfHeader(values.length) + n * values.length,
      ),
      ofEncoding:
        header.kind === "unboxed"
          ? unknownSize
          : dynamicSize<EncodingEnd>((buffer, offset) => {
              const [start, count] = decodeCount(buffer, offset)

              return start + n * count
            }),
    }
  }

  const sizeOfElt = eltSize.of
  const endOfElt = encodingEnd(elt.ofEncoding)

  return {
    ofValue: dynamicSize((values: readonly T[]) =>
      values.reduce((acc, value) => acc + sizeOfElt(value), sizeOfHeader(values.length)),
    ),
    ofEncoding:
      header.kind === "unboxed" || endOfElt === undefined
        ? unknownSize
        : dynamicSize<EncodingEnd>((buffer, offset) => {
            const [start, count] = decodeCount(buffer, offset)
            let pos = start

            for (let i = 0; i < count; i++) pos = endOfElt(buffer, pos)

            return pos
          }),
  }
}

type SequenceParts<T> = Pick<BinaryCodec<readonly T[]>, "encode" | "sizer"> & {
  readonly name: string
  readonly decodeItems: (buffer: Uint8Array, offset: number) => readonly [number, T[]]
}

function sequenceParts<T>(kind: string, header: Len, elt: BinaryCodec<T>): SequenceParts<T> {
  const encodeCount = unstage(encodeLen(header))
  const decodeCount = unstage(decodeLen(header))
  const name = `${kind}(${lenName(header)},${elt.name})`

  // Unboxed elements must consume at least one byte each.
  const eltSize = elt.sizer.ofValue

  if (header.kind === "unboxed" && eltSize.kind === "static" && eltSize.size === 0) {
    throw CodecError.invalidValue(name, "elements that occupy at least one byte", elt.name)
  }

  // One decode per counted element, even for elements that occupy no bytes.
  const decodeCounted = (buffer: Uint8Array, offset: number): readonly [number, T[]] => {
    const [start, count] = decodeCount(buffer, offset)
    const items: T[] = []
    let pos = start

    for (let i = 0; i < count; i++) {
      const [next, item] = elt.decode(buffer, pos)
      items.push(item)
      pos = next
    }

    return [pos, items]
  }

  // No count on the wire: elements run to the end of the buffer.
  const decodeToEnd = (buffer: Uint8Array, offset: number): readonly [number, T[]] => {
    const items: T[] = []
    let pos = offset

    while (pos < buffer.length) {
      const [next, item] = elt.decode(buffer, pos)

      if (next <= pos) {
        throw CodecError.invalidEncoding(`${name} element at offset ${pos} is empty`, {
          codec: name,
          offset: pos,
        })
      }

      items.push(item)
      pos = next
    }

    return [pos, items]
  }

  return {
    name,
    encode: (values, sink) => {
      encodeCount(values.length, sink)

      for (const value of values) elt.encode(value, sink)
    },
    decodeItems: header.kind === "unboxed" ? decodeToEnd : decodeCounted,
    sizer: sequenceSizer(header, elt.sizer),
  }
}

/** Count header, then each element in order. */
export function list<T>(header: Len, elt: BinaryCodec<T>): BinaryCodec<T[]> {
  const { name, encode, decodeItems, sizer } = sequenceParts("list", header, elt)

  return { name, encode, decode: decodeItems, sizer }
}

/**
 * Same layout as {@link list}; decoded arrays are frozen.
 */
export function array<T>(header: Len, elt: BinaryCodec<T>): BinaryCodec<readonly T[]> {
  const { name, encode, decodeItems, sizer } = sequenceParts("array", header, elt)

  return {
    name,
    encode,
    decode: (buffer, offset) => {
      const [next, items] = decodeItems(buffer, offset)

      return [next, Object.freeze(items)]
    },
    sizer,
  }
}
