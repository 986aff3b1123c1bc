import type { Decoder, Encoder } from "../ports/codec"
import type { Len } from "../ports/len"
import type { Sizer } from "../ports/size"
import { checkRange } from "./buffer"
import { CodecError } from "./errors/codec-error"
import { int8, int16, int32, int64 } from "./primitives/integers"
import { varint } from "./primitives/varint"
import { type Staged, stage } from "./staging"
import { staticSizer } from "./size/sizer"

export const len = {
  varint: { kind: "varint" },
  int8: { kind: "int8" },
  int16: { kind: "int16" },
  int32: { kind: "int32" },
  int64: { kind: "int64" },
  unboxed: { kind: "unboxed" },
  fixed(size: number): Len {
    if (!Number.isSafeInteger(size) || size < 0) {
      throw CodecError.invalidValue("len.fixed", "a non-negative safe integer", size)
    }

    return { kind: "fixed", size }
  },
} as const satisfies Record<Exclude<Len["kind"], "fixed">, Len> & {
  fixed: (size: number) => Len
}

export function lenName(header: Len): string {
  return header.kind === "fixed" ? `fixed ${header.size}` : header.kind
}

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER)

function headerCount(kind: string, offset: number, count: bigint): number {
  if (count < 0n || count > MAX_SAFE) {
    throw CodecError.invalidEncoding(`${kind} header at offset ${offset} holds ${count}`, {
      offset,
      header: kind,
    })
  }

  return Number(count)
}

export function encodeLen(header: Len): Staged<Encoder<number>> {
  switch (header.kind) {
    case "varint":
      return stage(varint.encode)
    case "int8":
      return stage(int8.encode)
    case "int16":
      return stage(int16.encode)
    case "int32":
      return stage(int32.encode)
    case "int64":
      return stage<Encoder<number>>((count, sink) => int64.encode(BigInt(count), sink))
    case "fixed": {
      const size = header.size

      return stage<Encoder<number>>((count) => {
        if (count !== size) {
          throw CodecError.invalidValue(`fixed ${size}`, `exactly ${size} item(s)`, count)
        }
      })
    }
    case "unboxed":
      return stage<Encoder<number>>(() => {})
  }
}

export function decodeLen(header: Len): Staged<Decoder<number>> {
  switch (header.kind) {
    case "varint":
      return stage(varint.decode)
    case "int8":
      return stage(int8.decode)
    case "int16":
      return stage(int16.decode)
    case "int32":
      return stage<Decoder<number>>((buffer, offset) => {
        const [next, count] = int32.decode(buffer, offset)

        return [next, headerCount("int32", offset, BigInt(count))]
      })
    case "int64":
      return stage<Decoder<number>>((buffer, offset) => {
        const [next, count] = int64.decode(buffer, offset)

        return [next, headerCount("int64", offset, count)]
      })
    case "fixed": {
      const size = header.size

      return stage<Decoder<number>>((_buffer, offset) => [offset, size])
    }
    case "unboxed":
      return stage<Decoder<number>>((buffer, offset) => {
        checkRange(buffer, offset, 0)

        return [offset, buffer.length - offset]
      })
  }
}

export function lenSizer(header: Len): Sizer<number> {
  switch (header.kind) {
    case "varint":
      return varint.sizer
    case "int8":
      return staticSizer(1)
    case "int16":
      return staticSizer(2)
    case "int32":
      return staticSizer(4)
    case "int64":
      return staticSizer(8)
    case "fixed":
    case "unboxed":
      return staticSizer(0)
  }
}
