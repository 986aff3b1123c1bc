import { toAppError } from "@reprkit/errors"
import { createNullLogger, type Logger } from "@reprkit/logger"
import { FixedBuffer } from "../adapters/sinks/fixed-buffer"
import { DEFAULT_INITIAL_CAPACITY, GrowableBuffer } from "../adapters/sinks/growable-buffer"
import type { BinaryOptions } from "../config/schema"
import type { Binary } from "../ports/binary"
import type { BinaryCodec } from "../ports/codec"
import { readBytes } from "./buffer"
import { CodecError } from "./errors/codec-error"
import { endOfEncoding, sizeOfValue } from "./size/sizer"

export const defaultBinaryOptions: BinaryOptions = {
  presize: true,
  initialCapacity: DEFAULT_INITIAL_CAPACITY,
  strictDecode: true,
}

export type BinaryServiceDeps = {
  logger?: Logger
  config?: Partial<BinaryOptions>
}

export class BinaryService implements Binary {
  private readonly logger: Logger
  private readonly options: BinaryOptions

  constructor(deps: BinaryServiceDeps = {}) {
    this.logger = (deps.logger ?? createNullLogger()).child({ module: "binary" })
    this.options = { ...defaultBinaryOptions, ...deps.config }
  }

  encode<T>(codec: BinaryCodec<T>, value: T): Uint8Array {
    const buffer = this.options.presize
      ? new FixedBuffer(sizeOfValue(codec.sizer, value))
      : new GrowableBuffer(this.options.initialCapacity)

    codec.encode(value, buffer.sink)

    const bytes = buffer.finish()

    this.logger.trace("Encoded value", { codec: codec.name, length: bytes.length })

    return bytes
  }

  decode<T>(codec: BinaryCodec<T>, bytes: Uint8Array, offset = 0): T {
    const [end, value] = this.decodeAt(codec, bytes, offset)

    if (this.options.strictDecode && end !== bytes.length) {
      const err = CodecError.trailingBytes({ codec: codec.name, end, length: bytes.length })

      this.logger.warn("Decode left trailing bytes", { codec: codec.name, offset, err })

      throw err
    }

    return value
  }

  decodeAt<T>(codec: BinaryCodec<T>, bytes: Uint8Array, offset: number): readonly [number, T] {
    try {
      return codec.decode(bytes, offset)
    } catch (err) {
      const appErr = toAppError(err, "invalid_encoding", { codec: codec.name, offset })

      this.logger.warn("Decode failed", { codec: codec.name, offset, err: appErr })

      throw appErr
    }
  }

  sizeOf<T>(codec: BinaryCodec<T>, value: T): number {
    return sizeOfValue(codec.sizer, value)
  }

  skip<T>(codec: BinaryCodec<T>, bytes: Uint8Array, offset: number): number {
    return endOfEncoding(codec.sizer, bytes, offset, codec.name)
  }

  crop<T>(codec: BinaryCodec<T>, bytes: Uint8Array, offset: number): Uint8Array {
    const end = this.skip(codec, bytes, offset)

    return readBytes(bytes, offset, end - offset)
  }
}

export function createBinary(deps?: BinaryServiceDeps): Binary {
  return new BinaryService(deps)
}
