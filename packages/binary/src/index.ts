export { FixedBuffer } from "./adapters/sinks/fixed-buffer"
export { DEFAULT_INITIAL_CAPACITY, GrowableBuffer } from "./adapters/sinks/growable-buffer"
export { DEFAULT_ENV_PREFIX, EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ObjectSource } from "./adapters/object/object-source"
export { ConfigError } from "./config/config-error"
export { loadBinaryConfig, type LoadBinaryConfigOptions } from "./config/load-binary-config"
export {
  type BinaryConfig,
  type BinaryConfigInput,
  type BinaryOptions,
  binaryConfigSchema,
} from "./config/schema"
export {
  BinaryService,
  type BinaryServiceDeps,
  createBinary,
  defaultBinaryOptions,
} from "./core/binary-service"
export { option, optionSizer, none, some } from "./core/containers/option"
export { array, list, sequenceSizer } from "./core/containers/sequence"
export { bytes, bytesUnboxed, string, stringUnboxed } from "./core/containers/string"
export { pair, triple } from "./core/containers/tuple"
export { CodecError, type CodecErrorCode } from "./core/errors/codec-error"
export { decodeLen, encodeLen, len, lenName, lenSizer } from "./core/len"
export { bool } from "./core/primitives/bool"
export { char } from "./core/primitives/char"
export { float, int8, int16, int32, int64 } from "./core/primitives/integers"
export { unit } from "./core/primitives/unit"
export { decodeVarint, MAX_VARINT_BYTES, varint, varintLength } from "./core/primitives/varint"
export {
  combine,
  dynamicSize,
  dynamicSizer,
  encodingEnd,
  endOfEncoding,
  sizeOfValue,
  staticSize,
  staticSizer,
  unknownSize,
  using,
  valueSizeFn,
} from "./core/size/sizer"
export { type Staged, stage, unstage } from "./core/staging"
export { createBinaryFromEnv, type CreateBinaryFromEnvOptions } from "./create-binary"
export type { Binary } from "./ports/binary"
export type { ByteBuffer } from "./ports/byte-buffer"
export type { BinaryCodec, ByteSink, Decoder, Encoder } from "./ports/codec"
export type { ConfigSource } from "./ports/config-source"
export type { Len, LenKind } from "./ports/len"
export type { None, Option, Some } from "./ports/option"
export type {
  DynamicSize,
  EncodingEnd,
  EncodingSize,
  Sizer,
  StaticSize,
  UnknownSize,
  ValueSize,
} from "./ports/size"
