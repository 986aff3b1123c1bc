import type {
  DynamicSize,
  EncodingEnd,
  EncodingSize,
  Sizer,
  StaticSize,
  UnknownSize,
  ValueSize,
} from "../../ports/size"
import { CodecError } from "../errors/codec-error"

export const staticSize = (size: number): StaticSize => ({ kind: "static", size })

export const dynamicSize = <F>(of: F): DynamicSize<F> => ({ kind: "dynamic", of })

export const unknownSize: UnknownSize = { kind: "unknown" }

export function staticSizer<T>(size: number): Sizer<T> {
  const s = staticSize(size)

  return { ofValue: s, ofEncoding: s }
}

export function dynamicSizer<T>(
  ofValue: (value: T) => number,
  ofEncoding: EncodingEnd,
): Sizer<T> {
  return { ofValue: dynamicSize(ofValue), ofEncoding: dynamicSize(ofEncoding) }
}

/** Value size as a function, whatever its kind. */
export function valueSizeFn<T>(size: ValueSize<T>): (value: T) => number {
  if (size.kind === "dynamic") return size.of

  const n = size.size

  return () => n
}

/** Encoding end as a function, or `undefined` when the size is unknown. */
export function encodingEnd(size: EncodingSize): EncodingEnd | undefined {
  switch (size.kind) {
    case "unknown":
      return undefined
    case "dynamic":
      return size.of
    case "static": {
      const n = size.size

      return (_buffer, offset) => offset + n
    }
  }
}

/** Sizer of a field reached from the whole value through `project`. */
export function using<T, U>(project: (value: T) => U, sizer: Sizer<U>): Sizer<T> {
  const { ofValue } = sizer

  if (ofValue.kind === "static") {
    return { ofValue, ofEncoding: sizer.ofEncoding }
  }

  const of = ofValue.of

  return {
    ofValue: dynamicSize((value: T) => of(project(value))),
    ofEncoding: sizer.ofEncoding,
  }
}

/**
 * Size of two encodings laid out back to back.
 *
 * Static with static stays static; anything dynamic makes the sum dynamic;
 * an unknown encoding size on either side makes the whole unknown.
 */
export function combine<T>(a: Sizer<T>, b: Sizer<T>): Sizer<T> {
  return {
    ofValue: addValueSizes(a.ofValue, b.ofValue),
    ofEncoding: chainEncodingSizes(a.ofEncoding, b.ofEncoding),
  }
}

function addValueSizes<T>(a: ValueSize<T>, b: ValueSize<T>): ValueSize<T> {
  if (a.kind === "static" && b.kind === "static") {
    return staticSize(a.size + b.size)
  }

  const sizeA = valueSizeFn(a)
  const sizeB = valueSizeFn(b)

  return dynamicSize((value: T) => sizeA(value) + sizeB(value))
}

function chainEncodingSizes(a: EncodingSize, b: EncodingSize): EncodingSize {
  if (a.kind === "static" && b.kind === "static") {
    return staticSize(a.size + b.size)
  }

  const endA = encodingEnd(a)
  const endB = encodingEnd(b)

  if (endA === undefined || endB === undefined) return unknownSize

  return dynamicSize<EncodingEnd>((buffer, offset) => endB(buffer, endA(buffer, offset)))
}

export function sizeOfValue<T>(sizer: Sizer<T>, value: T): number {
  return sizer.ofValue.kind === "static" ? sizer.ofValue.size : sizer.ofValue.of(value)
}

/**
 * Offset just past the encoded value at `offset`.
 *
 * @throws CodecError `size_unavailable` when the sizer has no encoding size.
 */
export function endOfEncoding<T>(
  sizer: Sizer<T>,
  buffer: Uint8Array,
  offset: number,
  codec = "codec",
): number {
  const end = encodingEnd(sizer.ofEncoding)

  if (end === undefined) throw CodecError.sizeUnavailable(codec)

  return end(buffer, offset)
}
