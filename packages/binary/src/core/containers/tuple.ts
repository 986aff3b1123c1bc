import type { BinaryCodec } from "../../ports/codec"
import { combine, using } from "../size/sizer"

export function pair<A, B>(
  first: BinaryCodec<A>,
  second: BinaryCodec<B>,
): BinaryCodec<readonly [A, B]> {
  return {
    name: `pair(${first.name},${second.name})`,
    encode: ([a, b], sink) => {
      first.encode(a, sink)
      second.encode(b, sink)
    },
    decode: (buffer, offset) => {
      const [afterA, a] = first.decode(buffer, offset)
      const [afterB, b] = second.decode(buffer, afterA)

      return [afterB, [a, b]]
    },
    sizer: combine(
      using(([a]: readonly [A, B]) => a, first.sizer),
      using(([, b]: readonly [A, B]) => b, second.sizer),
    ),
  }
}

export function triple<A, B, C>(
  first: BinaryCodec<A>,
  second: BinaryCodec<B>,
  third: BinaryCodec<C>,
): BinaryCodec<readonly [A, B, C]> {
  return {
    name: `triple(${first.name},${second.name},${third.name})`,
    encode: ([a, b, c], sink) => {
      first.encode(a, sink)
      second.encode(b, sink)
      third.encode(c, sink)
    },
    decode: (buffer, offset) => {
      const [afterA, a] = first.decode(buffer, offset)
      const [afterB, b] = second.decode(buffer, afterA)
      const [afterC, c] = third.decode(buffer, afterB)

      return [afterC, [a, b, c]]
    },
    sizer: combine(
      combine(
        using(([a]: readonly [A, B, C]) => a, first.sizer),
        using(([, b]: readonly [A, B, C]) => b, second.sizer),
      ),
      using(([, , c]: readonly [A, B, C]) => c, third.sizer),
    ),
  }
}
