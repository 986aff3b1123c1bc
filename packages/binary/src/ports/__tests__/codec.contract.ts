import { encodingEnd, sizeOfValue } from "../../core/size/sizer"
import { encodeToArray } from "../../tests/utils/codec-test-helpers"
import type { BinaryCodec } from "../codec"

const PREFIX = [0xaa, 0xbb, 0xcc]

/**
 * Laws every codec obeys, checked over a handful of values.
 *
 * Each value is encoded after a few unrelated bytes so decoding and sizing
 * are exercised at a non-zero offset.
 */
export function describeCodecContract<T>(codec: BinaryCodec<T>, samples: readonly T[]): void {
  describe(`BinaryCodec contract - ${codec.name}`, () => {
    samples.forEach((sample, i) => {
      describe(`sample #${i}`, () => {
        const encoded = encodeToArray(codec, sample)
        const buffer = Uint8Array.from([...PREFIX, ...encoded])

        it("decodes back to the same value and stops at the end of it", () => {
          const [end, value] = codec.decode(buffer, PREFIX.length)

          expect(end).toBe(buffer.length)
          expect(value).toStrictEqual(sample)
        })

        it("size from value equals the encoded length", () => {
          expect(sizeOfValue(codec.sizer, sample)).toBe(encoded.length)
        })

        it("size from encoding, when known, finds the same end", () => {
          const end = encodingEnd(codec.sizer.ofEncoding)

          if (end === undefined) return

          expect(end(buffer, PREFIX.length)).toBe(buffer.length)
        })
      })
    })
  })
}
