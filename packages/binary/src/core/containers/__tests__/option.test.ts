import { len } from "../../len"
import { int8 } from "../../primitives/integers"
import { unit } from "../../primitives/unit"
import { encodingEnd, sizeOfValue } from "../../size/sizer"
import { encodeToArray } from "../../../tests/utils/codec-test-helpers"
import { none, option, some } from "../option"
import { string, stringUnboxed } from "../string"

describe("option", () => {
  const codec = option(int8)

  it("writes 0xff before a present value and 0x00 for none", () => {
    expect(codec.name).toBe("option(int8)")
    expect(encodeToArray(codec, some(5))).toStrictEqual([0xff, 0x05])
    expect(encodeToArray(codec, none)).toStrictEqual([0x00])
  })

  it("treats any non-zero tag as some", () => {
    expect(codec.decode(Uint8Array.of(0x01, 0x07), 0)).toStrictEqual([2, some(7)])
    expect(codec.decode(Uint8Array.of(0x00, 0x07), 0)).toStrictEqual([1, none])
  })

  it("keeps both levels of a nested option", () => {
    const nested = option(option(int8))

    expect(encodeToArray(nested, some(none))).toStrictEqual([0xff, 0x00])
    expect(encodeToArray(nested, none)).toStrictEqual([0x00])
    expect(nested.decode(Uint8Array.of(0xff, 0x00), 0)).toStrictEqual([2, some(none)])
  })

  describe("sizer", () => {
    it("is static 1 around a zero-size element", () => {
      expect(option(unit).sizer).toStrictEqual({
        ofValue: { kind: "static", size: 1 },
        ofEncoding: { kind: "static", size: 1 },
      })
    })

    it("reads the tag to size a static element", () => {
      const end = encodingEnd(codec.sizer.ofEncoding)

      expect(sizeOfValue(codec.sizer, none)).toBe(1)
      expect(sizeOfValue(codec.sizer, some(3))).toBe(2)
      expect(end?.(Uint8Array.of(0x09, 0x00, 0x05), 1)).toBe(2)
      expect(end?.(Uint8Array.of(0x09, 0xff, 0x05), 1)).toBe(3)
    })

    it("delegates to a dynamic element after the tag", () => {
      const dynamic = option(string(len.int8))
      const end = encodingEnd(dynamic.sizer.ofEncoding)

      expect(sizeOfValue(dynamic.sizer, some("ab"))).toBe(4)
      expect(sizeOfValue(dynamic.sizer, none)).toBe(1)
      expect(end?.(Uint8Array.of(0xff, 0x02, 0x61, 0x62), 0)).toBe(4)
      expect(end?.(Uint8Array.of(0x00), 0)).toBe(1)
    })

    it("stays unknown around an element with no encoding size", () => {
      expect(option(stringUnboxed).sizer.ofEncoding).toStrictEqual({ kind: "unknown" })
    })
  })
})
