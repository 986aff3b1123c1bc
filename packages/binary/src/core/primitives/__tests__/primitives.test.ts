import { CodecError } from "../../errors/codec-error"
import { sizeOfValue } from "../../size/sizer"
import { encodeToArray, thrownBy } from "../../../tests/utils/codec-test-helpers"
import { bool } from "../bool"
import { char } from "../char"
import { float, int8, int16, int32, int64 } from "../integers"
import { unit } from "../unit"

describe("primitive codecs", () => {
  describe("unit", () => {
    it("encodes to nothing and has size 0", () => {
      expect(encodeToArray(unit, undefined)).toStrictEqual([])
      expect(sizeOfValue(unit.sizer, undefined)).toBe(0)
    })

    it("decodes without moving the offset", () => {
      expect(unit.decode(new Uint8Array(0), 0)).toStrictEqual([0, undefined])
    })
  })

  describe("bool", () => {
    it("encodes true as 0xff and false as 0x00", () => {
      expect(encodeToArray(bool, true)).toStrictEqual([0xff])
      expect(encodeToArray(bool, false)).toStrictEqual([0x00])
    })

    it("reads any non-zero byte as true", () => {
      expect(bool.decode(Uint8Array.of(0x7a), 0)).toStrictEqual([1, true])
      expect(bool.decode(Uint8Array.of(0x00), 0)).toStrictEqual([1, false])
    })
  })

  describe("char", () => {
    it("stores the character code as one byte", () => {
      expect(encodeToArray(char, "A")).toStrictEqual([0x41])
      expect(encodeToArray(char, "é")).toStrictEqual([0xe9])
      expect(char.decode(Uint8Array.of(0x7a), 0)).toStrictEqual([1, "z"])
    })

    it.each(["", "ab", "€"])("rejects %j", (value) => {
      const err = thrownBy(() => encodeToArray(char, value))

      expect(err).toBeInstanceOf(CodecError)
      expect(err).toMatchObject({ code: "invalid_value", context: { codec: "char", value } })
    })
  })

  describe("int8", () => {
    it("writes the raw byte", () => {
      expect(encodeToArray(int8, 255)).toStrictEqual([0xff])
      expect(int8.decode(Uint8Array.of(0x10, 0xfe), 1)).toStrictEqual([2, 254])
    })

    it.each([256, -1, 1.5])("rejects %d", (value) => {
      expect(thrownBy(() => encodeToArray(int8, value))).toMatchObject({
        code: "invalid_value",
      })
    })
  })

  describe("int16", () => {
    it("is big-endian and unsigned", () => {
      expect(encodeToArray(int16, 0x1234)).toStrictEqual([0x12, 0x34])
      expect(int16.decode(Uint8Array.of(0xff, 0xff), 0)).toStrictEqual([2, 65535])
    })

    it("rejects values above 65535", () => {
      expect(thrownBy(() => encodeToArray(int16, 65536))).toMatchObject({
        code: "invalid_value",
      })
    })
  })

  describe("int32", () => {
    it("is big-endian two's complement", () => {
      expect(encodeToArray(int32, -2)).toStrictEqual([0xff, 0xff, 0xff, 0xfe])
      expect(int32.decode(Uint8Array.of(0xff, 0xff, 0xff, 0xfe), 0)).toStrictEqual([4, -2])
    })

    it("rejects values outside 32 bits", () => {
      expect(thrownBy(() => encodeToArray(int32, 2 ** 31))).toMatchObject({
        code: "invalid_value",
      })
    })

    it("fails with out_of_range when the buffer is short", () => {
      const err = thrownBy(() => int32.decode(Uint8Array.of(1, 2), 0))

      expect(err).toBeInstanceOf(CodecError)
      expect(err).toMatchObject({
        code: "out_of_range",
        context: { offset: 0, length: 4, available: 2 },
      })
    })
  })

  describe("int64", () => {
    it("encodes bigint values in 8 bytes", () => {
      expect(encodeToArray(int64, 1n)).toStrictEqual([0, 0, 0, 0, 0, 0, 0, 1])
      expect(encodeToArray(int64, -1n)).toStrictEqual(new Array(8).fill(0xff))
    })

    it("rejects values outside 64 bits", () => {
      expect(thrownBy(() => encodeToArray(int64, 2n ** 63n))).toMatchObject({
        code: "invalid_value",
      })
    })
  })

  describe("float", () => {
    it("is a big-endian double", () => {
      expect(encodeToArray(float, 1.5)).toStrictEqual([0x3f, 0xf8, 0, 0, 0, 0, 0, 0])
      expect(float.decode(Uint8Array.of(0x3f, 0xf8, 0, 0, 0, 0, 0, 0), 0)).toStrictEqual([
        8, 1.5,
      ])
    })
  })

  it("all primitives except unit have a static size", () => {
    expect(bool.sizer.ofValue).toStrictEqual({ kind: "static", size: 1 })
    expect(int16.sizer.ofEncoding).toStrictEqual({ kind: "static", size: 2 })
    expect(int64.sizer.ofValue).toStrictEqual({ kind: "static", size: 8 })
  })
})
