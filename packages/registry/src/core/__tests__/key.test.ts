import { createKey, keyName, sameKey } from "../key"

describe("createKey", () => {
  it("hands out increasing ids", () => {
    const a = createKey<number>("a")
    const b = createKey<number>("b")

    expect(b.id).toBeGreaterThan(a.id)
  })

  it("makes distinct keys for the same name", () => {
    const a = createKey<string>("dup")
    const b = createKey<string>("dup")

    expect(sameKey(a, b)).toBe(false)
    expect(sameKey(a, a)).toBe(true)
    expect(a.witness.id).not.toBe(b.witness.id)
  })

  it("freezes keys", () => {
    const key = createKey<boolean>("flag")

    expect(Object.isFrozen(key)).toBe(true)
    expect(keyName(key)).toBe("flag")
  })
})
