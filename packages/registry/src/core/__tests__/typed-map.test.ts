import type { Key } from "../../ports/key"
import { found, notFound } from "../../ports/lookup-result"
import type { Witness } from "../../ports/witness"
import { createKey } from "../key"
import { RegistryError } from "../registry-error"
import { TypedMap } from "../typed-map"
import { UniqueWitness } from "../witness"

describe("TypedMap", () => {
  it("finds only what was added", () => {
    const a = createKey<number>("a")
    const b = createKey<number>("b")
    const m = TypedMap.empty().add(a, 5)

    expect(m.find(b)).toStrictEqual(notFound())
    expect(m.find(a)).toStrictEqual(found(5))
  })

  it("stores values of different types side by side", () => {
    const label = createKey<string>("label")
    const sizes = createKey<number[]>("sizes")
    const m = TypedMap.empty().add(label, "header").add(sizes, [1, 2])

    const result = m.find(sizes)

    expect(m.find(label)).toStrictEqual(found("header"))
    expect(result.kind).toBe("found")
    if (result.kind === "found") {
      expect(result.value.length).toBe(2)
    }
  })

  it("replaces the value of an existing key", () => {
    const a = createKey<string>("a")
    const m = TypedMap.singleton(a, "old").add(a, "new")

    expect(m.size).toBe(1)
    expect(m.find(a)).toStrictEqual(found("new"))
  })

  it("leaves the original map untouched", () => {
    const a = createKey<number>("a")
    const before = TypedMap.empty()
    const after = before.add(a, 1)

    expect(before.isEmpty()).toBe(true)
    expect(before.has(a)).toBe(false)
    expect(after.has(a)).toBe(true)
  })

  it("keeps bindings in key creation order", () => {
    const first = createKey<number>("first")
    const second = createKey<string>("second")
    const third = createKey<boolean>("third")

    const m = TypedMap.empty().add(third, true).add(first, 1).add(second, "two")

    expect(m.bindings().map((binding) => binding.name)).toStrictEqual([
      "first",
      "second",
      "third",
    ])
    expect(m.bindings().map((binding) => binding.id)).toStrictEqual([
      first.id,
      second.id,
      third.id,
    ])
  })

  it("hands out bindings that cannot be reordered or extended", () => {
    const low = createKey<number>("low")
    const high = createKey<number>("high")
    const m = TypedMap.empty().add(high, 2).add(low, 1)
    const bindings = m.bindings()

    expect(Object.isFrozen(bindings)).toBe(true)
    expect(() => Array.prototype.reverse.call(bindings)).toThrow(TypeError)
    expect(() => Array.prototype.push.call(bindings, bindings[0])).toThrow(TypeError)
    expect(m.find(low)).toStrictEqual(found(1))
    expect(m.find(high)).toStrictEqual(found(2))
    expect(m.size).toBe(2)
  })

  describe("update", () => {
    const counter = createKey<number>("counter")

    it("inserts when the key is absent", () => {
      const m = TypedMap.empty().update(counter, (current) =>
        current.kind === "found" ? current : found(1),
      )

      expect(m.find(counter)).toStrictEqual(found(1))
    })

    it("modifies the current value", () => {
      const m = TypedMap.singleton(counter, 1).update(counter, (current) =>
        current.kind === "found" ? found(current.value + 1) : current,
      )

      expect(m.find(counter)).toStrictEqual(found(2))
    })

    it("removes the binding when the result is not_found", () => {
      const other = createKey<string>("other")
      const m = TypedMap.singleton(counter, 1).add(other, "x").update(counter, () => notFound())

      expect(m.size).toBe(1)
      expect(m.has(counter)).toBe(false)
      expect(m.find(other)).toStrictEqual(found("x"))
    })

    it("returns the same map when nothing changes", () => {
      const m = TypedMap.empty()

      expect(m.update(counter, () => notFound())).toBe(m)
    })
  })

  describe("iteration", () => {
    const x = createKey<number>("x")
    const y = createKey<string>("y")
    const m = TypedMap.empty().add(y, "why").add(x, 10)

    it("forEach visits every binding in key order", () => {
      const seen: string[] = []

      m.forEach((key, value) => {
        seen.push(`${key.name}=${String(value)}`)
      })

      expect(seen).toStrictEqual(["x=10", "y=why"])
    })

    it("every and some test each binding", () => {
      expect(m.every((key) => key.name.length === 1)).toBe(true)
      expect(m.every((_key, value) => typeof value === "number")).toBe(false)
      expect(m.some((_key, value) => value === "why")).toBe(true)
      expect(TypedMap.empty().some(() => true)).toBe(false)
      expect(TypedMap.empty().every(() => false)).toBe(true)
    })
  })

  describe("witness check", () => {
    it("rejects a key that reuses an id with another witness", () => {
      const real = createKey<number>("real")
      const forged: Key<string> = {
        id: real.id,
        name: "forged",
        witness: new UniqueWitness<string>("forged"),
      }
      const m = TypedMap.singleton(real, 42)

      let err: unknown

      try {
        m.find(forged)
      } catch (e) {
        err = e
      }

      expect(err).toBeInstanceOf(RegistryError)
      expect(err).toMatchObject({
        code: "invariant_violation",
        isOperational: false,
        context: { id: real.id, stored: "real", requested: "forged" },
      })
    })

    it("rejects a witness that copies the id but not the slot", () => {
      const real = createKey<number>("real")
      const impostor: Witness<number> = {
        id: real.witness.id,
        erase: () => ({ owner: real.witness.id, reveal: () => {} }),
        recover: () => notFound(),
      }
      const m = TypedMap.singleton(real, 7)

      const key: Key<number> = { id: real.id, name: "impostor", witness: impostor }

      expect(() => m.find(key)).toThrow(RegistryError)
      expect(() => m.update(key, (current) => current)).toThrow(RegistryError)
    })
  })
})
