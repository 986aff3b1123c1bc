import type { Binding, BindingVisitor, Key } from "../ports/key"
import { type LookupResult, notFound } from "../ports/lookup-result"
import { RegistryError } from "./registry-error"
import { castWith } from "./witness"

function bind<T>(key: Key<T>, value: T): Binding {
  return {
    id: key.id,
    name: key.name,
    open: (visit) => visit(key, value),
  }
}

type Slot = { readonly index: number; readonly present: boolean }

/**
 * Immutable map from keys to values of each key's own type.
 *
 * Bindings are kept sorted by key id, so lookups are a binary search and
 * iteration follows key creation order. Every update returns a new map.
 */
export class TypedMap {
  private static readonly EMPTY = new TypedMap([])

  private readonly entries: readonly Binding[]

  private constructor(entries: readonly Binding[]) {
    this.entries = Object.freeze(entries)
  }

  static empty(): TypedMap {
    return TypedMap.EMPTY
  }

  static singleton<T>(key: Key<T>, value: T): TypedMap {
    return new TypedMap([bind(key, value)])
  }

  get size(): number {
    return this.entries.length
  }

  isEmpty(): boolean {
    return this.entries.length === 0
  }

  /** Binds `key` to `value`, replacing any previous value for that key. */
  add<T>(key: Key<T>, value: T): TypedMap {
    const { index, present } = this.locate(key.id)
    const next = [...this.entries]

    next.splice(index, present ? 1 : 0, bind(key, value))

    return new TypedMap(next)
  }

  /**
   * @throws RegistryError `invariant_violation` when a binding has the same id
   * as `key` but another witness.
   */
  find<T>(key: Key<T>): LookupResult<T> {
    const { index, present } = this.locate(key.id)

    if (!present) return notFound()

    const binding = this.entries[index]

    return binding.open<LookupResult<T>>((stored, value) => {
      const result = castWith(stored.witness, key.witness, value)

      if (result.kind === "not_found") {
        throw RegistryError.witnessMismatch({
          id: key.id,
          stored: stored.name,
          requested: key.name,
        })
      }

      return result
    })
  }

  has<T>(key: Key<T>): boolean {
    return this.locate(key.id).present
  }

  /**
   * Rewrites the binding for `key`: `f` gets the current lookup result and
   * returns `found` to set a value or `not_found` to remove the binding.
   */
  update<T>(key: Key<T>, f: (current: LookupResult<T>) => LookupResult<T>): TypedMap {
    const current = this.find(key)
    const next = f(current)

    if (next.kind === "found") return this.add(key, next.value)

    if (current.kind === "not_found") return this

    const { index } = this.locate(key.id)

    return new TypedMap([...this.entries.slice(0, index), ...this.entries.slice(index + 1)])
  }

  /** In key-id order. The array is frozen and shared with the map. */
  bindings(): readonly Binding[] {
    return this.entries
  }

  forEach(visit: BindingVisitor<void>): void {
    for (const binding of this.entries) binding.open(visit)
  }

  every(test: BindingVisitor<boolean>): boolean {
    return this.entries.every((binding) => binding.open(test))
  }

  some(test: BindingVisitor<boolean>): boolean {
    return this.entries.some((binding) => binding.open(test))
  }

  private locate(id: number): Slot {
    let lo = 0
    let hi = this.entries.length

    while (lo < hi) {
      const mid = (lo + hi) >>> 1
      const midId = this.entries[mid].id

      if (midId === id) return { index: mid, present: true }

      if (midId < id) lo = mid + 1
      else hi = mid
    }

    return { index: lo, present: false }
  }
}
