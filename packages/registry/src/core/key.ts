import type { Key } from "../ports/key"
import { UniqueWitness } from "./witness"

let lastId = -1

/**
 * Mints a key with a fresh id and witness. Every call yields a distinct key,
 * even for the same name.
 */
export function createKey<T>(name: string): Key<T> {
  lastId += 1

  return Object.freeze({ id: lastId, name, witness: new UniqueWitness<T>(name) })
}

export function sameKey<A, B>(a: Key<A>, b: Key<B>): boolean {
  return a.id === b.id
}

export function keyName<T>(key: Key<T>): string {
  return key.name
}
