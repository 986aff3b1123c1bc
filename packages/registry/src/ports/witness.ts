import type { LookupResult } from "./lookup-result"

/**
 * A value whose static type has been forgotten. Only the witness that erased
 * it can read it back.
 */
export type Erased = {
  readonly owner: symbol
  readonly reveal: () => void
}

/**
 * Runtime evidence for a type `T`.
 *
 * Two witnesses with the same `id` stand for the same type; that is what lets
 * a heterogeneous map hand a stored value back at its original type.
 */
export interface Witness<T> {
  readonly id: symbol
  erase(value: T): Erased

  /** `not_found` when `erased` did not come from this witness. */
  recover(erased: Erased): LookupResult<T>
}
