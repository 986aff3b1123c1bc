import type { Witness } from "./witness"

/**
 * Identifies one slot of a typed map and the type of the value stored there.
 *
 * Ids are unique within a process and increase in creation order.
 */
export type Key<T> = {
  readonly id: number

  /** For diagnostics only; several keys may share a name. */
  readonly name: string
  readonly witness: Witness<T>
}

/** Called with each binding at its own type. */
export type BindingVisitor<R> = <U>(key: Key<U>, value: U) => R

/**
 * A key together with its value, with the value's type hidden.
 * `open` is the only way to look inside.
 */
export type Binding = {
  readonly id: number
  readonly name: string
  open<R>(visit: BindingVisitor<R>): R
}
