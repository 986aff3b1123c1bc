import type { Found, LookupResult } from "../ports/lookup-result"
import { found, notFound } from "../ports/lookup-result"
import type { Erased, Witness } from "../ports/witness"

/**
 * A witness backed by a private slot.
 *
 * `erase` closes over the value; `recover` runs that closure, which can only
 * fill the slot of the witness that created it, and reads the slot back.
 */
export class UniqueWitness<T> implements Witness<T> {
  readonly id: symbol
  private slot: Found<T> | undefined

  constructor(description?: string) {
    this.id = Symbol(description)
  }

  erase(value: T): Erased {
    return {
      owner: this.id,
      reveal: () => {
        this.slot = found(value)
      },
    }
  }

  recover(erased: Erased): LookupResult<T> {
    if (erased.owner !== this.id) return notFound()

    this.slot = undefined
    erased.reveal()

    return this.take() ?? notFound()
  }

  private take(): Found<T> | undefined {
    const slot = this.slot
    this.slot = undefined

    return slot
  }
}

/**
 * `value`, known at the type of `from`, seen at the type of `to`.
 *
 * Erases through `from` and recovers through `to`, so the result is
 * `not_found` unless both are the same witness.
 */
export function castWith<A, B>(from: Witness<A>, to: Witness<B>, value: A): LookupResult<B> {
  if (from.id !== to.id) return notFound()

  return to.recover(from.erase(value))
}
